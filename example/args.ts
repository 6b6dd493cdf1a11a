/**
 * @description parse a non-negative integer from argv,
 * fallback to default_value only when the argument is missing
 */
export function parseCountArg(
  arg: string | undefined,
  default_value: number,
): number {
  if (arg === undefined || arg === '') return default_value
  let count = +arg
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(
      'invalid count, expect non-negative integer, got: ' + JSON.stringify(arg),
    )
  }
  return count
}
