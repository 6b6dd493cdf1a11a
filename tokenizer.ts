import { UNKNOWN_MARKER } from './symbol'

/**
 * @description non-overlapping start positions of token in content, from left to right.
 * The token is matched as literal text.
 */
export function findAll(content: string, token: string): number[] {
  let positions: number[] = []
  if (!token) return positions
  for (let offset = 0; offset <= content.length - token.length; ) {
    let index = content.indexOf(token, offset)
    if (index == -1) break
    positions.push(index)
    offset = index + token.length
  }
  return positions
}

/**
 * @description segment the content with the sorted tokens (highest priority first).
 *
 * The first token with any occurrence decides the segmentation of this level:
 * all its occurrences are taken, and the gaps around them are tokenized with
 * the tokens after it only. There is no backtracking.
 *
 * Residue that no remaining token matches becomes one unknown_marker.
 *
 * @example tokenize("lowest</w>", ["est</w>", "low"]) -> ["low", "est</w>"]
 */
export function tokenize(
  content: string,
  sorted_tokens: readonly string[],
  unknown_marker: string = UNKNOWN_MARKER,
): string[] {
  return tokenizeFrom(content, sorted_tokens, 0, unknown_marker)
}

function tokenizeFrom(
  content: string,
  sorted_tokens: readonly string[],
  start: number,
  unknown_marker: string,
): string[] {
  if (!content) return []
  for (let i = start; i < sorted_tokens.length; i++) {
    let token = sorted_tokens[i]
    let positions = findAll(content, token)
    if (positions.length == 0) continue

    let tokens: string[] = []
    let offset = 0
    for (let position of positions) {
      let gap = content.slice(offset, position)
      tokens.push(...tokenizeFrom(gap, sorted_tokens, i + 1, unknown_marker))
      tokens.push(token)
      offset = position + token.length
    }
    let rest = content.slice(offset)
    tokens.push(...tokenizeFrom(rest, sorted_tokens, i + 1, unknown_marker))
    return tokens
  }
  return [unknown_marker]
}
