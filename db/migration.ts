export let migrationSQL = /* sql */ `
-- Up
create table if not exists word (
  id integer primary key
, symbols text not null
, frequency integer not null
);
create table if not exists merge (
  id integer primary key
, a text not null
, b text not null
, frequency integer not null
);
-- Down
drop table if exists merge;
drop table if exists word;
`
