// src/standings/index.ts

export {
  StandingsTable,
  DEFAULT_TIE_BREAK,
  type StandingsRow,
  type StandingsOptions,
  type TieBreakPolicy,
} from './table';
