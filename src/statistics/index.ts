// src/statistics/index.ts

export { MatchStatistics, requirePlayed, isPlayed, type ResultFrequency, type PlayedMatch } from './matches';
export { TeamStatistics } from './team';
export { HeadToHeadStatistics } from './headtohead';
