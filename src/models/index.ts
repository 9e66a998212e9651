// src/models/index.ts

export { Team } from './team';
export { Result } from './result';
export { Match } from './match';
export { Round } from './round';
export { Tournament, type TournamentOptions } from './tournament';
