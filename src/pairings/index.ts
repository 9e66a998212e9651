// src/pairings/index.ts

export {
  buildRoundRobinSchedule,
  getRoundRobinRound,
  type RoundRobinOptions,
} from './roundrobin';
