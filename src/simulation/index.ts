// src/simulation/index.ts

export { simulate, type Simulatable } from './simulate';
export { poisson } from './poisson';
