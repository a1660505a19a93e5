export { createSingleFlight } from './single-flight.js';
export type { SingleFlight, Producer, RunOptions } from './single-flight.js';
