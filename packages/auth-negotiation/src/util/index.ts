export { createSingleFlight } from './single-flight.js';
export type { SingleFlight } from './single-flight.js';
export { withTimeout } from './timeout.js';
