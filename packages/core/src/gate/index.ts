export {
  UnrestrictedGate,
  SerializedGate,
  createRequestGate,
} from './request-gate.js';
export type { RequestGate } from './request-gate.js';
export { sleep, createAbortError, isAbortError } from './sleep.js';
