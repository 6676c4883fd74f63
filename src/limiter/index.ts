export { RateGate, type RateGateOptions } from './rateGate.js';
