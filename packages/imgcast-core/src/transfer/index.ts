export { TransferEngine } from './transfer-engine.js';
export type { TypedTransferEngineEmitter } from './transfer-engine.js';
export { computeProgressSample, ProgressThrottle } from './progress.js';
export type {
  ProgressSample,
  TransferOptions,
  TransferResult,
  TransferEngineOptions,
  TransferEngineEvents,
} from './types.js';
