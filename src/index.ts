/**
 * steprelay library entry point.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './events/index.js';
export * from './monitor/index.js';
export * from './report/index.js';
export { ProcessRunner, buildPayload } from './runner/processRunner.js';
export type {
  ExecuteOptions,
  InstructionRunner,
  ProcessRunnerConfig,
  VerifyResult,
} from './runner/processRunner.js';
export { ProcessInventory, parsePsOutput, psLister } from './inventory/processInventory.js';
export type { ProcessEntry, TerminateOutcome } from './inventory/processInventory.js';
