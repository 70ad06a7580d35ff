/**
 * Retry module - wait schedules, jitter, stop conditions and blocking or cooperative retry wrappers
 */

// Types
export type {
  AsyncSuspender,
  DriverKind,
  ExceptionRetryOptions,
  Jitterer,
  MaybeArray,
  MaybeDeferred,
  PredicateRetryOptions,
  RetryDetails,
  RetryEvent,
  RetryHandler,
  RetryOptions,
  SyncSuspender,
  WaitSchedule,
  WaitScheduleKind,
  WaitSequence,
} from './types.js';

// Wait schedules and jitter
export {
  constant,
  decay,
  expo,
  fibo,
  nonNegative,
  runtime,
  sequence,
  type ConstantOptions,
  type DecayOptions,
  type ExpoOptions,
  type FiboOptions,
  type RuntimeOptions,
} from './wait-generators.js';
export { createRandomJitter, fullJitter, randomJitter } from './jitter.js';

// Controller and drivers
export {
  RetryController,
  type AttemptOutcome,
  type Classification,
  type RetryPlan,
  type RetryState,
  type Transition,
} from './controller.js';
export {
  BlockingSuspender,
  CooperativeSuspender,
  MAX_TIMER_MS,
  runBlocking,
  runCooperative,
  type Terminal,
} from './drivers.js';
export { createExceptionPlan, createPredicatePlan, resolveLimit, resolveSchedule } from './options.js';
export { DEFAULT_LOGGER_NAME, createLogHandlers, type HandlerSet } from './handlers.js';

// Wrappers
export {
  onException,
  onExceptionSync,
  onPredicate,
  onPredicateSync,
  type BlockingOptions,
  type CooperativeOptions,
  type OnExceptionOptions,
  type OnExceptionSyncOptions,
  type OnPredicateOptions,
  type OnPredicateSyncOptions,
} from './decorators.js';

// Policy files and CLI
export {
  PolicyFileSchema,
  buildSchedule,
  getRetryPolicy,
  loadRetryPolicies,
  parseRetryPolicies,
  previewWaits,
  type JitterName,
  type PolicyConfig,
  type PolicyFile,
  type RetryPolicy,
  type ScheduleConfig,
} from './policy.js';
export { createCli, type CliOutput } from './cli.js';
