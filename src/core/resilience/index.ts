export { classifyFailure, type FailureKind, isTransientStatus } from './classify';
export {
  computeBackoff,
  createSeededRandom,
  type RandomSource,
  type RetryPolicy,
  resolveRandomSource
} from './policy';
export {
  type AttemptContext,
  type RetryEvent,
  type RetryOptions,
  sleep,
  withRetry
} from './retry';
