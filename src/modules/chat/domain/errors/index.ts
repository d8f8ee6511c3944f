export {
  InvalidModelRequestError,
  ModelInvocationError,
  ModelUnavailableError,
  TransientModelError,
  type ModelFailureKind,
} from './model-invocation.error';
export {
  AllModelsExhaustedError,
  DispatchDeadlineExceededError,
  IllegalDispatchTransitionError,
  InvalidOverrideError,
  InvalidSelectionTableError,
  type InvalidOverrideReason,
} from './orchestration.error';
export {
  FeedbackTargetError,
  SessionNotFoundError,
  type FeedbackTargetFailure,
} from './chat-session.error';
