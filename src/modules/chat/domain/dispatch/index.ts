export {
  computeBackoffMs,
  initialDispatchState,
  isTerminal,
  transition,
  type DispatchEvent,
  type DispatchFailureReason,
  type DispatchPhase,
  type DispatchPolicy,
  type DispatchState,
  type FallbackReason,
  type TerminalDispatchState,
} from './dispatch-state';
