import type { ScorerConfig } from '../domain/complexity-scorer';
import type { ContextLimits } from '../domain/conversation-context';
import type { SelectionThreshold } from '../domain/model-selector';
import type { InvocationConfig } from './ports/model-invocation.port';

/** Typed runtime settings of the chat module, resolved once from the environment. */
export interface ChatSettings {
  models: {
    highCapabilityDeployment: string;
    fastDeployment: string;
    disabledModelIds: string[];
  };
  scorer: ScorerConfig;
  selectionThresholds: SelectionThreshold[];
  fallbackModelId: string;
  dispatch: {
    maxAttempts: number;
    baseBackoffMs: number;
    maxBackoffMs: number;
  };
  requestDeadlineMs: number;
  invocation: InvocationConfig;
  context: ContextLimits;
  contextCacheMaxSessions: number;
  historyLimit: number;
  systemPrompt: string;
}
