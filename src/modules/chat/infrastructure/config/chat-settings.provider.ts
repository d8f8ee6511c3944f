import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_SELECTION_THRESHOLDS,
  parseSelectionThresholds,
  type SelectionThresholdEntry,
} from '../../../../common/config/env.validation';
import type { ChatSettings } from '../../application/chat-settings';
import { CHAT_SETTINGS } from '../../application/ports/tokens';
import { DEFAULT_COMPLEXITY_KEYWORDS } from '../../domain/complexity-scorer';
import {
  buildDefaultModelDescriptors,
  FAST_MODEL_ID,
  ModelCatalog,
} from '../../domain/model-catalog';
import { ModelSelector } from '../../domain/model-selector';
import { loadPromptFile } from '../adapters/shared';

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful AI assistant. Give clear, accurate answers. Be concise but complete.';

export function buildChatSettings(configService: ConfigService): ChatSettings {
  const scoreCap = configService.get<number>('CHAT_SCORE_CAP');

  return {
    models: {
      highCapabilityDeployment: configService.get<string>('HIGH_CAPABILITY_DEPLOYMENT') ?? 'gpt-4',
      fastDeployment: configService.get<string>('FAST_DEPLOYMENT') ?? 'gpt-35-turbo',
      disabledModelIds: configService.get<string[]>('DISABLED_MODELS') ?? [],
    },
    scorer: {
      lengthThreshold: configService.get<number>('CHAT_SCORER_LENGTH_THRESHOLD') ?? 500,
      minQuestionMarks: configService.get<number>('CHAT_SCORER_MIN_QUESTION_MARKS') ?? 2,
      keywords: configService.get<string[]>('CHAT_COMPLEXITY_KEYWORDS') ?? DEFAULT_COMPLEXITY_KEYWORDS,
      ...(typeof scoreCap === 'number' ? { scoreCap } : {}),
    },
    selectionThresholds:
      configService.get<SelectionThresholdEntry[]>('CHAT_SELECTION_THRESHOLDS') ??
      parseSelectionThresholds(DEFAULT_SELECTION_THRESHOLDS),
    fallbackModelId: configService.get<string>('CHAT_FALLBACK_MODEL') ?? FAST_MODEL_ID,
    dispatch: {
      maxAttempts: configService.get<number>('CHAT_DISPATCH_MAX_ATTEMPTS') ?? 3,
      baseBackoffMs: configService.get<number>('CHAT_DISPATCH_BASE_BACKOFF_MS') ?? 250,
      maxBackoffMs: configService.get<number>('CHAT_DISPATCH_MAX_BACKOFF_MS') ?? 4000,
    },
    requestDeadlineMs: configService.get<number>('CHAT_REQUEST_DEADLINE_MS') ?? 30_000,
    invocation: {
      maxOutputTokens: configService.get<number>('CHAT_MAX_OUTPUT_TOKENS') ?? 2048,
      temperature: configService.get<number>('CHAT_TEMPERATURE') ?? 0.7,
    },
    context: {
      maxTurns: configService.get<number>('CHAT_CONTEXT_MAX_TURNS') ?? 10,
      maxChars: configService.get<number>('CHAT_CONTEXT_MAX_CHARS') ?? 12_000,
    },
    contextCacheMaxSessions: configService.get<number>('CHAT_CONTEXT_CACHE_MAX_SESSIONS') ?? 1000,
    historyLimit: configService.get<number>('CHAT_HISTORY_LIMIT') ?? 10,
    systemPrompt: loadPromptFile('prompts/assistant-system.txt', DEFAULT_SYSTEM_PROMPT),
  };
}

export const chatSettingsProvider: FactoryProvider<ChatSettings> = {
  provide: CHAT_SETTINGS,
  useFactory: buildChatSettings,
  inject: [ConfigService],
};

export const modelCatalogProvider: FactoryProvider<ModelCatalog> = {
  provide: ModelCatalog,
  useFactory: (settings: ChatSettings) =>
    new ModelCatalog(
      buildDefaultModelDescriptors({
        highCapabilityDeployment: settings.models.highCapabilityDeployment,
        fastDeployment: settings.models.fastDeployment,
      }),
      settings.models.disabledModelIds,
    ),
  inject: [CHAT_SETTINGS],
};

/** Validates the threshold table against the catalog at startup. */
export const modelSelectorProvider: FactoryProvider<ModelSelector> = {
  provide: ModelSelector,
  useFactory: (catalog: ModelCatalog, settings: ChatSettings) =>
    new ModelSelector(catalog, settings.selectionThresholds),
  inject: [ModelCatalog, CHAT_SETTINGS],
};
