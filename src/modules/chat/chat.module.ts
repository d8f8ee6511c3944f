import { Module } from '@nestjs/common';
import { ChatController } from './controllers/chat.controller';
import { FeedbackController } from './controllers/feedback.controller';
import { MetricsController } from './controllers/metrics.controller';
import { ModelsController } from './controllers/models.controller';
import { SessionsController } from './controllers/sessions.controller';
import { SuggestionsController } from './controllers/suggestions.controller';
import {
  CHAT_FEEDBACK_PORT,
  CHAT_PERSISTENCE_PORT,
  METRICS_PORT,
  MODEL_INVOCATION_PORT,
} from './application/ports/tokens';
import { DispatcherService } from './application/services/dispatcher.service';
import { SessionContextRegistry } from './application/services/session-context.registry';
import { AnalyzeQueryUseCase } from './application/use-cases/analyze-query/analyze-query.use-case';
import { GetFollowUpSuggestionsUseCase } from './application/use-cases/get-follow-up-suggestions/get-follow-up-suggestions.use-case';
import { ManageSessionsUseCase } from './application/use-cases/manage-sessions/manage-sessions.use-case';
import { OrchestrateChatUseCase } from './application/use-cases/orchestrate-chat/orchestrate-chat.use-case';
import { SubmitChatFeedbackUseCase } from './application/use-cases/submit-chat-feedback/submit-chat-feedback.use-case';
import { ModelCatalog } from './domain/model-catalog';
import { AzureOpenAiAdapter } from './infrastructure/adapters/azure-openai/azure-openai.adapter';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import {
  chatSettingsProvider,
  modelCatalogProvider,
  modelSelectorProvider,
} from './infrastructure/config/chat-settings.provider';
import { PgChatFeedbackRepository } from './infrastructure/repositories/pg-chat-feedback.repository';
import { PgChatRepository } from './infrastructure/repositories/pg-chat.repository';
import { pgPoolFactory, PgPoolProvider } from './infrastructure/repositories/pg-pool.provider';

@Module({
  controllers: [
    ChatController,
    ModelsController,
    SessionsController,
    FeedbackController,
    SuggestionsController,
    MetricsController,
  ],
  providers: [
    chatSettingsProvider,
    modelCatalogProvider,
    modelSelectorProvider,
    DispatcherService,
    SessionContextRegistry,
    OrchestrateChatUseCase,
    AnalyzeQueryUseCase,
    ManageSessionsUseCase,
    SubmitChatFeedbackUseCase,
    GetFollowUpSuggestionsUseCase,
    AzureOpenAiAdapter,
    PrometheusMetricsAdapter,
    PgPoolProvider,
    pgPoolFactory,
    PgChatRepository,
    PgChatFeedbackRepository,
    {
      provide: MODEL_INVOCATION_PORT,
      useExisting: AzureOpenAiAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: CHAT_PERSISTENCE_PORT,
      useExisting: PgChatRepository,
    },
    {
      provide: CHAT_FEEDBACK_PORT,
      useExisting: PgChatFeedbackRepository,
    },
  ],
  exports: [ModelCatalog, MODEL_INVOCATION_PORT, CHAT_PERSISTENCE_PORT],
})
export class ChatModule {}
