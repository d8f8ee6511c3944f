import { Controller, Get, Inject, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '../../common/utils/logger';
import type { ChatPersistencePort } from '../chat/application/ports/chat-persistence.port';
import type { ModelInvocationPort } from '../chat/application/ports/model-invocation.port';
import { CHAT_PERSISTENCE_PORT, MODEL_INVOCATION_PORT } from '../chat/application/ports/tokens';
import { ModelCatalog } from '../chat/domain/model-catalog';

export interface HealthDetails {
  status: 'ok' | 'degraded';
  timestamp: string;
  components: {
    database: 'connected' | 'unreachable';
    modelProvider: 'connected' | 'mock_mode';
    models: Array<{ id: string; available: boolean }>;
  };
}

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  constructor(
    private readonly catalog: ModelCatalog,
    @Inject(MODEL_INVOCATION_PORT)
    private readonly invocation: ModelInvocationPort,
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
  ) {}

  @Get()
  check(@Req() req: Request): { status: 'ok'; timestamp: string } {
    this.logger.debug('health_check_request', {
      event: 'health_check_request',
      request_origin: req.headers.origin ?? null,
      host: req.headers.host ?? null,
    });

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  @Get('details')
  async details(): Promise<HealthDetails> {
    const databaseReachable = await this.pingDatabase();
    const models = this.catalog.list().map((model) => ({ id: model.id, available: model.available }));

    return {
      status: databaseReachable && models.some((model) => model.available) ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      components: {
        database: databaseReachable ? 'connected' : 'unreachable',
        modelProvider: this.invocation.isMockMode() ? 'mock_mode' : 'connected',
        models,
      },
    };
  }

  private async pingDatabase(): Promise<boolean> {
    try {
      return await this.persistence.checkHealth();
    } catch (error: unknown) {
      this.logger.warn('health_database_unreachable', {
        event: 'health_database_unreachable',
        error_message: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
