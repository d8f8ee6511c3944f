import { Body, Controller, HttpCode, Post, Query, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import {
  AnalyzeQueryUseCase,
  type AnalyzeQueryResult,
} from '../application/use-cases/analyze-query/analyze-query.use-case';
import {
  OrchestrateChatUseCase,
  type ChatTurnResult,
} from '../application/use-cases/orchestrate-chat/orchestrate-chat.use-case';
import { AnalyzeQueryDto } from '../dto/analyze-query.dto';
import { ChatRequestDto } from '../dto/chat-request.dto';
import { toHttpException } from './http-error.mapper';

@Controller('api')
export class ChatController {
  private readonly logger = createLogger(ChatController.name);

  constructor(
    private readonly orchestrateChat: OrchestrateChatUseCase,
    private readonly analyzeQuery: AnalyzeQueryUseCase,
  ) {}

  @Post('chat')
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  async chat(@Req() request: Request, @Body() payload: ChatRequestDto): Promise<ChatTurnResult> {
    const requestId = request.requestId ?? randomUUID();

    this.logger.http('chat_request_received', {
      event: 'chat_request_received',
      request_id: requestId,
      session_id: payload.sessionId ?? null,
      requested_model: payload.model ?? null,
      message_length: payload.message.length,
    });

    try {
      return await this.orchestrateChat.execute({
        requestId,
        message: payload.message,
        sessionId: payload.sessionId,
        model: payload.model,
      });
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }

  @Post('analyze')
  @HttpCode(200)
  analyze(@Query() query: AnalyzeQueryDto): AnalyzeQueryResult {
    return this.analyzeQuery.execute(query.message);
  }
}
