import { Body, Controller, Get, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import type { FeedbackRecord, FeedbackStats } from '../application/ports/chat-feedback.port';
import { SubmitChatFeedbackUseCase } from '../application/use-cases/submit-chat-feedback/submit-chat-feedback.use-case';
import { ChatFeedbackRequestDto } from '../dto/chat-feedback-request.dto';
import { toHttpException } from './http-error.mapper';

@Controller('api/feedback')
export class FeedbackController {
  private readonly logger = createLogger(FeedbackController.name);

  constructor(private readonly submitChatFeedback: SubmitChatFeedbackUseCase) {}

  @Post()
  @HttpCode(201)
  @UseGuards(ThrottlerGuard)
  async submit(
    @Req() request: Request,
    @Body() payload: ChatFeedbackRequestDto,
  ): Promise<FeedbackRecord> {
    const requestId = request.requestId ?? randomUUID();

    try {
      return await this.submitChatFeedback.execute({
        requestId,
        sessionId: payload.sessionId,
        messageId: payload.messageId,
        rating: payload.rating,
        comment: payload.comment,
        wasHelpful: payload.wasHelpful,
      });
    } catch (error: unknown) {
      this.logger.warn('feedback_rejected', {
        event: 'feedback_rejected',
        request_id: requestId,
        session_id: payload.sessionId,
        message_id: payload.messageId ?? null,
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      throw toHttpException(error);
    }
  }

  @Get('stats')
  stats(): Promise<FeedbackStats> {
    return this.submitChatFeedback.getStats();
  }
}
