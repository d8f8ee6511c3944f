import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import type { FeedbackRecord } from '../application/ports/chat-feedback.port';
import type { ChatSessionRecord } from '../application/ports/chat-persistence.port';
import {
  ManageSessionsUseCase,
  type SessionDetail,
} from '../application/use-cases/manage-sessions/manage-sessions.use-case';
import { SubmitChatFeedbackUseCase } from '../application/use-cases/submit-chat-feedback/submit-chat-feedback.use-case';
import {
  CreateSessionDto,
  ListSessionsQueryDto,
  RenameSessionQueryDto,
} from '../dto/session-request.dto';
import { toHttpException } from './http-error.mapper';

@Controller('api/sessions')
export class SessionsController {
  constructor(
    private readonly sessions: ManageSessionsUseCase,
    private readonly feedback: SubmitChatFeedbackUseCase,
  ) {}

  @Post()
  @HttpCode(201)
  create(@Body() payload: CreateSessionDto): Promise<ChatSessionRecord> {
    return this.sessions.create(payload);
  }

  @Get()
  list(@Query() query: ListSessionsQueryDto): Promise<ChatSessionRecord[]> {
    return this.sessions.list({ limit: query.limit, offset: query.offset });
  }

  @Get(':sessionId')
  async get(@Param('sessionId', ParseUUIDPipe) sessionId: string): Promise<SessionDetail> {
    try {
      return await this.sessions.get(sessionId);
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }

  @Patch(':sessionId')
  async rename(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @Query() query: RenameSessionQueryDto,
  ): Promise<ChatSessionRecord> {
    try {
      return await this.sessions.rename(sessionId, query.title);
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }

  @Delete(':sessionId')
  async delete(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
  ): Promise<{ deleted: true; sessionId: string }> {
    try {
      return await this.sessions.delete(sessionId);
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }

  @Get(':sessionId/feedback')
  async listFeedback(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
  ): Promise<FeedbackRecord[]> {
    try {
      return await this.feedback.getSessionFeedback(sessionId);
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }
}
