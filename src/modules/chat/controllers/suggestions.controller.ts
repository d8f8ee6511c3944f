import { Controller, Get, Param, ParseUUIDPipe } from '@nestjs/common';
import { GetFollowUpSuggestionsUseCase } from '../application/use-cases/get-follow-up-suggestions/get-follow-up-suggestions.use-case';
import type { FollowUpSuggestion } from '../domain/suggestions';

@Controller('api/messages')
export class SuggestionsController {
  constructor(private readonly getSuggestions: GetFollowUpSuggestionsUseCase) {}

  @Get(':messageId/suggestions')
  list(
    @Param('messageId', ParseUUIDPipe) messageId: string,
  ): Promise<{ messageId: string; suggestions: FollowUpSuggestion[] }> {
    return this.getSuggestions.execute(messageId);
  }
}
