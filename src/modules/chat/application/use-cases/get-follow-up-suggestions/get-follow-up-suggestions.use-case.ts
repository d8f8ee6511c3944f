import { Inject, Injectable } from '@nestjs/common';
import type { FollowUpSuggestion } from '../../../domain/suggestions';
import type { ChatPersistencePort } from '../../ports/chat-persistence.port';
import { CHAT_PERSISTENCE_PORT } from '../../ports/tokens';

@Injectable()
export class GetFollowUpSuggestionsUseCase {
  constructor(
    @Inject(CHAT_PERSISTENCE_PORT)
    private readonly persistence: ChatPersistencePort,
  ) {}

  async execute(messageId: string): Promise<{ messageId: string; suggestions: FollowUpSuggestion[] }> {
    const suggestions = await this.persistence.getSuggestions(messageId);
    return { messageId, suggestions };
  }
}
