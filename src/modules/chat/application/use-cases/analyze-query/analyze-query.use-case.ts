import { Inject, Injectable } from '@nestjs/common';
import { scoreQuery, type MatchedSignal } from '../../../domain/complexity-scorer';
import { ModelSelector } from '../../../domain/model-selector';
import type { ChatSettings } from '../../chat-settings';
import { CHAT_SETTINGS } from '../../ports/tokens';

export interface AnalyzeQueryResult {
  query: string;
  recommendedModel: string;
  analysis: {
    score: number;
    length: number;
    capped: boolean;
    signals: MatchedSignal[];
    matchedThreshold: number | null;
  };
}

/** Scores a query and reports the model it would be routed to, without dispatching. */
@Injectable()
export class AnalyzeQueryUseCase {
  constructor(
    @Inject(CHAT_SETTINGS)
    private readonly settings: ChatSettings,
    private readonly selector: ModelSelector,
  ) {}

  execute(message: string): AnalyzeQueryResult {
    const analysis = scoreQuery(message, this.settings.scorer);
    const selection = this.selector.select(analysis.score);

    return {
      query: message,
      recommendedModel: selection.model.id,
      analysis: {
        score: analysis.score,
        length: analysis.length,
        capped: analysis.capped,
        signals: analysis.signals,
        matchedThreshold: selection.threshold ?? null,
      },
    };
  }
}
