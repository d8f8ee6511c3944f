import type { ModelDescriptor } from '../../../domain/model-catalog';

const QUOTE_MAX_CHARS = 100;

/** Deterministic placeholder reply used when no Azure credentials are configured. */
export function buildMockReply(model: ModelDescriptor, userMessage: string): string {
  const quoted =
    userMessage.length > QUOTE_MAX_CHARS
      ? `${userMessage.slice(0, QUOTE_MAX_CHARS)}...`
      : userMessage;

  return [
    `[${model.displayName} mock reply]`,
    '',
    `You asked: "${quoted}"`,
    '',
    `This answer was generated locally because Azure OpenAI is not configured. ` +
      `Set AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY to route requests to the ${model.deploymentName} deployment.`,
  ].join('\n');
}

export function estimateTokenCount(text: string): number {
  return Math.floor(text.length / 4);
}
