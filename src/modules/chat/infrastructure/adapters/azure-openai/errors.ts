export class AzureOpenAiHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly errorCode: string | null = null,
  ) {
    super(`Azure OpenAI HTTP ${status}${errorCode ? ` (${errorCode})` : ''}`);
    this.name = 'AzureOpenAiHttpError';
  }
}

export class AzureOpenAiEmptyOutputError extends Error {
  constructor() {
    super('Azure OpenAI response missing message content');
    this.name = 'AzureOpenAiEmptyOutputError';
  }
}

export class AzureOpenAiContentFilterError extends Error {
  constructor() {
    super('Azure OpenAI completion was blocked by the content filter');
    this.name = 'AzureOpenAiContentFilterError';
  }
}
