export const AZURE_CHAT_COMPLETIONS_PATH = '/openai/deployments/{deployment}/chat/completions';

export function azureChatCompletionsUrl(input: {
  endpoint: string;
  deployment: string;
  apiVersion: string;
}): string {
  const base = input.endpoint.replace(/\/+$/, '');
  const path = AZURE_CHAT_COMPLETIONS_PATH.replace(
    '{deployment}',
    encodeURIComponent(input.deployment),
  );
  return `${base}${path}?api-version=${encodeURIComponent(input.apiVersion)}`;
}
