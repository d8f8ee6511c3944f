export { fetchWithTimeout } from './http-client';
export { loadPromptFile } from './prompt-loader';
