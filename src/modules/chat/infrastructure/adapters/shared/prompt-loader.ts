import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Reads a prompt file relative to `process.cwd()`.
 * Falls back to `defaultContent` when the file is missing or blank.
 */
export function loadPromptFile(relativePath: string, defaultContent: string): string {
  const promptPath = resolve(process.cwd(), relativePath);

  try {
    const value = readFileSync(promptPath, 'utf8').trim();
    return value.length > 0 ? value : defaultContent;
  } catch {
    return defaultContent;
  }
}
