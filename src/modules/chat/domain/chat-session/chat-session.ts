export const DEFAULT_SESSION_TITLE = 'New Chat';
export const SESSION_TITLE_MAX_CHARS = 50;
export const LAST_MESSAGE_PREVIEW_CHARS = 100;

/** Title taken from the first message of a session. */
export function buildSessionTitle(firstMessage: string): string {
  const normalized = firstMessage.trim();
  if (normalized.length <= SESSION_TITLE_MAX_CHARS) {
    return normalized.length > 0 ? normalized : DEFAULT_SESSION_TITLE;
  }

  return `${normalized.slice(0, SESSION_TITLE_MAX_CHARS)}...`;
}

export function buildMessagePreview(content: string | null): string | null {
  if (content === null) {
    return null;
  }

  return content.slice(0, LAST_MESSAGE_PREVIEW_CHARS);
}
