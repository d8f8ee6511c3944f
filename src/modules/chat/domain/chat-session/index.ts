export {
  buildMessagePreview,
  buildSessionTitle,
  DEFAULT_SESSION_TITLE,
  LAST_MESSAGE_PREVIEW_CHARS,
  SESSION_TITLE_MAX_CHARS,
} from './chat-session';
