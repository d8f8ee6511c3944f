export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export type FeedbackTargetFailure = 'session_not_found' | 'message_not_in_session';

/**
 * Feedback references a session or message that does not exist,
 * or a message that belongs to another session.
 */
export class FeedbackTargetError extends Error {
  constructor(public readonly failure: FeedbackTargetFailure) {
    super(
      failure === 'session_not_found'
        ? 'Feedback session does not exist'
        : 'Feedback message does not belong to the session',
    );
    this.name = 'FeedbackTargetError';
  }
}
