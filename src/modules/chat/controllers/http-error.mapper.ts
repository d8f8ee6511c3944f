import {
  BadRequestException,
  GatewayTimeoutException,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  DEADLINE_EXCEEDED_MESSAGE,
  INVALID_MODEL_REQUEST_MESSAGE,
  MODELS_UNAVAILABLE_MESSAGE,
} from '../../../common/constants/error-messages.constants';
import {
  AllModelsExhaustedError,
  DispatchDeadlineExceededError,
  FeedbackTargetError,
  InvalidModelRequestError,
  InvalidOverrideError,
  SessionNotFoundError,
} from '../domain/errors';

/**
 * Converts chat domain errors into Nest HTTP exceptions.
 * Anything unrecognized is returned as-is for the global filter.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof InvalidOverrideError) {
    return new BadRequestException({
      message: error.message,
      code: error.reason === 'unknown_model' ? 'UNKNOWN_MODEL' : 'MODEL_UNAVAILABLE',
    });
  }

  if (error instanceof InvalidModelRequestError) {
    return new UnprocessableEntityException({
      message: INVALID_MODEL_REQUEST_MESSAGE,
      code: 'INVALID_MODEL_REQUEST',
    });
  }

  if (error instanceof AllModelsExhaustedError) {
    return new ServiceUnavailableException({
      message: MODELS_UNAVAILABLE_MESSAGE,
      code: 'ALL_MODELS_EXHAUSTED',
    });
  }

  if (error instanceof DispatchDeadlineExceededError) {
    return new GatewayTimeoutException({
      message: DEADLINE_EXCEEDED_MESSAGE,
      code: 'DEADLINE_EXCEEDED',
    });
  }

  if (error instanceof SessionNotFoundError) {
    return new NotFoundException({ message: 'Session not found', code: 'SESSION_NOT_FOUND' });
  }

  if (error instanceof FeedbackTargetError) {
    return new BadRequestException({
      message: error.message,
      code: error.failure === 'session_not_found' ? 'SESSION_NOT_FOUND' : 'MESSAGE_NOT_IN_SESSION',
    });
  }

  return error;
}
