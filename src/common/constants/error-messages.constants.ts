/**
 * User-facing error messages returned by the HTTP layer.
 */

export const BACKEND_ERROR_MESSAGE =
  'Something went wrong on our side. Please try again in a moment.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const NOT_FOUND_MESSAGE = 'The requested resource was not found.';

export const MODELS_UNAVAILABLE_MESSAGE =
  'No language model is able to answer right now. Please try again later.';

export const DEADLINE_EXCEEDED_MESSAGE =
  'The model did not answer in time. Please try again with a shorter question.';

export const INVALID_MODEL_REQUEST_MESSAGE =
  'The model rejected this request. Please rephrase your message.';
