export const MODEL_INVOCATION_PORT = Symbol('MODEL_INVOCATION_PORT');
export const CHAT_PERSISTENCE_PORT = Symbol('CHAT_PERSISTENCE_PORT');
export const CHAT_FEEDBACK_PORT = Symbol('CHAT_FEEDBACK_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
export const CHAT_SETTINGS = Symbol('CHAT_SETTINGS');
export const PG_POOL = Symbol('PG_POOL');
