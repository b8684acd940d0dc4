/**
 * Error kinds raised across the service. One class, discriminated by `kind`,
 * so callers can branch on the category without instanceof chains.
 */
export type AppErrorKind =
  | 'InitializationError'
  | 'DatabaseError'
  | 'ConfigError'
  | 'DecodeError'
  | 'InvalidPrice'
  | 'WebSocketConnectionError'
  | 'WebSocketTimeout'
  | 'WebSocketSendError'
  | 'WebSocketReceiveError'
  | 'WebSocketStateError'
  | 'RedisError'
  | 'JsonParseError'
  | 'RequestError'
  | 'ServerError'
  | 'MessageProcessingError'
  | 'Generic';

const ERROR_LABELS: Record<AppErrorKind, string> = {
  InitializationError: 'Initialization error',
  DatabaseError: 'Database error',
  ConfigError: 'Configuration error',
  DecodeError: 'Decode error',
  InvalidPrice: 'Invalid price',
  WebSocketConnectionError: 'WebSocket connection error',
  WebSocketTimeout: 'WebSocket timeout',
  WebSocketSendError: 'WebSocket send error',
  WebSocketReceiveError: 'WebSocket receive error',
  WebSocketStateError: 'WebSocket state error',
  RedisError: 'Redis error',
  JsonParseError: 'JSON parse error',
  RequestError: 'Request error',
  ServerError: 'Server error',
  MessageProcessingError: 'Message processing error',
  Generic: 'Error',
};

export class AppError extends Error {
  readonly kind: AppErrorKind;
  readonly detail: string;

  constructor(kind: AppErrorKind, detail: string, options?: { cause?: unknown }) {
    super(`${ERROR_LABELS[kind]}: ${detail}`, options);
    this.name = 'AppError';
    this.kind = kind;
    this.detail = detail;
  }

  /**
   * Wrap a foreign error. AppErrors pass through untouched.
   */
  static from(error: unknown, kind: AppErrorKind = 'Generic'): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return new AppError(kind, errorMessage(error), { cause: error });
  }
}

export function isAppError(error: unknown, kind?: AppErrorKind): error is AppError {
  return error instanceof AppError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
