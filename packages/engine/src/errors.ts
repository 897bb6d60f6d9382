/**
 * Error classes for UCI engine operations
 */

/**
 * Base error class for engine client errors
 */
export class EngineClientError extends Error {
  constructor(
    message: string,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'EngineClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineClientError);
    }
  }
}

/**
 * Error thrown when the engine binary cannot be started or fails the handshake
 */
export class EngineStartError extends EngineClientError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to start engine '${enginePath}'${cause ? `: ${cause.message}` : ''}`,
      cause?.message,
    );
    this.name = 'EngineStartError';
  }
}

/**
 * Error thrown when an engine request does not complete in time
 */
export class EngineTimeoutError extends EngineClientError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error thrown when a request reaches an engine that has exited or been closed
 */
export class EngineClosedError extends EngineClientError {
  constructor(reason?: string) {
    super(`Engine is not running${reason ? `: ${reason}` : ''}`);
    this.name = 'EngineClosedError';
  }
}

/**
 * Error thrown for requests the engine cannot accept
 */
export class EngineProtocolError extends EngineClientError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineProtocolError';
  }
}
