/**
 * Raised by a wire connection once the remote side has gone away.
 * Ends a session normally.
 */
export class WireDisconnectedError extends Error {
  readonly code: number;
  readonly reason: string;

  constructor(code: number = 1000, reason: string = '') {
    super(`Wire disconnected (code=${code}${reason ? `, reason=${reason}` : ''})`);
    this.name = 'WireDisconnectedError';
    this.code = code;
    this.reason = reason;
  }
}

/**
 * Raised when an activity is cancelled through its AbortSignal
 */
export class AbortError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Matches our AbortError as well as the ones thrown by Node's timers/promises
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function isWireDisconnected(error: unknown): error is WireDisconnectedError {
  return error instanceof WireDisconnectedError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
