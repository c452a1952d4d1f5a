export type TimeoutPhase = 'connect' | 'read';

export class FetchTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly phase: TimeoutPhase,
    readonly timeoutMs: number,
  ) {
    super(`${phase === 'connect' ? 'Connect' : 'Read'} timeout after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

export class SearchRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SearchRequestError';
  }
}
