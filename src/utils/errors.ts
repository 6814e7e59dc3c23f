export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    message: string,
    public readonly status?: number
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s): ${message}`);
    this.name = 'FetchError';
  }
}

export class InterruptedError extends Error {
  constructor(public readonly signal: string = 'SIGINT') {
    super(`Run interrupted by ${signal}`);
    this.name = 'InterruptedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new InterruptedError(typeof signal.reason === 'string' ? signal.reason : undefined);
  }
}
