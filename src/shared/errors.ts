/** A model call failed in a way that may succeed if tried again. */
export class ModelUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ModelUnavailableError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`
    );
    this.name = "RetryExhaustedError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
