export class ResolverError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Pre-flight failed: the job never starts.
export class PreflightError extends ResolverError {}

// The output table could not be written. The checkpoint is kept so the job can be retried.
export class OutputWriteError extends ResolverError {}

export class RetriableCapabilityError extends ResolverError {
  // Caps the retry budget for this error regardless of the policy.
  readonly retryLimit: number | undefined;

  constructor(message: string, options?: { cause?: unknown; retryLimit?: number }) {
    super(message, options);
    this.retryLimit = options?.retryLimit;
  }
}

export class RateLimitedError extends RetriableCapabilityError {}

export class ServiceUnavailableError extends RetriableCapabilityError {}

export class MalformedResponseError extends RetriableCapabilityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { ...options, retryLimit: 1 });
  }
}

export class NonRetriableCapabilityError extends ResolverError {}

export class QuotaExceededError extends NonRetriableCapabilityError {}

// Thrown by the resolver for a single row; carries what the row already cost.
export class RowProcessingError extends ResolverError {
  readonly cost: number;
  readonly evidence: string;

  constructor(message: string, details: { cost: number; evidence: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.cost = details.cost;
    this.evidence = details.evidence;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// HTTP failures from the concrete clients.
export function classifyHttpFailure(service: string, status: number, body: string): ResolverError {
  const detail = `${service} ${status}: ${body.slice(0, 300)}`;
  if (status === 429) {
    return /quota|billing|exhausted/i.test(body) ? new QuotaExceededError(detail) : new RateLimitedError(detail);
  }
  if (status === 408 || status >= 500) return new ServiceUnavailableError(detail);
  return new NonRetriableCapabilityError(detail);
}
