export class StatsApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transport or protocol failure: network errors after retries, unexpected HTTP status codes
 * and undecodable responses. The original error is available as `cause`.
 */
export class HTTPException extends StatsApiError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class Unauthorized extends StatsApiError {
  constructor(message = "Developer ID or authorization key rejected.") {
    super(message);
  }
}

export class Unavailable extends StatsApiError {
  constructor(message = "The stats API is unavailable, most likely due to maintenance.") {
    super(message);
  }
}

export class LimitReached extends StatsApiError {
  constructor(message = "Daily request limit reached.") {
    super(message);
  }
}

export class NotFound extends StatsApiError {
  constructor(readonly subject: string) {
    super(`${subject} not found`);
  }
}

export class Private extends StatsApiError {
  constructor(message = "This player profile is private.") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
