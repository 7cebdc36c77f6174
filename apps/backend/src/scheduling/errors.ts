/**
 * Error taxonomy shared by the store, the scheduler and the routes.
 * Routes map each class to a status code in routes/helpers.ts.
 */

export class NotFoundError extends Error {
  public readonly id: string;

  constructor(id: string) {
    super(`Message with ID '${id}' not found`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export interface InvalidArgumentIssue {
  path: string;
  message: string;
}

export class InvalidArgumentError extends Error {
  public readonly issues: InvalidArgumentIssue[];

  constructor(message: string, issues: InvalidArgumentIssue[] = []) {
    super(message);
    this.name = "InvalidArgumentError";
    this.issues = issues;
  }
}

/** The key-value store could not be reached or rejected the command. Not retried. */
export class StoreUnavailableError extends Error {
  constructor(operation: string, cause: unknown) {
    super(
      `Store unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "StoreUnavailableError";
  }
}

/** A persisted value that does not decode to a ScheduledMessage. */
export class CorruptRecordError extends Error {
  public readonly id: string;

  constructor(id: string, reason: string) {
    super(`Stored message '${id}' is unreadable: ${reason}`);
    this.name = "CorruptRecordError";
    this.id = id;
  }
}

export class DeliveryFailedError extends Error {
  /** HTTP status when the endpoint answered; undefined for network errors and timeouts. */
  public readonly status?: number;

  constructor(url: string, reason: string, status?: number) {
    super(`Webhook ${url} failed: ${reason}`);
    this.name = "DeliveryFailedError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
