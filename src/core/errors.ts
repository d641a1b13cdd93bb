export type HarvestErrorCode =
  | "transient_network"
  | "permanent"
  | "aborted"
  | "parse"
  | "persistence"
  | "root_unreachable"
  | "config";

export abstract class HarvestError extends Error {
  abstract readonly code: HarvestErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransientReason = "timeout" | "network" | "http_status";
export type PermanentReason = "http_status" | "malformed_url" | "malformed_content";

/** Failure worth another attempt: timeouts, resets, 5xx and rate limiting. */
export class TransientNetworkError extends HarvestError {
  readonly code = "transient_network";

  constructor(
    message: string,
    readonly reason: TransientReason,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PermanentError extends HarvestError {
  readonly code = "permanent";

  constructor(
    message: string,
    readonly reason: PermanentReason,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export class FetchAbortedError extends HarvestError {
  readonly code = "aborted";
}

export type FetchError = TransientNetworkError | PermanentError | FetchAbortedError;

export class ParseError extends HarvestError {
  readonly code = "parse";

  constructor(
    message: string,
    readonly pageUrl: string,
  ) {
    super(message);
  }
}

/** The durability contract can no longer be kept; the run must stop. */
export class PersistenceError extends HarvestError {
  readonly code = "persistence";
}

export class RootUnreachableError extends HarvestError {
  readonly code = "root_unreachable";

  constructor(
    readonly rootUrl: string,
    readonly reason: FetchError,
  ) {
    super(`archive root unreachable: ${rootUrl} (${reason.message})`, { cause: reason });
  }
}

export class ConfigError extends HarvestError {
  readonly code = "config";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
