import type { SearchSource } from "./types";

export type ProviderName = SearchSource | "wikipedia";

/** A search or encyclopedia provider could not be reached or answered garbage. */
export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;

  constructor(provider: ProviderName, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider}: ${message}`, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options.status;
  }
}

export type FetchFailureReason = "timeout" | "status" | "transport" | "body";

export class FetchFailure extends Error {
  readonly url: string;
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor(url: string, reason: FetchFailureReason, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchFailure";
    this.url = url;
    this.reason = reason;
    this.status = options.status;
  }
}

export class InvalidQueryError extends Error {
  constructor(message = "query must be a non-empty string") {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
