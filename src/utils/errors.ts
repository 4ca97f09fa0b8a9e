/**
 * Error taxonomy for provider access and configuration.
 *
 * Insufficient history is not an error: it surfaces as a `null` RV.
 */

/** Required setting absent. The only class that aborts a whole run. */
export class ConfigurationMissingError extends Error {
  readonly setting: string;

  constructor(setting: string) {
    super(`${setting} missing`);
    this.name = "ConfigurationMissingError";
    this.setting = setting;
  }
}

/** Transient provider failure: timeout, 5xx, network error or rate limit. */
export class ProviderUnavailableError extends Error {
  readonly status: number | null;
  readonly rateLimited: boolean;

  constructor(message: string, options: { status?: number | null; rateLimited?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderUnavailableError";
    this.status = options.status ?? null;
    this.rateLimited = options.rateLimited ?? false;
  }
}

/** Provider payload missing fields or with mismatched arrays. */
export class DataMalformedError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "DataMalformedError";
    this.source = source;
  }
}

export function isProviderUnavailable(err: unknown): err is ProviderUnavailableError {
  return err instanceof ProviderUnavailableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
