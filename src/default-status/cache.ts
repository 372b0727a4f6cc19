import { DefaultStatusError, toError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import type { DefaultBrowserStatusProvider } from "../types/collaborators";

export interface DefaultBrowserInfo {
  isDefaultBrowser: boolean;
  /** Null until the provider has answered at least once. */
  lastSuccessfulCheckDate: Date | null;
  lastAttemptedCheckDate: Date | null;
  numberOfTimesChecked: number;
}

export interface DefaultStatusCacheOptions {
  provider: DefaultBrowserStatusProvider;
  /**
   * Value reported before the first successful query. Defaults to `true` so an
   * unknown status never leads to a prompt.
   */
  initialStatus?: boolean;
  /** Minimum time between opportunistic refreshes. Defaults to 0. */
  minRefreshIntervalMs?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Last known answer to "is this app the OS default browser?".
 *
 * Reads never wait for the OS. A failed query keeps whatever was known before.
 */
export class DefaultStatusCache {
  private readonly provider: DefaultBrowserStatusProvider;
  private readonly minRefreshIntervalMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private current: DefaultBrowserInfo;
  private inFlight: Promise<Result<boolean, DefaultStatusError>> | null = null;

  constructor(options: DefaultStatusCacheOptions) {
    this.provider = options.provider;
    this.minRefreshIntervalMs = Math.max(0, options.minRefreshIntervalMs ?? 0);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("default-status");
    this.current = {
      isDefaultBrowser: options.initialStatus ?? true,
      lastSuccessfulCheckDate: null,
      lastAttemptedCheckDate: null,
      numberOfTimesChecked: 0,
    };
  }

  isDefaultBrowser(): boolean {
    if (this.isRefreshDue()) {
      void this.refresh();
    }

    return this.current.isDefaultBrowser;
  }

  info(): DefaultBrowserInfo {
    return { ...this.current };
  }

  /** Queries the provider now. Concurrent callers share one query. */
  refresh(): Promise<Result<boolean, DefaultStatusError>> {
    if (this.inFlight !== null) {
      return this.inFlight;
    }

    const query = this.executeRefresh();
    this.inFlight = query;
    return query.finally(() => {
      if (this.inFlight === query) {
        this.inFlight = null;
      }
    });
  }

  private isRefreshDue(): boolean {
    if (this.inFlight !== null) {
      return false;
    }

    const lastAttempt = this.current.lastAttemptedCheckDate;
    if (lastAttempt === null) {
      return true;
    }

    return this.now().getTime() - lastAttempt.getTime() >= this.minRefreshIntervalMs;
  }

  private async executeRefresh(): Promise<Result<boolean, DefaultStatusError>> {
    const attemptedAt = this.now();
    this.current = { ...this.current, lastAttemptedCheckDate: attemptedAt };

    try {
      const isDefault = await this.provider.isDefault();
      const changed = isDefault !== this.current.isDefaultBrowser;
      this.current = {
        isDefaultBrowser: isDefault,
        lastSuccessfulCheckDate: attemptedAt,
        lastAttemptedCheckDate: attemptedAt,
        numberOfTimesChecked: this.current.numberOfTimesChecked + 1,
      };

      if (changed) {
        this.logger.info("Default browser status changed", { isDefaultBrowser: isDefault });
      }

      return ok(isDefault);
    } catch (cause) {
      const error = new DefaultStatusError("Default browser status query failed", toError(cause));
      this.logger.warn("Keeping last known default browser status", {
        isDefaultBrowser: this.current.isDefaultBrowser,
        error: error.cause,
      });
      return err(error);
    }
  }
}
