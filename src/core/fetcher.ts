import { RetrySettings } from "../config/types";
import { Logger, MetricsRegistry } from "../observability";
import { FetchAbortedError, FetchError, PermanentError, TransientNetworkError, errorMessage } from "./errors";
import { defaultHttpFetch, getFetchDispatcher, HttpFetch, HttpResponse } from "./fetch";

export type RetryPolicy = RetrySettings;

export interface FetcherOptions {
  userAgent: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  ignoreHttpsErrors?: boolean;
  logger?: Logger;
  metrics?: MetricsRegistry;
  httpFetch?: HttpFetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface FetchRequestOptions {
  accept?: string;
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
}

export interface FetchSuccess {
  ok: true;
  body: Buffer;
  status: number;
  contentType?: string;
  finalUrl: string;
  attempts: number;
}

export interface FetchFailure {
  ok: false;
  error: FetchError;
  attempts: number;
}

export type FetchResult = FetchSuccess | FetchFailure;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Delay before the attempt following `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return exponential + Math.floor(random() * policy.jitterMs);
}

export class Fetcher {
  private readonly options: FetcherOptions;
  private readonly httpFetch: HttpFetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options: FetcherOptions) {
    this.options = options;
    this.httpFetch = options.httpFetch ?? defaultHttpFetch;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  async fetch(url: string, request: FetchRequestOptions = {}): Promise<FetchResult> {
    const { retryPolicy } = this.options;

    try {
      const parsed = new URL(url);
      if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        throw new Error(`unsupported protocol ${parsed.protocol}`);
      }
    } catch (error) {
      return {
        ok: false,
        error: new PermanentError(`malformed URL ${url}: ${errorMessage(error)}`, "malformed_url"),
        attempts: 0,
      };
    }

    let attempts = 0;
    let lastError: FetchError | undefined;

    while (attempts < retryPolicy.maxAttempts) {
      if (request.signal?.aborted) {
        return { ok: false, error: new FetchAbortedError(`aborted before attempt ${attempts + 1}: ${url}`), attempts };
      }

      attempts += 1;
      request.onAttempt?.(attempts);

      let failure: TransientNetworkError | PermanentError;
      try {
        return { ...(await this.attempt(url, request.accept)), attempts };
      } catch (error) {
        if (!(error instanceof TransientNetworkError || error instanceof PermanentError)) {
          throw error;
        }
        failure = error;
      }
      lastError = failure;

      if (failure instanceof PermanentError) {
        this.options.logger?.warn("fetch_permanent_failure", { url, attempt: attempts, error: failure.message });
        return { ok: false, error: failure, attempts };
      }

      if (attempts >= retryPolicy.maxAttempts) {
        break;
      }

      const delayMs = backoffDelay(retryPolicy, attempts, this.random);
      this.options.logger?.warn("fetch_retry_scheduled", {
        url,
        attempt: attempts,
        delayMs,
        reason: failure.reason,
        error: failure.message,
      });
      this.options.metrics?.incrementCounter("fetch_retries", 1);
      await this.sleep(delayMs, request.signal);
    }

    const exhausted = lastError ?? new TransientNetworkError(`no attempt made for ${url}`, "network");
    this.options.logger?.warn("fetch_retries_exhausted", { url, attempt: attempts, error: exhausted.message });
    return { ok: false, error: exhausted, attempts };
  }

  // Releases the connection instead of leaving an unread error page on it.
  private async discardBody(url: string, response: HttpResponse): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.options.logger?.debug("fetch_body_cancel_failed", { url, error: errorMessage(error) });
    }
  }

  private async attempt(url: string, accept = "*/*"): Promise<Omit<FetchSuccess, "attempts">> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    let response: HttpResponse;
    let body: Buffer;
    try {
      response = await this.httpFetch(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept,
          "accept-language": "en-US,en;q=0.9",
        },
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors ?? false),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        await this.discardBody(url, response);
        throw this.statusError(url, response.status);
      }

      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof TransientNetworkError || error instanceof PermanentError) {
        throw error;
      }
      if (timedOut) {
        throw new TransientNetworkError(`timed out after ${this.options.timeoutMs}ms: ${url}`, "timeout", undefined, {
          cause: error,
        });
      }
      throw new TransientNetworkError(`network error for ${url}: ${describeNetworkError(error)}`, "network", undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }

    return {
      ok: true,
      body,
      status: response.status,
      contentType: response.headers.get("content-type") ?? undefined,
      finalUrl: response.url || url,
    };
  }

  private statusError(url: string, status: number): FetchError {
    if (isRetriableStatus(status)) {
      return new TransientNetworkError(`HTTP ${status} while fetching ${url}`, "http_status", status);
    }
    return new PermanentError(`HTTP ${status} while fetching ${url}`, "http_status", status);
  }
}

// undici reports socket failures as `TypeError: fetch failed` with the real reason on `cause`.
function describeNetworkError(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    const code = "code" in error.cause && typeof error.cause.code === "string" ? `${error.cause.code} ` : "";
    return `${message} (${code}${error.cause.message})`;
  }
  return message;
}
