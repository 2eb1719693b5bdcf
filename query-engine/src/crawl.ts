import type { AxiosInstance } from "axios";
import { FETCH_TIMEOUT_MS, RETRY_DELAY_MS } from "./constants";
import { FetchFailure, describeError } from "./errors";
import { isTimeout } from "./http";
import { sleep } from "./utils";

export type FetchOptions = {
  timeoutMs?: number;
  /** Extra attempts after the first; 0 means a single attempt. */
  retries?: number;
  retryDelayMs?: number;
};

export type PageResult =
  | { ok: true; url: string; status: number; body: string }
  | { ok: false; url: string; failure: FetchFailure };

async function fetchOnce(http: AxiosInstance, url: string, timeoutMs: number): Promise<PageResult> {
  try {
    const res = await http.get<unknown>(url, {
      responseType: "text",
      timeout: timeoutMs,
      signal: AbortSignal.timeout(timeoutMs),
      validateStatus: () => true,
    });

    if (res.status < 200 || res.status >= 300) {
      const failure = new FetchFailure(url, "status", `HTTP ${res.status}`, { status: res.status });
      return { ok: false, url, failure };
    }
    if (typeof res.data !== "string") {
      return { ok: false, url, failure: new FetchFailure(url, "body", "response body is not text") };
    }
    return { ok: true, url, status: res.status, body: res.data };
  } catch (err) {
    const failure = isTimeout(err)
      ? new FetchFailure(url, "timeout", `timed out after ${timeoutMs}ms`, { cause: err })
      : new FetchFailure(url, "transport", describeError(err), { cause: err });
    return { ok: false, url, failure };
  }
}

function isRetryable(failure: FetchFailure): boolean {
  if (failure.reason === "timeout" || failure.reason === "transport") return true;
  return failure.reason === "status" && (failure.status ?? 0) >= 500;
}

/** Fetches one page; network conditions come back as a `FetchFailure`, never as a rejection. */
export async function fetchPage(http: AxiosInstance, url: string, options: FetchOptions = {}): Promise<PageResult> {
  const { timeoutMs = FETCH_TIMEOUT_MS, retries = 0, retryDelayMs = RETRY_DELAY_MS } = options;

  let result = await fetchOnce(http, url, timeoutMs);
  for (let attempt = 1; attempt <= retries && !result.ok && isRetryable(result.failure); attempt++) {
    await sleep(retryDelayMs * 2 ** (attempt - 1));
    result = await fetchOnce(http, url, timeoutMs);
  }
  return result;
}
