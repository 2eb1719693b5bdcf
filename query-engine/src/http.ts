import axios, { type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT, FETCH_TIMEOUT_MS } from "./constants";

export type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
};

// Some hosts reject axios' default identity, so every client looks like a browser.
export function createHttp({ userAgent = DEFAULT_USER_AGENT, timeoutMs = FETCH_TIMEOUT_MS }: HttpOptions = {}): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout: timeoutMs,
  });
}

export function statusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}

export function isTimeout(err: unknown): boolean {
  if (!axios.isAxiosError(err)) return false;
  return err.code === "ECONNABORTED" || err.code === "ETIMEDOUT" || err.code === "ERR_CANCELED";
}
