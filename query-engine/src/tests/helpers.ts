import { AxiosError, type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { vi } from "vitest";
import { createHttp } from "../http";
import type { Logger } from "../logger";

export type Reply =
  | { status?: number; data?: unknown; delayMs?: number }
  | { error: "timeout" | "network"; delayMs?: number };

export type Route = (config: InternalAxiosRequestConfig) => Reply;

const wait = (ms: number) => new Promise((r) => setTimeout(r, ms));

/** An axios instance whose requests never leave the process. */
export function fakeHttp(route: Route, userAgent = "test-agent"): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = route(config);
    if (reply.delayMs) await wait(reply.delayMs);

    if ("error" in reply) {
      throw reply.error === "timeout"
        ? new AxiosError(`timeout of ${config.timeout}ms exceeded`, "ECONNABORTED", config)
        : new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED", config);
    }

    const status = reply.status ?? 200;
    const response = { data: reply.data ?? "", status, statusText: String(status), headers: {}, config, request: {} };
    if (config.validateStatus && !config.validateStatus(status)) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, {}, response);
    }
    return response;
  };

  const http = createHttp({ userAgent, timeoutMs: 1_000 });
  http.defaults.adapter = adapter;
  return { http, calls };
}

/** Routes by exact URL; anything unknown is a 404. */
export function pages(byUrl: Record<string, Reply>): Route {
  return (config) => byUrl[config.url ?? ""] ?? { status: 404, data: "not found" };
}

export function recordingLogger() {
  return {
    debug: vi.fn((_message: string) => {}),
    info: vi.fn((_message: string) => {}),
    warn: vi.fn((_message: string) => {}),
    error: vi.fn((_message: string) => {}),
  } satisfies Logger;
}
