import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import morgan from "morgan";
import pLimit from "p-limit";
import { z } from "zod";
import { describeError, silentLogger, toHtml, toJson, type Logger, type Resolver } from "query-engine";

export const MAX_BATCH = 20;

const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  format: z.enum(["json", "html"]).default("json"),
});

const SearchBodySchema = z.object({
  queries: z.array(z.string().trim().min(1, "queries must be non-empty strings")).min(1).max(MAX_BATCH),
});

export type AppOptions = {
  batchConcurrency?: number;
  logger?: Logger;
  /** morgan access log; off in tests. */
  accessLog?: boolean;
};

export function createApp(resolver: Resolver, { batchConcurrency = 5, logger = silentLogger, accessLog = true }: AppOptions = {}): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (accessLog) app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "search-api" });
  });

  app.get("/search", async (req, res, next) => {
    const parsed = SearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }

    try {
      const resolution = await resolver.resolve(parsed.data.q);
      if (parsed.data.format === "html") return res.type("html").send(toHtml(resolution));
      return res.json(toJson(resolution));
    } catch (err) {
      return next(err);
    }
  });

  // Each query resolves independently; results come back in request order.
  app.post("/search", async (req, res, next) => {
    const parsed = SearchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }

    const limit = pLimit(batchConcurrency);
    try {
      const resolutions = await Promise.all(parsed.data.queries.map((q) => limit(() => resolver.resolve(q))));
      return res.json(resolutions.map(toJson));
    } catch (err) {
      return next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  // body-parser errors carry their own 4xx status
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 500) logger.error(`request failed: ${describeError(err)}`);
    res.status(status).json({ ok: false, error: describeError(err) || "resolve failed" });
  };
  app.use(onError);

  return app;
}
