import type { ResolveMode } from "./types";

export type OutputFormat = "json" | "html";

export type CliArgs = {
  query: string;
  format: OutputFormat;
  mode?: ResolveMode;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = 'Usage: query-engine [--format json|html] [--mode fact-seeking|summary-only] "<query>"';

export function parseArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  let format: OutputFormat = "json";
  let mode: ResolveMode | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--format") {
      const value = argv[++i]?.toLowerCase();
      if (value !== "json" && value !== "html") throw new UsageError(`--format expects json or html\n${USAGE}`);
      format = value;
    } else if (arg === "--mode") {
      const value = argv[++i];
      if (value !== "fact-seeking" && value !== "summary-only") {
        throw new UsageError(`--mode expects fact-seeking or summary-only\n${USAGE}`);
      }
      mode = value;
    } else {
      words.push(arg);
    }
  }

  return { query: words.join(" ").trim(), format, mode };
}
