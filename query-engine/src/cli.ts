import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { parseArgs, UsageError, USAGE } from "./args";
import { loadEnv } from "./env";
import { describeError } from "./errors";
import { createResolverFromEnv } from "./factory";
import { createConsoleLogger } from "./logger";
import { toHtml, toJson } from "./render";

async function askQuery(): Promise<string> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Search query: ");
  rl.close();
  return ans.trim();
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const query = args.query || (await askQuery());
  if (!query) throw new UsageError(USAGE);

  const env = loadEnv();
  const resolver = createResolverFromEnv({ ...env, RESOLVE_MODE: args.mode ?? env.RESOLVE_MODE });
  const resolution = await resolver.resolve(query);

  console.log(args.format === "html" ? toHtml(resolution) : JSON.stringify(toJson(resolution), null, 2));
}

main().catch((e: unknown) => {
  createConsoleLogger("error").error(describeError(e));
  process.exit(1);
});
