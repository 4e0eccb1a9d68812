import { access } from "fs/promises";
import { resolveConfig } from "../config";
import { createLogger } from "../logging";
import { describeFailure, runBookstats } from "../pipeline";

const args = process.argv.slice(2);

if (args.includes("--help")) {
  process.stdout.write(
    "Usage: npm run analyze -- [--isbns file] [--db path] [--out file|-] [--export file] [--format text|json] [--offline]\n"
  );
  process.exit(0);
}

const config = resolveConfig(args, process.env);
const logger = createLogger("bookstats", config.logLevel);

try {
  await access(config.isbnFile);
} catch {
  process.stderr.write(`ISBN list not found: ${config.isbnFile}\n`);
  process.exit(1);
}

try {
  const summary = await runBookstats(config, { logger });
  logger.info(
    `Analysis complete. isbns=${summary.isbnCount} unique=${summary.uniqueCount} fetched=${summary.collect.fetched} cached=${summary.collect.cacheHits}`
  );
} catch (error) {
  process.stderr.write(`${describeFailure(error)}\n`);
  process.exit(1);
}
