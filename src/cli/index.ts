import { parseBoundingBox } from "../catalog/geometry";
import { type AppConfig, type LinkProtocol, loadConfig, resolveCollection } from "../config";
import { type CommandContext, runAggregate, runHarvest, runPublish } from "../core/commands";
import { parseDay, parseYearMonth } from "../core/dates";
import { AggregationError, errorMessage, IncompleteLinksError, InvalidArgumentError } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStoreFactory } from "../storage";

export type CommandName = "harvest" | "aggregate" | "publish";

export interface ParsedCliArgs {
  command: CommandName;
  /** Positional arguments after the command name. */
  args: string[];
  configPath?: string;
  endDate?: string;
  bbox?: string;
  protocol: LinkProtocol;
  skipExisting: boolean;
  noSkipExisting: boolean;
  version?: string;
  requireCompleteLinks: boolean;
  dest?: string;
}

const HELP_TEXT = `
Usage:
  stac-archive <command> [options]

Commands:
  harvest <collection> <date> <dest>        Write daily link manifests
  aggregate <collection> <yyyy-mm> <dest>   Build the monthly GeoParquet artifact
  publish <collection> <start> <end>        Enqueue one harvest job per day

Options:
  --config <path>            Optional path to JSON config file
  --end-date <date>          Harvest every day up to and including this date
  --bbox <w,s,e,n>           Only keep granules intersecting this box
  --protocol <s3|https>      Which item link to record (harvest: https, publish: s3)
  --skip-existing            Skip days or months already written
  --no-skip-existing         publish: ask workers to rewrite existing manifests
  --version <v>              Output version prefix for aggregate
  --require-complete-links   Fail unless every day of the month has a manifest
  --dest <url>               publish: destination for the queued jobs
  -h, --help                 Show this help
`;

const VALUE_FLAGS = new Set(["--config", "--end-date", "--bbox", "--protocol", "--version", "--dest"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "harvest" || raw === "aggregate" || raw === "publish") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function positionals(argv: string[]): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      i += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      values.push(arg);
    }
  }
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const rest = argv.slice(1);
  const protocol = optionValue(rest, "--protocol") ?? defaultProtocol(command);
  if (protocol !== "s3" && protocol !== "https") {
    throw new InvalidArgumentError(`Invalid --protocol: ${protocol} (expected s3 or https)`);
  }

  return {
    command,
    args: positionals(rest),
    configPath: optionValue(rest, "--config"),
    endDate: optionValue(rest, "--end-date"),
    bbox: optionValue(rest, "--bbox"),
    protocol,
    skipExisting: rest.includes("--skip-existing"),
    noSkipExisting: rest.includes("--no-skip-existing"),
    version: optionValue(rest, "--version"),
    requireCompleteLinks: rest.includes("--require-complete-links"),
    dest: optionValue(rest, "--dest"),
  };
}

function defaultProtocol(command: CommandName): LinkProtocol {
  return command === "publish" ? "s3" : "https";
}

function requireArgs(parsed: ParsedCliArgs, names: string[]): string[] {
  if (parsed.args.length < names.length) {
    throw new InvalidArgumentError(`${parsed.command} needs ${names.map((name) => `<${name}>`).join(" ")}`);
  }
  return parsed.args.slice(0, names.length);
}

async function dispatch(parsed: ParsedCliArgs, config: AppConfig, context: CommandContext): Promise<number> {
  const { logger } = context;
  const boundingBox = parsed.bbox ? parseBoundingBox(parsed.bbox) : undefined;

  switch (parsed.command) {
    case "harvest": {
      const [collection, date, destination] = requireArgs(parsed, ["collection", "date", "dest"]);
      const results = await runHarvest(context, {
        collection: resolveCollection(config, collection),
        startDate: parseDay(date),
        endDate: parsed.endDate ? parseDay(parsed.endDate) : undefined,
        destination,
        boundingBox,
        protocol: parsed.protocol,
        skipExisting: parsed.skipExisting,
      });
      return results.some((result) => result.status === "failed") ? 1 : 0;
    }
    case "aggregate": {
      const [collection, month, destination] = requireArgs(parsed, ["collection", "yyyy-mm", "dest"]);
      try {
        const result = await runAggregate(context, {
          collection: resolveCollection(config, collection),
          yearMonth: parseYearMonth(month),
          destination,
          version: parsed.version,
          requireCompleteLinks: parsed.requireCompleteLinks,
          skipExisting: parsed.skipExisting,
        });
        logger.info("aggregate_result", {
          outputPath: result.outputPath,
          skipped: result.skipped,
          itemCount: result.itemCount,
          failureCount: result.failureCount,
          missingDays: result.missingDays,
        });
        return 0;
      } catch (error) {
        if (error instanceof IncompleteLinksError) {
          logger.error("aggregate_incomplete_links", { missingDays: error.missingDays });
          return 1;
        }
        if (error instanceof AggregationError) {
          logger.error("aggregate_failed", { kind: error.kind, error: error.message, ...error.details });
          return 1;
        }
        throw error;
      }
    }
    case "publish": {
      const [collection, start, end] = requireArgs(parsed, ["collection", "start", "end"]);
      await runPublish(context, {
        collection: resolveCollection(config, collection),
        startDate: parseDay(start),
        endDate: parseDay(end),
        destination: parsed.dest,
        boundingBox,
        protocol: parsed.protocol,
        skipExisting: !parsed.noSkipExisting,
      });
      return 0;
    }
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    return 1;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const command = parsed.command;
  const controller = new AbortController();
  const onSignal = () => {
    logger.warn("command_interrupted", { command });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("command_start", {
    command: parsed.command,
    args: parsed.args,
    protocol: parsed.protocol,
    skipExisting: parsed.skipExisting,
  });

  try {
    const exitCode = await dispatch(parsed, config, {
      runId,
      config,
      logger: logger.child(parsed.command),
      metrics,
      openStore: createStoreFactory(config),
      signal: controller.signal,
    });
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      logger.error("command_invalid_arguments", { command: parsed.command, error: error.message });
      return 1;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
