import { AppConfig, loadConfig, validateConfig } from "../config";
import { formatRunReport, runCrawl, runPipeline, runRetryFailed, runStatus, CommandContext } from "../core/commands";
import { ConfigError, HarvestError, errorMessage } from "../core/errors";
import { FileSystemStorage } from "../download";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createLedger } from "../store";

export type CommandName = "crawl" | "run" | "retry-failed" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  force: boolean;
  ignoreHttpsErrors: boolean;
  concurrency?: number;
  maxDocs?: number;
  configPath?: string;
  outputDir?: string;
}

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_INTERRUPTED = 130;

const HELP_TEXT = `
Usage:
  harvest <command> [options]

Commands:
  crawl          Discover document links and print them; downloads nothing
  run            Crawl the archive and download every document not yet in the ledger
  retry-failed   Download again the documents the ledger has as failed
  status         Summarize the ledger

Options:
  --config <path>        Optional path to JSON config file
  --output <dir>         Directory for downloaded documents
  --concurrency <n>      Maximum simultaneous downloads
  --max-docs <n>         Limit the number of documents considered by run
  --force                Download again even when the ledger has the document
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "run" || raw === "retry-failed" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function readIntOption(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    concurrency: readIntOption(argv, "--concurrency"),
    maxDocs: readIntOption(argv, "--max-docs"),
    configPath: readOption(argv, "--config"),
    outputDir: readOption(argv, "--output"),
  };
}

/** Flags win over the loaded config; the result is validated again. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  if (parsed.maxDocs !== undefined && parsed.maxDocs < 1) {
    throw new ConfigError(`--max-docs must be a positive integer, got ${parsed.maxDocs}`);
  }
  return validateConfig({
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    downloadConcurrency: parsed.concurrency ?? config.downloadConcurrency,
    outputDir: parsed.outputDir ?? config.outputDir,
  });
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }

  const runId = createRunId();
  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  } catch (error) {
    console.error(`config error: ${errorMessage(error)}`);
    return EXIT_FATAL;
  }

  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const metrics = new MetricsRegistry();
  const ledger = createLedger(config, logger.child("ledger"));
  const storage = new FileSystemStorage(config.outputDir);

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      logger.error("interrupt_forced_exit");
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn("interrupt_received", { hint: "finishing in-flight downloads; press Ctrl-C again to exit now" });
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  const context: CommandContext = { runId, config, ledger, storage, logger, metrics, signal: controller.signal };
  logger.info("command_start", {
    command: parsed.command,
    baseUrl: config.baseUrl,
    outputDir: config.outputDir,
    ledger: ledger.location,
    concurrency: config.downloadConcurrency,
    maxDocs: parsed.maxDocs,
    force: parsed.force,
  });

  try {
    switch (parsed.command) {
      case "crawl": {
        const crawl = await runCrawl({ ...context, logger: logger.child("crawl") });
        await ledger.load();
        for (const link of crawl.documents) {
          const status = ledger.get(link.url)?.status ?? "new";
          console.log(`${status}\t${link.url}`);
        }
        break;
      }
      case "run": {
        const report = await runPipeline(
          { ...context, logger: logger.child("pipeline") },
          { force: parsed.force, maxDocs: parsed.maxDocs },
        );
        console.log(formatRunReport(report));
        break;
      }
      case "retry-failed": {
        const report = await runRetryFailed({ ...context, logger: logger.child("retry") }, { force: parsed.force });
        console.log(formatRunReport(report));
        break;
      }
      case "status": {
        const status = await runStatus({ ...context, logger: logger.child("status") });
        console.log(`ledger: ${ledger.location}`);
        console.log(`entries: ${status.total} (completed ${status.completed}, failed ${status.failed})`);
        for (const url of status.failedUrls) {
          console.log(`failed\t${url}`);
        }
        break;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      errorCode: error instanceof HarvestError ? error.code : "unexpected",
      error: errorMessage(error),
    });
    return EXIT_FATAL;
  } finally {
    process.off("SIGINT", onInterrupt);
    await ledger.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
