import { AppConfig, ListingStrategy, loadConfig, loadCredentials, PdfLinkMode, RedirectMode } from "../config";
import { runHarvest, runList, runStatus } from "../core/commands";
import { createRunId, FileLogWriter, Logger, LogWriter, ConsoleLogWriter, MetricsRegistry } from "../observability";
import { HttpSession } from "../session";
import { createLedger } from "../store";

export type CommandName = "run" | "list" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  testMode: boolean;
  ignoreHttpsErrors: boolean;
  strategy?: ListingStrategy;
  redirectMode?: RedirectMode;
  pdfLinkMode?: PdfLinkMode;
  maxPages?: number;
  page: number;
  outputDir?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  tctmd-slides <command> [options]

Commands:
  run       Log in, walk every slide search page and download each PDF
  list      Log in and print the presentations of one search page
  status    Print how many downloads the ledger holds

Options:
  --config <path>          Optional path to JSON config file
  --test-mode              Stop after two successful downloads
  --strategy <html|api>    How search pages are listed (default html)
  --redirect-mode <strict|simple>
                           How the sign-on redirect is followed (default strict)
  --pdf-links <tracked|any>
                           Require the tracking attribute on PDF links (default tracked)
  --max-pages <n>          Stop after n search pages
  --page <n>               Page listed by the list command (default 1)
  --output <dir>           Directory PDFs are written to
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help

Credentials are read from TCTMD_USERNAME and TCTMD_PASSWORD.
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "list" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function choiceOption<T extends string>(argv: string[], flag: string, choices: readonly T[]): T | undefined {
  const raw = optionValue(argv, flag);
  return choices.find((choice) => choice === raw);
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
    testMode: argv.includes("--test-mode"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    strategy: choiceOption<ListingStrategy>(argv, "--strategy", ["html", "api"]),
    redirectMode: choiceOption<RedirectMode>(argv, "--redirect-mode", ["strict", "simple"]),
    pdfLinkMode: choiceOption<PdfLinkMode>(argv, "--pdf-links", ["tracked", "any"]),
    maxPages: intOption(argv, "--max-pages"),
    page: intOption(argv, "--page") ?? 1,
    outputDir: optionValue(argv, "--output"),
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    testMode: parsed.testMode || config.testMode,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    listingStrategy: parsed.strategy ?? config.listingStrategy,
    redirectMode: parsed.redirectMode ?? config.redirectMode,
    pdfLinkMode: parsed.pdfLinkMode ?? config.pdfLinkMode,
    maxPages: parsed.maxPages ?? config.maxPages,
    outputDir: parsed.outputDir ?? config.outputDir,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const writers: LogWriter[] = [new ConsoleLogWriter(), new FileLogWriter(config.logFile)];
  const logger = new Logger({ component: "cli", runId }, { writers, minLevel: config.logLevel });
  const metrics = new MetricsRegistry();
  const ledger = createLedger(config);
  const session = new HttpSession({ config, logger: logger.child("session") });
  const context = { runId, config, session, ledger, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    baseUrl: config.baseUrl,
    testMode: config.testMode,
    listingStrategy: config.listingStrategy,
    redirectMode: config.redirectMode,
    outputDir: config.outputDir,
  });

  try {
    switch (parsed.command) {
      case "run":
        await runHarvest({ ...context, logger: logger.child("harvest") }, loadCredentials());
        break;
      case "list":
        await runList({ ...context, logger: logger.child("list") }, loadCredentials(), parsed.page);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await ledger.close();
    logger.info("metrics_summary", { ...metrics.getSummary() });
  }
}
