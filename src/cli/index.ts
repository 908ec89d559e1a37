import { loadConfig } from "../config";
import { CommandContext, runColors, runInventory, runMarkdown, runStatus, runThumbnail } from "../core/commands";
import { errorMessage } from "../core/errors";
import { HttpClient } from "../core/http";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStore } from "../store";

export type CommandName = "inventory" | "markdown" | "thumbnail" | "colors" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  target?: string;
  dryRun: boolean;
  invalidate: boolean;
  ignoreHttpsErrors: boolean;
  locale: string;
  outputPath?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  brick-inventory <command> [options]

Commands:
  inventory <set-number>   Fetch a set inventory with minifigure and multipack parts
  markdown <url>           Print a page converted to Markdown
  thumbnail <url>          Fetch an image through the thumbnail cache
  colors                   Refresh the color guide
  status                   Show stored inventories and colors

Options:
  --config <path>        Optional path to JSON config file
  --dry-run              Fetch and parse without writing to the store (inventory, colors)
  --out <path>           Write the result to a file (markdown, thumbnail)
  --invalidate           Drop the cached copy before fetching (thumbnail)
  --locale <id>          Color guide locale, default en-us (colors)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

const COMMANDS_WITH_TARGET: ReadonlySet<CommandName> = new Set(["inventory", "markdown", "thumbnail"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (!raw) {
    return undefined;
  }

  if (raw === "inventory" || raw === "markdown" || raw === "thumbnail" || raw === "colors" || raw === "status") {
    return raw;
  }

  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const target = argv[1] && !argv[1].startsWith("--") ? argv[1] : undefined;
  if (COMMANDS_WITH_TARGET.has(command) && !target) {
    return "help";
  }

  return {
    command,
    target,
    dryRun: argv.includes("--dry-run"),
    invalidate: argv.includes("--invalidate"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    locale: optionValue(argv, "--locale") ?? "en-us",
    outputPath: optionValue(argv, "--out"),
    configPath: optionValue(argv, "--config"),
  };
}

async function dispatch(parsed: ParsedCliArgs, context: CommandContext, logger: Logger): Promise<void> {
  const target = parsed.target ?? "";
  switch (parsed.command) {
    case "inventory":
      await runInventory({ ...context, logger: logger.child("inventory") }, target, parsed.dryRun);
      break;
    case "markdown":
      await runMarkdown({ ...context, logger: logger.child("markdown") }, target, parsed.outputPath);
      break;
    case "thumbnail":
      await runThumbnail({ ...context, logger: logger.child("thumbnail") }, target, {
        outputPath: parsed.outputPath,
        invalidate: parsed.invalidate,
      });
      break;
    case "colors":
      await runColors({ ...context, logger: logger.child("colors") }, parsed.locale, parsed.dryRun);
      break;
    case "status":
      await runStatus({ ...context, logger: logger.child("status") });
      break;
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const store = createStore(config);
  const metrics = new MetricsRegistry();
  const http = new HttpClient({ config, logger: logger.child("http") });
  const context: CommandContext = { runId, config, store, logger, metrics, http };

  logger.info("command_start", {
    command: parsed.command,
    target: parsed.target,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    storeMode: config.storeMode,
  });

  try {
    await dispatch(parsed, context, logger);
    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return 1;
  } finally {
    await store.close();
    if (config.logLevel !== "silent") {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
