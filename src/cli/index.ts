import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, loadConfig, withArchiveRoot } from "../config";
import { runClear, runFinalize, runList, runProcessOne, runShow, runStatus, runWorkflow } from "../core/commands";
import { errorMessage, isArchiveError } from "../core/errors";
import { ImapMailbox } from "../mailbox";
import { Mailbox } from "../mailbox/types";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createDefaultRegistry, RegistryDeps } from "../pipeline";
import { createSink, NoopSink } from "../sink";
import { ClearTarget, createStore } from "../store";

export type CommandName = "list" | "show" | "run" | "status" | "process-one" | "clear" | "finalize";

export interface ParsedCliArgs {
  command: CommandName;
  workflow?: string;
  dryRun: boolean;
  force: boolean;
  title?: string;
  uid?: number;
  messageId?: string;
  releaseId?: string;
  configPath?: string;
}

export class CliUsageError extends Error {}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  openMailbox?: (config: AppConfig, logger: Logger) => Mailbox;
  registry?: RegistryDeps;
  print?: (line: string) => void;
  dryRunRoot?: () => string;
}

function temporaryArchiveRoot(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "mail-media-archiver-dry-run-"));
}

const HELP_TEXT = `
Usage:
  mail-media-archiver <command> [workflow] [options]

Commands:
  list                                  List configured workflows
  show <workflow>                       Print a workflow's resolved settings
  run <workflow> [--force] [--title t]  Fetch, filter and archive new messages
  status <workflow>                     Ledger counts for a workflow
  process-one <workflow> --uid <n> | --message-id <id> [--force]
  clear <workflow> --message-id <id> | --release <id>
  finalize <workflow>                   Merge every open fragment group now

Options:
  --config <path>    Path to JSON config file (default: archiver.config.json)
  --dry-run          Use an in-memory ledger, skip sink publishing and write media to a temp directory
  --force            Reprocess messages regardless of ledger status
  --title <title>    Release title for named_release workflows
  -h, --help         Show this help
`;

const COMMANDS: readonly CommandName[] = ["list", "show", "run", "status", "process-one", "clear", "finalize"];

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help") || argv.length === 0) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    throw new CliUsageError(`Unknown command: ${argv[0]}`);
  }

  const workflow = argv[1] && !argv[1].startsWith("--") ? argv[1] : undefined;
  if (command !== "list" && !workflow) {
    throw new CliUsageError(`${command} needs a workflow name`);
  }

  const uidRaw = optionValue(argv, "--uid");
  const uid = uidRaw !== undefined ? Number.parseInt(uidRaw, 10) : undefined;
  if (uid !== undefined && (!Number.isInteger(uid) || uid <= 0)) {
    throw new CliUsageError(`--uid must be a positive integer, got ${uidRaw}`);
  }
  const messageId = optionValue(argv, "--message-id");
  const releaseId = optionValue(argv, "--release");

  if (command === "process-one" && (uid === undefined) === (messageId === undefined)) {
    throw new CliUsageError("process-one needs exactly one of --uid or --message-id");
  }
  if (command === "clear" && (messageId === undefined) === (releaseId === undefined)) {
    throw new CliUsageError("clear needs exactly one of --message-id or --release");
  }

  return {
    command,
    workflow,
    dryRun: argv.includes("--dry-run"),
    force: argv.includes("--force"),
    title: optionValue(argv, "--title"),
    uid,
    messageId,
    releaseId,
    configPath: optionValue(argv, "--config"),
  };
}

function requireWorkflow(parsed: ParsedCliArgs): string {
  if (!parsed.workflow) {
    throw new CliUsageError(`${parsed.command} needs a workflow name`);
  }
  return parsed.workflow;
}

function clearTarget(parsed: ParsedCliArgs): ClearTarget {
  if (parsed.messageId) {
    return { messageId: parsed.messageId };
  }
  if (parsed.releaseId) {
    return { releaseId: parsed.releaseId };
  }
  throw new CliUsageError("clear needs --message-id or --release");
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(HELP_TEXT.trim());
      return 1;
    }
    throw error;
  }
  if (parsed === "help") {
    (deps.print ?? console.log)(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId(new Date(), parsed.workflow);
  const logger = new Logger({ component: "cli", runId, workflow: parsed.workflow });
  const metrics = new MetricsRegistry();

  let config: AppConfig;
  try {
    config = loadConfig(parsed.configPath, createDefaultRegistry().names(), deps.env);
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return 1;
  }

  if (parsed.dryRun) {
    const archiveRoot = (deps.dryRunRoot ?? temporaryArchiveRoot)();
    config = withArchiveRoot(config, archiveRoot);
    logger.info("dry_run_archive_root", { archiveRoot });
  }

  const registry = createDefaultRegistry({ ffmpegPath: config.ffmpegPath, ...deps.registry });
  const store = createStore(config, parsed.dryRun);
  const sink = parsed.dryRun ? new NoopSink() : createSink(config, runId);
  const openMailbox = deps.openMailbox ?? ((cfg: AppConfig, mailboxLogger: Logger) => new ImapMailbox(cfg.imap, mailboxLogger));
  const context = {
    runId,
    config,
    store,
    sink,
    logger,
    metrics,
    registry,
    openMailbox: () => openMailbox(config, logger.child("mailbox")),
    print: deps.print,
  };

  logger.info("command_start", {
    command: parsed.command,
    workflow: parsed.workflow,
    dryRun: parsed.dryRun,
    force: parsed.force,
  });

  const options = { force: parsed.force, title: parsed.title };
  try {
    switch (parsed.command) {
      case "list":
        runList(context);
        break;
      case "show":
        runShow(context, requireWorkflow(parsed));
        break;
      case "run":
        await runWorkflow({ ...context, logger: logger.child("run") }, requireWorkflow(parsed), options);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") }, requireWorkflow(parsed));
        break;
      case "process-one":
        await runProcessOne(
          { ...context, logger: logger.child("process_one") },
          requireWorkflow(parsed),
          { uid: parsed.uid, messageId: parsed.messageId },
          options,
        );
        break;
      case "clear":
        await runClear({ ...context, logger: logger.child("clear") }, requireWorkflow(parsed), clearTarget(parsed));
        break;
      case "finalize":
        await runFinalize({ ...context, logger: logger.child("finalize") }, requireWorkflow(parsed));
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      kind: isArchiveError(error) ? error.kind : "unexpected",
      error: errorMessage(error),
    });
    return 1;
  } finally {
    await store.close();
    if (parsed.command === "run" || parsed.command === "process-one" || parsed.command === "finalize") {
      metrics.report(logger);
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
