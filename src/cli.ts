#!/usr/bin/env node
// Interview Session Client - Command line host
// Drives the backend-facing parts of the client from Node: health check,
// setup pipeline, status reconciliation with report dispatch, and report
// download. The live voice session needs a browser and is not available here.

import "dotenv/config";
import { openAsBlob } from "node:fs";
import { basename } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { HttpBackendClient } from "./backend-client.js";
import type { BackendClient } from "./backend-client.js";
import { loadConfig } from "./config.js";
import type { InterviewClientConfig } from "./config.js";
import { CompletionDispatcher } from "./completion-dispatcher.js";
import { describeError } from "./errors.js";
import { toValidatedForm, validateForm } from "./form-gate.js";
import { createLogger, silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { ReportStore } from "./report-store.js";
import { SetupPipeline } from "./setup-pipeline.js";
import { StatusReconciler } from "./status-reconciler.js";
import type { ReconcilerResult } from "./status-reconciler.js";
import type { AttachedFile, ReportSink, UserMessage } from "./types.js";

export const USAGE = `Usage: interview-client <command> [options]

Commands:
  health                      Check backend readiness
  setup --name <name> --position <title> --email <address>
        --jd <file> --resume <file> [--questions <n>]
                              Run the setup pipeline and print the session
  status <sessionId>          Wait for a terminal status; dispatch the report if completed
  report <sessionId>          Download the report into the report directory

Options:
  --quiet                     Suppress component logs
  --help                      Show this message`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliCommand =
  | { command: "help" }
  | { command: "health" }
  | {
      command: "setup";
      name: string;
      position: string;
      email: string;
      jobDescriptionPath: string;
      resumePath: string;
      questionCount: number | null;
    }
  | { command: "status"; sessionId: string }
  | { command: "report"; sessionId: string };

export interface ParsedCli {
  command: CliCommand;
  quiet: boolean;
}

function requireOption(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === "") {
    throw new CliUsageError(`Missing required option --${flag}`);
  }
  return value;
}

function requireSessionId(positionals: string[], command: string): string {
  const sessionId = positionals[1];
  if (!sessionId) {
    throw new CliUsageError(`${command} needs a session id`);
  }
  return sessionId;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        name: { type: "string" },
        position: { type: "string" },
        email: { type: "string" },
        jd: { type: "string" },
        resume: { type: "string" },
        questions: { type: "string" },
        quiet: { type: "boolean", default: false },
        help: { type: "boolean", default: false },
      },
    });
  } catch (err) {
    throw new CliUsageError(describeError(err));
  }
}

/**
 * Parses argv (without the node and script entries).
 * @throws CliUsageError on unknown commands, unknown flags or missing values.
 */
export function parseCli(argv: string[]): ParsedCli {
  const { values, positionals } = readArgs(argv);
  const quiet = values.quiet === true;

  if (values.help === true || positionals.length === 0) {
    return { command: { command: "help" }, quiet };
  }

  const name = positionals[0];
  switch (name) {
    case "health":
      return { command: { command: "health" }, quiet };
    case "setup": {
      let questionCount: number | null = null;
      if (values.questions !== undefined) {
        questionCount = Number(values.questions);
        if (!Number.isInteger(questionCount) || questionCount <= 0) {
          throw new CliUsageError(`--questions must be a positive integer, got "${values.questions}"`);
        }
      }
      return {
        command: {
          command: "setup",
          name: requireOption(values.name, "name"),
          position: requireOption(values.position, "position"),
          email: requireOption(values.email, "email"),
          jobDescriptionPath: requireOption(values.jd, "jd"),
          resumePath: requireOption(values.resume, "resume"),
          questionCount,
        },
        quiet,
      };
    }
    case "status":
      return { command: { command: "status", sessionId: requireSessionId(positionals, "status") }, quiet };
    case "report":
      return { command: { command: "report", sessionId: requireSessionId(positionals, "report") }, quiet };
    default:
      throw new CliUsageError(`Unknown command "${name}"`);
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────────

export interface CliDeps {
  config: InterviewClientConfig;
  backend: BackendClient;
  sink: ReportSink;
  readAttachment: (path: string) => Promise<AttachedFile>;
  out: (line: string) => void;
  logger: Logger;
}

export async function readAttachment(path: string): Promise<AttachedFile> {
  const content = await openAsBlob(path);
  return { name: basename(path), size: content.size, content };
}

function formatMessage(message: UserMessage): string {
  return `[${message.level}] ${message.text}`;
}

function reconcile(sessionId: string, deps: CliDeps): Promise<ReconcilerResult> {
  return new Promise((resolve) => {
    const reconciler = new StatusReconciler({
      backend: deps.backend,
      poll: deps.config.poll,
      requestTimeoutMs: deps.config.statusUpdateTimeoutMs,
      onOutcome: resolve,
      onMessage: (_channel, message) => deps.out(formatMessage(message)),
      logger: deps.logger,
    });
    reconciler.start(sessionId);
  });
}

/**
 * Runs one command.
 * @returns The process exit code.
 */
export async function runCommand(command: CliCommand, deps: CliDeps): Promise<number> {
  const { config, backend, out } = deps;
  const dispatcher = new CompletionDispatcher({
    backend,
    sink: deps.sink,
    reportTimeoutMs: config.reportTimeoutMs,
    resultsDelayMs: config.resultsDelayMs,
    onShowResults: () => {},
    onMessage: (_channel, message) => out(formatMessage(message)),
    logger: deps.logger,
  });

  switch (command.command) {
    case "help":
      out(USAGE);
      return 0;

    case "health": {
      try {
        const health = await backend.checkHealth({ timeoutMs: config.healthTimeoutMs });
        out(`backend: ${health.healthy ? "healthy" : "unhealthy"}`);
        out(`real-time service: ${health.transportConnected ? "connected" : "not connected"}`);
        return health.healthy ? 0 : 1;
      } catch (err) {
        out(`backend unreachable: ${describeError(err)}`);
        return 1;
      }
    }

    case "setup": {
      let jobDescription: AttachedFile;
      let resume: AttachedFile;
      try {
        jobDescription = await deps.readAttachment(command.jobDescriptionPath);
        resume = await deps.readAttachment(command.resumePath);
      } catch (err) {
        out(`Cannot read attachment: ${describeError(err)}`);
        return 1;
      }
      const values = { name: command.name, position: command.position, email: command.email, jobDescription, resume };
      const form = toValidatedForm(values, config.maxFileSizeBytes);
      if (!form) {
        for (const error of validateForm(values, config.maxFileSizeBytes).errors) {
          out(`${error.field}: ${error.message}`);
        }
        return 2;
      }
      const pipeline = new SetupPipeline({
        backend,
        timeouts: config.steps,
        questionCount: command.questionCount ?? config.questionCount,
        logger: deps.logger,
      });
      try {
        const descriptor = await pipeline.run(form, (progress) => out(`${progress.percent}% ${progress.label}`));
        out(JSON.stringify({ ...descriptor, token: "<redacted>" }, null, 2));
        return 0;
      } catch (err) {
        out(`Setup failed: ${describeError(err)}`);
        return 1;
      }
    }

    case "status": {
      const result = await reconcile(command.sessionId, deps);
      out(`outcome: ${result.outcome} after ${result.attempts} poll(s)`);
      if (result.outcome !== "completed") {
        return result.outcome === "unresolved" ? 1 : 0;
      }
      const sent = await dispatcher.sendReport(command.sessionId);
      const location = await dispatcher.downloadReport(command.sessionId);
      return sent === "sent" && location !== null ? 0 : 1;
    }

    case "report": {
      const location = await dispatcher.downloadReport(command.sessionId);
      return location === null ? 1 : 0;
    }
  }
}

// ─── Entry point ────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCli(process.argv.slice(2));
  } catch (err) {
    console.error(describeError(err));
    console.error(USAGE);
    return 2;
  }

  const config = loadConfig();
  const logger = parsed.quiet ? silentLogger : createLogger("CLI");
  return runCommand(parsed.command, {
    config,
    backend: new HttpBackendClient({ baseUrl: config.apiBaseUrl }),
    sink: new ReportStore(config.reportDir),
    readAttachment,
    out: (line) => console.log(line),
    logger,
  });
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`[FATAL] ${describeError(err)}`);
      process.exitCode = 1;
    },
  );
}
