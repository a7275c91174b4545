// =============================================================================
// gsp CLI — Command dispatch (inspect, validate)
// =============================================================================

import { createReadStream } from "node:fs";
import { parseArgs } from "node:util";
import { JsonLineDecoder, lineTooLongError } from "../adapters/decoder/json-line-decoder.adapter.js";
import { resolveConfig, type InterpreterConfig } from "../config/interpreter-config.js";
import { GspError } from "../errors.js";
import { StreamInterpreter } from "../interpreter/stream-interpreter.js";
import { createLogger, formatLogEntry } from "../logging/logger.js";
import { isOversizedLine, splitLines, type StreamChunk } from "../streaming/line-splitter.js";
import { createFormatter, formatTree, type Formatter } from "./format.js";

export const VERSION = "0.1.0";

export const HELP = `
gsp — GSP stream interpreter

Usage:
  gsp inspect <file|->  [--format tree|json]   Interpret a stream and print the result
  gsp validate <file|->                        Decode every line and report failures

Options:
  --format     Output format for inspect (tree, json). Default: tree
  --log-level  debug, info, warn, error, silent. Default: info
  --config     Path to a JSON config file
  --help       Show this help
  --version    Show version

Environment Variables:
  GSP_LOG_LEVEL, GSP_BINDING_KEY, GSP_MAX_LINE_LENGTH
`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Opens the stream named on the command line ("-" is stdin). */
  openSource(path: string): AsyncIterable<StreamChunk>;
  env: NodeJS.ProcessEnv;
  color: boolean;
}

export function defaultIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    openSource: (path) => (path === "-" ? process.stdin : createReadStream(path)),
    env: process.env,
    color: Boolean(process.stdout.isTTY),
  };
}

const CLI_OPTIONS = {
  format: { type: "string" },
  "log-level": { type: "string" },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
} as const;

type OutputFormat = "tree" | "json";

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "tree" || value === "json";
}

/** Errors raised by the OS while opening or reading the source (ENOENT, EACCES, ...). */
function isSystemError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && !(err instanceof GspError) && "code" in err && typeof err.code === "string";
}

interface CommandContext {
  io: CliIO;
  fmt: Formatter;
  source: string;
  config: InterpreterConfig;
  format: OutputFormat;
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n${HELP}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.version) {
    io.stdout(`${VERSION}\n`);
    return 0;
  }
  if (values.help) {
    io.stdout(HELP);
    return 0;
  }

  const [command, source] = positionals;
  if ((command !== "inspect" && command !== "validate") || source === undefined) {
    io.stderr(HELP);
    return 2;
  }

  const format = values.format ?? "tree";
  if (!isOutputFormat(format)) {
    io.stderr(`Unknown format "${format}" (expected tree or json)\n`);
    return 2;
  }

  let config: InterpreterConfig;
  try {
    config = resolveConfig({
      file: values.config,
      env: io.env,
      overrides: values["log-level"] ? { logLevel: values["log-level"] } : {},
    });
  } catch (err) {
    if (err instanceof GspError) {
      io.stderr(`${err.message}\n`);
      return 2;
    }
    throw err;
  }

  const ctx: CommandContext = { io, fmt: createFormatter(io.color), source, config, format };
  try {
    return command === "inspect" ? await inspect(ctx) : await validate(ctx);
  } catch (err) {
    if (isSystemError(err)) {
      io.stderr(`Cannot read "${source}": ${err.message}\n`);
      return 2;
    }
    throw err;
  }
}

async function inspect(ctx: CommandContext): Promise<number> {
  const { io, fmt } = ctx;
  const logger = createLogger({
    level: ctx.config.logLevel,
    component: "gsp",
    sink: (entry) => io.stderr(`${formatLogEntry(entry)}\n`),
  });
  const interpreter = new StreamInterpreter({ config: ctx.config, logger });

  if (ctx.format === "tree") {
    interpreter.subscribe((event) => {
      io.stdout(`${fmt.color("green", "change")} ${event.reason} (session ${event.sessionId})\n`);
    });
  }
  interpreter.onError((event) => {
    const where = event.line === undefined ? "" : `line ${event.line}: `;
    io.stderr(`${fmt.color("red", `${where}${event.error.code}`)} ${event.error.message}\n`);
  });

  const summary = await interpreter.consume(io.openSource(ctx.source));
  const rendered = interpreter.render();

  if (ctx.format === "json") {
    const snapshot = {
      ready: interpreter.isReady,
      sessionId: interpreter.sessionId ?? null,
      rootId: interpreter.rootId ?? null,
      state: interpreter.currentState(),
      layout: rendered.ready ? rendered.tree : null,
      missing: rendered.ready ? rendered.missing : interpreter.missingNodeIds(),
    };
    io.stdout(`${JSON.stringify(snapshot, null, 2)}\n`);
  } else {
    if (rendered.ready) {
      io.stdout(`${formatTree(rendered.tree, fmt)}\n`);
    } else {
      const missing = interpreter.missingNodeIds();
      const detail = missing.length > 0 ? ` (missing: ${missing.join(", ")})` : "";
      io.stdout(`${fmt.color("yellow", "not ready")}${detail}\n`);
    }
    io.stdout(
      `${summary.lines} lines, ${summary.applied} applied, ${summary.rejected} rejected, ${summary.skipped} skipped\n`,
    );
  }

  return summary.rejected > 0 ? 1 : 0;
}

async function validate(ctx: CommandContext): Promise<number> {
  const { io, fmt } = ctx;
  const decoder = new JsonLineDecoder({ maxLineLength: ctx.config.maxLineLength });
  let lineNumber = 0;
  let checked = 0;
  let invalid = 0;

  const { maxLineLength } = ctx.config;
  for await (const line of splitLines(io.openSource(ctx.source), { maxLineLength })) {
    lineNumber++;
    if (isOversizedLine(line)) {
      checked++;
      invalid++;
      const error = lineTooLongError(maxLineLength);
      io.stdout(`line ${lineNumber}: ${fmt.color("red", error.code)} ${error.message}\n`);
      continue;
    }
    if (line.trim().length === 0) continue;
    checked++;
    const result = decoder.decode(line);
    if (!result.success) {
      invalid++;
      io.stdout(`line ${lineNumber}: ${fmt.color("red", result.error.code)} ${result.error.message}\n`);
    }
  }

  io.stdout(`${checked} messages, ${invalid} invalid\n`);
  return invalid > 0 ? 1 : 0;
}
