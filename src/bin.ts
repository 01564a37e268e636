#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { resolveCliOptions, type CliOptions } from "./lib/options.js";
import { createConsoleLogger } from "./sdk/logger.js";
import { StdioTransport } from "./sdk/transport/stdio.js";

// --- Parse CLI args ---

const cli = yargs(hideBin(process.argv))
  .scriptName("linewire")
  .usage("Usage: $0 <command> [options]")
  .command("echo", "Echo every received message back until EOF")
  .command("send <messages..>", "Send each argument as one message", (y) =>
    y.positional("messages", {
      type: "string",
      array: true,
      describe: "Message payloads (one frame each)",
      demandOption: true,
    }),
  )
  .option("log-level", {
    type: "string",
    choices: ["debug", "info", "notice", "warn", "error"] as const,
    describe: "Minimum level logged to stderr (env: LINEWIRE_LOG_LEVEL)",
  })
  .option("poll-interval", {
    type: "number",
    describe: "Retry delay in ms when I/O would block (env: LINEWIRE_POLL_INTERVAL_MS)",
  })
  .option("color", {
    type: "boolean",
    describe: "Colourize log output (--no-color to disable)",
  })
  .strict()
  .version(false)
  .option("version", {
    type: "boolean",
    default: false,
    describe: "Print version information and exit",
  })
  .help();

const argv = await cli.parse();

// --- Route to subcommands ---

function createTransport(opts: CliOptions): StdioTransport {
  return new StdioTransport({
    logger: createConsoleLogger({ level: opts.logLevel, color: opts.color }),
    pollIntervalMs: opts.pollIntervalMs,
  });
}

const command = String(argv._[0]);
let exitCode = 0;

try {
  const opts = resolveCliOptions({
    logLevel: argv.logLevel,
    pollInterval: argv.pollInterval,
    color: argv.color,
  });

  if (argv.version) {
    const { runVersion } = await import("./commands/version.js");
    await runVersion();
  } else if (command === "echo") {
    const { runEcho } = await import("./commands/echo.js");
    exitCode = await runEcho(createTransport(opts));
  } else if (command === "send") {
    const { runSend } = await import("./commands/send.js");
    const messages = "messages" in argv && Array.isArray(argv.messages) ? argv.messages.map(String) : [];
    exitCode = await runSend(createTransport(opts), messages);
  } else {
    cli.showHelp();
    exitCode = 1;
  }
} catch (err) {
  process.stderr.write((err instanceof Error ? err.message : String(err)) + "\n");
  exitCode = 1;
}

process.exitCode = exitCode;
