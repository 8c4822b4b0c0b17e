/**
 * Subcommand dispatch: parse, run the workflow, print the result, map errors
 * to exit codes. Returns the exit code instead of exiting so it can be tested.
 */

import { writeFileSync } from "node:fs";
import { parseCliArgs, helpText, usage, type CliConfig } from "./config.js";
import { GitHubAppTokenError, InvalidInputError, describeCause } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { generate, installations, revoke, type WorkflowDeps } from "./workflow.js";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: Record<string, string | undefined>;
  /** Overrides for the workflow's collaborators; the logger is built from the flags unless given. */
  deps?: WorkflowDeps;
}

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let config: CliConfig | undefined;
  try {
    config = parseCliArgs(argv, io.env ?? process.env);
    const logger = io.deps?.logger ?? createLogger({ debug: config.debug, quiet: config.quiet });
    return await dispatch(config, io, { ...io.deps, logger });
  } catch (error) {
    return reportFailure(error, io, config);
  }
}

async function dispatch(config: CliConfig, io: CliIo, deps: WorkflowDeps & { logger: Logger }): Promise<number> {
  switch (config.command) {
    case "help":
      io.stdout(helpText(config.helpTopic));
      return 0;

    case "installations": {
      const list = await installations(config, deps);
      io.stdout(JSON.stringify(list));
      return 0;
    }

    case "generate": {
      const result = await generate(config, deps);
      if (config.output) {
        writeFileSync(config.output, result.token, { mode: 0o600 });
        deps.logger.info(`✅ Token saved to ${config.output}`);
      } else {
        io.stdout(JSON.stringify(result));
      }
      return 0;
    }

    case "revoke": {
      const result = await revoke(config, deps);
      if (result.revoked) {
        io.stdout(JSON.stringify(result));
      } else {
        io.stderr(`❌ ${result.message}`);
      }
      return 0;
    }
  }
}

function reportFailure(error: unknown, io: CliIo, config: CliConfig | undefined): number {
  if (error instanceof InvalidInputError) {
    io.stderr(`❌ Invalid input: ${error.message}`);
    if (config && config.command !== "help") {
      io.stderr(usage(config.command));
    }
    return 1;
  }
  if (error instanceof GitHubAppTokenError) {
    io.stderr(`❌ ${error.message}`);
    return 1;
  }
  io.stderr(`❌ Unexpected error: ${describeCause(error)}`);
  return 1;
}
