/**
 * Command-line parsing and environment fallbacks.
 */

import { parseArgs } from "node:util";
import { InvalidInputError } from "./errors.js";

export const COMMANDS = ["installations", "generate", "revoke", "help"] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliConfig {
  command: Command;
  /** Command the help text is for, when `command` is `help`. */
  helpTopic?: Command;
  appId: string;
  keyPath?: string;
  base64Key?: string;
  duration?: string;
  installationId?: string;
  hostname?: string;
  token: string;
  output?: string;
  debug: boolean;
  quiet: boolean;
}

type Env = Record<string, string | undefined>;

const OPTIONS = {
  key: { type: "string" },
  base64_key: { type: "string" },
  app_id: { type: "string" },
  duration: { type: "string" },
  installation_id: { type: "string" },
  hostname: { type: "string" },
  token: { type: "string" },
  output: { type: "string", short: "o" },
  debug: { type: "boolean", default: false },
  quiet: { type: "boolean", short: "q", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseCliArgs(argv: string[], env: Env = process.env): CliConfig {
  const { values, positionals } = parseOptions(argv);

  const [first, second, ...rest] = positionals;
  if (rest.length > 0) {
    throw new InvalidInputError("arguments", `unexpected argument "${rest[0]}"`);
  }

  const fallback = env.GITHUB_APP_TOKEN_DEFAULT_COMMAND?.trim() || "help";
  const name = first ?? fallback;
  if (!isCommand(name)) {
    throw new InvalidInputError("command", `unknown command "${name}" (expected one of ${COMMANDS.join(", ")})`);
  }

  let command: Command = name;
  let helpTopic: Command | undefined;
  if (command === "help") {
    if (second !== undefined) {
      if (!isCommand(second)) {
        throw new InvalidInputError("command", `unknown command "${second}"`);
      }
      helpTopic = second;
    }
  } else if (second !== undefined) {
    throw new InvalidInputError("arguments", `unexpected argument "${second}"`);
  } else if (values.help) {
    helpTopic = command;
    command = "help";
  }

  // An environment key source only applies when no flag picked one.
  const keyFromFlags = values.key !== undefined || values.base64_key !== undefined;

  return {
    command,
    helpTopic,
    appId: values.app_id ?? env.GITHUB_APP_ID ?? "",
    keyPath: keyFromFlags ? values.key : env.GITHUB_APP_PRIVATE_KEY_PATH || undefined,
    base64Key: keyFromFlags ? values.base64_key : env.GITHUB_APP_PRIVATE_KEY_BASE64 || undefined,
    duration: values.duration,
    installationId: values.installation_id ?? (env.GITHUB_APP_INSTALLATION_ID || undefined),
    hostname: values.hostname ?? (env.GITHUB_HOSTNAME || undefined),
    token: values.token ?? "",
    output: values.output,
    debug: values.debug || env.GITHUB_APP_TOKEN_DEBUG === "1" || env.GITHUB_APP_TOKEN_DEBUG === "true",
    quiet: values.quiet,
  };
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new InvalidInputError("arguments", error instanceof Error ? error.message : String(error));
  }
}

const USAGE: Record<Command, string> = {
  installations: "github-app-token installations --key <path>|--base64_key <b64> --app_id <id> [--duration <min>] [--hostname <host>]",
  generate:
    "github-app-token generate --key <path>|--base64_key <b64> --app_id <id> [--duration <min>] [--installation_id <id>] [--hostname <host>] [--output <file>]",
  revoke: "github-app-token revoke --token <token> [--hostname <host>]",
  help: "github-app-token help [command]",
};

export function usage(command: Command): string {
  return `Usage: ${USAGE[command]}`;
}

export function helpText(topic?: Command): string {
  if (topic && topic !== "help") {
    return `${usage(topic)}\n\n${DETAILS[topic]}`;
  }
  return `
GitHub App token tool

Exchanges a GitHub App private key for short-lived installation access tokens.

Commands:
  installations   List the app's installations
  generate        Create an installation access token
  revoke          Revoke an installation access token
  help [command]  Show help

Run "github-app-token help <command>" for the options of a command.

Global Options:
  --debug                  Log requests and key handling
  --quiet, -q              Only log warnings and errors

Environment Variables:
  GITHUB_APP_ID                     App id (--app_id)
  GITHUB_APP_PRIVATE_KEY_PATH       Path to .pem file (--key)
  GITHUB_APP_PRIVATE_KEY_BASE64     Base64-encoded .pem (--base64_key)
  GITHUB_APP_INSTALLATION_ID        Installation id (--installation_id)
  GITHUB_HOSTNAME                   API hostname (--hostname)
  GITHUB_APP_TOKEN_DEFAULT_COMMAND  Command to run when none is given
  GITHUB_APP_TOKEN_DEBUG            Set to 1 for debug logging (--debug)
`.trimStart();
}

const KEY_OPTIONS = `  --key <path>             Path to the app's private key (.pem)
  --base64_key <b64>       Base64-encoded private key, instead of --key
  --app_id <id>            GitHub App id
  --duration <min>         JWT lifetime in minutes, 1-10 (default: 10)
  --hostname <host>        API hostname (default: api.github.com)`;

const DETAILS: Record<Exclude<Command, "help">, string> = {
  installations: `Options:
${KEY_OPTIONS}

Prints the installations of the app as JSON.`,
  generate: `Options:
${KEY_OPTIONS}
  --installation_id <id>   Installation to create a token for (default: the first one)
  --output, -o <file>      Write the token to <file> (mode 0600) instead of printing JSON

Prints {"token": ..., "expires_at": ...}.`,
  revoke: `Options:
  --token <token>          Installation token to revoke
  --hostname <host>        API hostname (default: api.github.com)`,
};
