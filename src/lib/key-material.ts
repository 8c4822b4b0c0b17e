/**
 * Resolves the App's private key into a PEM file on disk.
 *
 * A `--key` path is used in place. A `--base64_key` blob is decoded into a
 * private temp directory and removed again when the handle is disposed, when
 * the process exits, or when it is interrupted.
 */

import { accessSync, constants, mkdtempSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InvalidInputError } from "./errors.js";

export interface KeySource {
  keyPath?: string;
  base64Key?: string;
}

export interface KeyHandle {
  readonly path: string;
  readonly source: "file" | "base64";
  dispose(): void;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const SIGNAL_EXIT_CODES: Record<"SIGINT" | "SIGTERM", number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Checks that exactly one key source is present and well formed without
 * touching the filesystem beyond a stat and an access check.
 */
export function validateKeySource(source: KeySource): void {
  const keyPath = source.keyPath?.trim();
  const base64Key = source.base64Key?.trim();

  if (!keyPath && !base64Key) {
    throw new InvalidInputError("key", "key or base64_key required");
  }
  if (keyPath && base64Key) {
    throw new InvalidInputError("key", "key and base64_key are mutually exclusive");
  }

  if (keyPath) {
    let isFile: boolean;
    try {
      isFile = statSync(keyPath).isFile();
      accessSync(keyPath, constants.R_OK);
    } catch {
      throw new InvalidInputError("key", `private key file not found or not readable: ${keyPath}`);
    }
    if (!isFile) {
      throw new InvalidInputError("key", `private key path is not a file: ${keyPath}`);
    }
    return;
  }

  if (base64Key) {
    decodePem(base64Key);
  }
}

export function resolveKeyMaterial(source: KeySource): KeyHandle {
  validateKeySource(source);

  const keyPath = source.keyPath?.trim();
  if (keyPath) {
    return { path: keyPath, source: "file", dispose() {} };
  }

  const pem = decodePem(source.base64Key ?? "");
  const dir = mkdtempSync(join(tmpdir(), "github-app-key-"));
  const path = join(dir, "private-key.pem");
  let disposed = false;

  try {
    writeFileSync(path, pem, { mode: 0o600 });
  } catch (error) {
    rmSync(dir, { recursive: true, force: true });
    throw error;
  }

  return {
    path,
    source: "base64",
    dispose() {
      if (disposed) return;
      disposed = true;
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Runs `fn` with a resolved key and guarantees the key is released afterwards,
 * including on SIGINT/SIGTERM while `fn` is pending.
 */
export async function withKeyMaterial<T>(
  source: KeySource,
  fn: (key: KeyHandle) => Promise<T>,
): Promise<T> {
  const key = resolveKeyMaterial(source);

  const onExit = () => key.dispose();
  const onSignal = (signal: NodeJS.Signals) => {
    key.dispose();
    process.exit(signal === "SIGINT" ? SIGNAL_EXIT_CODES.SIGINT : SIGNAL_EXIT_CODES.SIGTERM);
  };

  process.once("exit", onExit);
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    return await fn(key);
  } finally {
    process.removeListener("exit", onExit);
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    key.dispose();
  }
}

function decodePem(base64Key: string): string {
  const compact = base64Key.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact) || compact.length % 4 === 1) {
    throw new InvalidInputError("base64_key", "not valid base64");
  }

  const pem = Buffer.from(compact, "base64").toString("utf-8").trim();
  if (!pem) {
    throw new InvalidInputError("base64_key", "decodes to an empty key");
  }
  if (!pem.includes("-----BEGIN") || !pem.includes("PRIVATE KEY")) {
    throw new InvalidInputError("base64_key", "decoded content is not a PEM private key");
  }
  return `${pem}\n`;
}
