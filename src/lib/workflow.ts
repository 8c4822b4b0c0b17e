/**
 * Token workflow: key material -> signed JWT -> GitHub App API.
 *
 * Each operation validates every input before it creates a file or opens a
 * connection, so a bad argument never leaves anything behind.
 */

import { apiBaseUrl } from "./endpoint.js";
import { DependencyFailureError, InvalidInputError } from "./errors.js";
import { GitHubClient, type GitHubAppApi, type Installation, type InstallationToken } from "./github-client.js";
import { buildClaims, cryptoSigner, parseDuration, parseInteger, signJwt, type JwtSigner } from "./jwt.js";
import { validateKeySource, withKeyMaterial, type KeySource } from "./key-material.js";
import { silentLogger, type Logger } from "./logger.js";

export interface AppCredentials extends KeySource {
  appId: string;
  duration?: string | number;
  hostname?: string;
}

export interface GenerateOptions extends AppCredentials {
  installationId?: string | number;
}

export interface RevokeOptions {
  token: string;
  hostname?: string;
}

export interface RevokeResult {
  revoked: boolean;
  status: number;
  message: string;
}

export interface WorkflowDeps {
  signer?: JwtSigner;
  /** Builds the API client for a base URL; defaults to the Octokit client. */
  createClient?: (baseUrl: string) => GitHubAppApi;
  logger?: Logger;
  now?: () => number;
}

interface ResolvedDeps {
  signer: JwtSigner;
  createClient: (baseUrl: string) => GitHubAppApi;
  logger: Logger;
  now: () => number;
}

function resolveDeps(deps: WorkflowDeps): ResolvedDeps {
  const logger = deps.logger ?? silentLogger;
  return {
    signer: deps.signer ?? cryptoSigner,
    createClient: deps.createClient ?? ((baseUrl) => new GitHubClient({ baseUrl, logger })),
    logger,
    now: deps.now ?? (() => Math.floor(Date.now() / 1000)),
  };
}

interface ValidatedCredentials {
  appId: string;
  duration: number;
  baseUrl: string;
  keySource: KeySource;
}

function validateCredentials(options: AppCredentials): ValidatedCredentials {
  const appId = (options.appId ?? "").trim();
  if (!appId) {
    throw new InvalidInputError("app_id", "app_id required");
  }
  parseInteger("app_id", appId);
  const duration = parseDuration(options.duration);
  const baseUrl = apiBaseUrl(options.hostname);
  const keySource: KeySource = { keyPath: options.keyPath, base64Key: options.base64Key };
  validateKeySource(keySource);

  return { appId, duration, baseUrl, keySource };
}

/** Signs a fresh App JWT inside the key's lifetime and hands it to `fn`. */
async function withAppJwt<T>(
  credentials: ValidatedCredentials,
  deps: ResolvedDeps,
  fn: (jwt: string) => Promise<T>,
): Promise<T> {
  return withKeyMaterial(credentials.keySource, async (key) => {
    deps.logger.info("🔐 Generating JWT for GitHub App...");
    deps.logger.debug(`using ${key.source} private key at ${key.path}`);
    const claims = buildClaims(credentials.appId, credentials.duration, deps.now());
    const jwt = await signJwt(deps.signer, claims, key.path);
    return fn(jwt);
  });
}

export async function installations(options: AppCredentials, deps: WorkflowDeps = {}): Promise<Installation[]> {
  const credentials = validateCredentials(options);
  const resolved = resolveDeps(deps);
  const client = resolved.createClient(credentials.baseUrl);

  return withAppJwt(credentials, resolved, async (jwt) => {
    resolved.logger.info("🔍 Finding GitHub App installations...");
    const list = await client.listInstallations(jwt);
    resolved.logger.info(`📋 Found ${list.length} installation(s)`);
    return list;
  });
}

export async function generate(options: GenerateOptions, deps: WorkflowDeps = {}): Promise<InstallationToken> {
  const credentials = validateCredentials(options);
  const installationId = parseInstallationId(options.installationId);
  const resolved = resolveDeps(deps);
  const client = resolved.createClient(credentials.baseUrl);

  return withAppJwt(credentials, resolved, async (jwt) => {
    const id = installationId ?? (await discoverInstallationId(client, jwt, resolved.logger));

    resolved.logger.info(`🔑 Exchanging JWT for installation token (installation ${id})...`);
    const { token, expires_at } = await client.createInstallationToken(jwt, id);
    resolved.logger.info("✅ Installation token created");
    return { token, expires_at };
  });
}

export async function revoke(options: RevokeOptions, deps: WorkflowDeps = {}): Promise<RevokeResult> {
  const token = (options.token ?? "").trim();
  if (!token) {
    throw new InvalidInputError("token", "token required");
  }
  const baseUrl = apiBaseUrl(options.hostname);
  const resolved = resolveDeps(deps);
  const client = resolved.createClient(baseUrl);

  resolved.logger.info("🗑️  Revoking installation token...");
  const status = await client.revokeToken(token);
  if (status === 204) {
    return { revoked: true, status, message: "token revoked" };
  }
  return { revoked: false, status, message: `failed to revoke token (HTTP ${status})` };
}

function parseInstallationId(value: string | number | undefined): number | undefined {
  if (value === undefined || String(value).trim() === "") {
    return undefined;
  }
  const id = parseInteger("installation_id", value);
  if (id <= 0) {
    throw new InvalidInputError("installation_id", `must be a positive integer, got "${value}"`);
  }
  return id;
}

async function discoverInstallationId(client: GitHubAppApi, jwt: string, logger: Logger): Promise<number> {
  logger.info("🔍 No installation id given, looking up the first installation...");
  let list: Installation[];
  try {
    list = await client.listInstallations(jwt);
  } catch (error) {
    throw new DependencyFailureError("listing", "failed to fetch installation id", error);
  }

  const [first] = list;
  if (!first) {
    throw new DependencyFailureError("listing", "failed to fetch installation id (the app has no installations)");
  }
  logger.debug(`selected installation ${first.id} of ${list.length}`);
  return first.id;
}
