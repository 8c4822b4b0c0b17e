/**
 * The three GitHub App REST calls the workflow needs, over @octokit/rest.
 *
 * Octokit picks the Authorization scheme from the credential: a JWT goes out
 * as `bearer`, an installation token as `token`. Nothing is retried.
 */

import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { DependencyFailureError, describeCause, type WorkflowStep } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const DEFAULT_TIMEOUT_MS = 15_000;
const USER_AGENT = "github-app-token";

export interface Installation {
  id: number;
  [key: string]: unknown;
}

export interface InstallationToken {
  token: string;
  expires_at: string;
}

export interface GitHubClientOptions {
  baseUrl: string;
  logger?: Logger;
  timeoutMs?: number;
  /** Replaces the global fetch; tests point this at an in-process stub. */
  fetch?: typeof fetch;
}

export interface GitHubAppApi {
  listInstallations(jwt: string): Promise<Installation[]>;
  createInstallationToken(jwt: string, installationId: number): Promise<InstallationToken>;
  revokeToken(token: string): Promise<number>;
}

export class GitHubClient implements GitHubAppApi {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: typeof fetch;

  constructor(options: GitHubClientOptions) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
  }

  async listInstallations(jwt: string): Promise<Installation[]> {
    const octokit = this.octokit(jwt);
    this.logger.debug(`GET ${this.baseUrl}/app/installations`);

    const data: unknown = await this.call("listing", async () => {
      const response = await octokit.apps.listInstallations({
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      return response.data;
    });

    if (!Array.isArray(data) || !data.every(isInstallation)) {
      throw new DependencyFailureError("listing", "unexpected response from GitHub (expected a list of installations)");
    }
    return data;
  }

  async createInstallationToken(jwt: string, installationId: number): Promise<InstallationToken> {
    const octokit = this.octokit(jwt);
    this.logger.debug(`POST ${this.baseUrl}/app/installations/${installationId}/access_tokens`);

    const data: unknown = await this.call("creating", async () => {
      const response = await octokit.apps.createInstallationAccessToken({
        installation_id: installationId,
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      return response.data;
    });

    if (!isRecord(data) || typeof data.token !== "string" || !data.token) {
      throw new DependencyFailureError("creating", "failed to create app token");
    }
    if (typeof data.expires_at !== "string" || !data.expires_at) {
      throw new DependencyFailureError("creating", "failed to create app token (response has no expires_at)");
    }
    return { token: data.token, expires_at: data.expires_at };
  }

  /**
   * Returns the status GitHub answered with: 204 when the token was revoked,
   * the rejecting status otherwise. Only transport failures throw.
   */
  async revokeToken(token: string): Promise<number> {
    const octokit = this.octokit(token);
    this.logger.debug(`DELETE ${this.baseUrl}/installation/token`);

    try {
      const response = await octokit.apps.revokeInstallationAccessToken({
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      return response.status;
    } catch (error) {
      if (error instanceof RequestError && error.response) {
        return error.status;
      }
      throw new DependencyFailureError("revoking", "request to GitHub failed", error);
    }
  }

  private octokit(auth: string): Octokit {
    return new Octokit({
      auth,
      baseUrl: this.baseUrl,
      userAgent: USER_AGENT,
      // Octokit logs every request; keep that out of normal output.
      log: {
        debug: (message: string) => this.logger.debug(message),
        info: (message: string) => this.logger.debug(message),
        warn: (message: string) => this.logger.warn(message),
        error: (message: string) => this.logger.debug(message),
      },
      request: this.fetchImpl ? { fetch: this.fetchImpl } : {},
    });
  }

  private async call<T>(step: WorkflowStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RequestError && error.response) {
        throw new DependencyFailureError(step, `GitHub responded with HTTP ${error.status}`, error);
      }
      this.logger.debug(`transport error during ${step}: ${describeCause(error)}`);
      throw new DependencyFailureError(step, "request to GitHub failed", error);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isInstallation(value: unknown): value is Installation {
  return isRecord(value) && typeof value.id === "number";
}
