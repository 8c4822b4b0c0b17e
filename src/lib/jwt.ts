/**
 * JWT claim construction and RS256 signing for GitHub App authentication.
 *
 * Signing sits behind the `JwtSigner` interface so the workflow can run
 * against a stub; `cryptoSigner` is the real implementation.
 */

import { createSign } from "node:crypto";
import { readFileSync } from "node:fs";
import { DependencyFailureError, InvalidInputError } from "./errors.js";

/** GitHub rejects App JWTs that live longer than ten minutes. */
export const MAX_DURATION_MINUTES = 10;
export const DEFAULT_DURATION_MINUTES = 10;

/** Issued-at is backdated to absorb clock drift against GitHub's servers. */
export const CLOCK_SKEW_SECONDS = 60;

const INTEGER_PATTERN = /^-?[0-9]+$/;

export interface JwtClaims {
  iss: string;
  iat: number;
  exp: number;
}

export interface SignRequest {
  algorithm: "RS256";
  claims: JwtClaims;
  privateKeyPath: string;
}

export interface JwtSigner {
  sign(request: SignRequest): Promise<string> | string;
}

export function parseInteger(field: string, value: string | number): number {
  const text = String(value).trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new InvalidInputError(field, `must be an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidInputError(field, `out of range, got "${value}"`);
  }
  return parsed;
}

export function parseDuration(value: string | number = DEFAULT_DURATION_MINUTES): number {
  const minutes = parseInteger("duration", value);
  if (minutes > MAX_DURATION_MINUTES) {
    throw new InvalidInputError("duration", `duration cannot be more than ${MAX_DURATION_MINUTES} minutes`);
  }
  if (minutes < 1) {
    throw new InvalidInputError("duration", "duration must be at least 1 minute");
  }
  return minutes;
}

export function buildClaims(
  appId: string,
  durationMinutes: string | number = DEFAULT_DURATION_MINUTES,
  now: number = Math.floor(Date.now() / 1000),
): JwtClaims {
  parseInteger("app_id", appId);
  const minutes = parseDuration(durationMinutes);

  return {
    iss: appId.trim(),
    iat: now - CLOCK_SKEW_SECONDS,
    exp: now + minutes * 60,
  };
}

/**
 * Signs claims with a key file. Failures here are dependency failures, not
 * input errors: the key path was validated before we got this far.
 */
export async function signJwt(signer: JwtSigner, claims: JwtClaims, privateKeyPath: string): Promise<string> {
  let jwt: string;
  try {
    jwt = await signer.sign({ algorithm: "RS256", claims, privateKeyPath });
  } catch (error) {
    throw new DependencyFailureError("signing", "could not sign JWT", error);
  }
  if (!jwt) {
    throw new DependencyFailureError("signing", "signer returned an empty JWT");
  }
  return jwt;
}

export const cryptoSigner: JwtSigner = {
  sign({ claims, privateKeyPath }) {
    const privateKey = readFileSync(privateKeyPath, "utf-8");

    if (!privateKey.includes("BEGIN") || !privateKey.includes("PRIVATE KEY")) {
      throw new Error("Invalid private key format. Expected PEM format with BEGIN/END markers.");
    }

    const header = { alg: "RS256", typ: "JWT" };
    const encodedHeader = Buffer.from(JSON.stringify(header)).toString("base64url");
    const encodedPayload = Buffer.from(JSON.stringify(claims)).toString("base64url");

    const signature = createSign("RSA-SHA256")
      .update(`${encodedHeader}.${encodedPayload}`)
      .sign(privateKey, "base64url");

    return `${encodedHeader}.${encodedPayload}.${signature}`;
  },
};
