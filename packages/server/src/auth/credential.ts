/**
 * Credential validation for connection admission: verifies a JWT access token
 * and maps its claims to an identity.
 */

import { createRemoteJWKSet, decodeJwt, jwtVerify, type JWTPayload, type JWTVerifyOptions } from "jose";

export interface Identity {
  userId: string;
  name?: string;
  email?: string;
}

/** Resolves the identity behind a credential, or null when it is not valid. */
export type CredentialValidator = (token: string) => Promise<Identity | null>;

export interface JwtCredentialOptions {
  /** Shared HS256 secret. */
  secret?: string;
  /** JWKS endpoint for asymmetric keys. */
  jwksUrl?: string;
  issuer?: string;
  audience?: string;
  /** Read claims without verifying the signature. Development only. */
  decodeOnly?: boolean;
}

export function identityFromClaims(payload: JWTPayload): Identity | null {
  const userId = typeof payload.sub === "string" ? payload.sub.trim() : "";
  if (!userId) return null;
  const email =
    typeof payload.email === "string"
      ? payload.email
      : typeof payload.preferred_username === "string"
        ? payload.preferred_username
        : undefined;
  const name =
    typeof payload.name === "string"
      ? payload.name
      : [payload.given_name, payload.family_name]
          .filter((x) => typeof x === "string")
          .join(" ")
          .trim() || undefined;
  return { userId, name, email };
}

/**
 * Build a validator for JWT access tokens. One of `secret`, `jwksUrl` or
 * `decodeOnly` must be given; verification failures resolve to null.
 */
export function createJwtCredentialValidator(options: JwtCredentialOptions): CredentialValidator {
  const verifyOptions: JWTVerifyOptions = {};
  if (options.issuer) verifyOptions.issuer = options.issuer;
  if (options.audience) verifyOptions.audience = options.audience;

  let verify: (token: string) => Promise<JWTPayload>;
  if (options.secret) {
    const key = new TextEncoder().encode(options.secret);
    verify = async (token) => (await jwtVerify(token, key, { ...verifyOptions, algorithms: ["HS256"] })).payload;
  } else if (options.jwksUrl) {
    const jwks = createRemoteJWKSet(new URL(options.jwksUrl));
    verify = async (token) => (await jwtVerify(token, jwks, verifyOptions)).payload;
  } else if (options.decodeOnly) {
    verify = async (token) => decodeJwt(token);
  } else {
    throw new Error("createJwtCredentialValidator needs a secret, a jwksUrl or decodeOnly");
  }

  return async (token: string): Promise<Identity | null> => {
    if (!token) return null;
    try {
      return identityFromClaims(await verify(token));
    } catch {
      return null;
    }
  };
}
