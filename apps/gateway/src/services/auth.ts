import jwt, { type JwtPayload } from "jsonwebtoken";
import { AuthenticationError } from "../errors.js";
import { log } from "../logger.js";

/** Claims the identity service puts in an access token. */
export interface AccessTokenClaims {
  type: "access";
  user_id?: string;
  sub?: string;
  [claim: string]: unknown;
}

export interface VerifiedToken {
  /** Caller identity, used as the rate-limit key and list filter */
  identity: string;
  claims: AccessTokenClaims;
}

/**
 * Token verification seam. Tokens are issued elsewhere; the gateway only
 * validates them.
 */
export interface AuthValidator {
  verify(token: string): VerifiedToken;
}

export type JwtAlgorithm = "HS256" | "HS384" | "HS512";

export interface JwtAuthValidatorOptions {
  secret: string;
  algorithm: JwtAlgorithm;
}

export class JwtAuthValidator implements AuthValidator {
  constructor(private readonly options: JwtAuthValidatorOptions) {}

  /**
   * @throws AuthenticationError on a bad signature, expiry, or a token that
   * is not an access token
   */
  verify(token: string): VerifiedToken {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
      });
    } catch (error) {
      log.auth.warn({ error: error instanceof Error ? error.message : String(error) }, "token rejected");
      throw new AuthenticationError(undefined, { cause: error });
    }

    if (typeof decoded === "string" || decoded.type !== "access") {
      log.auth.warn({}, "token is not an access token");
      throw new AuthenticationError("Invalid token type");
    }

    const identity = typeof decoded.user_id === "string" ? decoded.user_id : decoded.sub;
    if (!identity) {
      log.auth.warn({}, "token carries no subject");
      throw new AuthenticationError();
    }

    return {
      identity,
      claims: { ...decoded, type: "access" },
    };
  }
}

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string {
  if (!header?.startsWith("Bearer ")) {
    throw new AuthenticationError("Missing or malformed Authorization header");
  }

  const token = header.slice(7).trim();
  if (!token) {
    throw new AuthenticationError("Missing or malformed Authorization header");
  }
  return token;
}
