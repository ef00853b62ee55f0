import jwt, { type JwtPayload } from "jsonwebtoken";
import type { TokenConfig } from "../config.js";

export type TokenError = "expired" | "malformed";

export type TokenResult =
  | { ok: true; subject: string }
  | { ok: false; error: TokenError };

const toSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

/**
 * Issues and checks signed bearer tokens. Clock and TTL can be passed per call
 * so tests do not depend on wall time.
 */
export class TokenService {
  constructor(private readonly config: TokenConfig) {}

  get defaultTtlMs(): number {
    return this.config.accessTokenTtlMinutes * 60 * 1000;
  }

  issue(subject: string, now: Date = new Date(), ttlMs: number = this.defaultTtlMs): string {
    const iat = toSeconds(now);
    const exp = toSeconds(new Date(now.getTime() + ttlMs));
    return jwt.sign({ sub: subject, iat, exp }, this.config.secretKey, {
      algorithm: this.config.algorithm,
    });
  }

  validate(token: string, now: Date = new Date()): TokenResult {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secretKey, {
        algorithms: [this.config.algorithm],
        clockTimestamp: toSeconds(now),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) return { ok: false, error: "expired" };
      if (err instanceof jwt.JsonWebTokenError) return { ok: false, error: "malformed" };
      throw err;
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || payload.exp === undefined) {
      return { ok: false, error: "malformed" };
    }
    return { ok: true, subject: payload.sub };
  }
}
