import type { Response, NextFunction } from "express";
import type { AuthRequest } from "../../types/AuthRequest.js";
import type { TokenService } from "../utils/token.js";
import { logger } from "../lib/logger.js";

export const createAuthenticateToken = (tokens: TokenService) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers["authorization"];
    const [scheme, token] = authHeader?.split(" ") ?? [];

    if (!token || scheme?.toLowerCase() !== "bearer") {
      res.status(401).set("WWW-Authenticate", "Bearer").json({ detail: "Not authenticated" });
      return;
    }

    const result = tokens.validate(token);
    if (!result.ok) {
      logger.debug(`Bearer token rejected: ${result.error}`);
      res
        .status(401)
        .set("WWW-Authenticate", "Bearer")
        .json({ detail: result.error === "expired" ? "Token expired" : "Invalid token" });
      return;
    }

    req.user = { username: result.subject };
    next();
  };
};
