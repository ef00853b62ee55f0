import type { Request } from "express";

export interface AuthUser {
  username: string;
}

// Request after authenticateToken has run
export interface AuthRequest extends Request {
  user?: AuthUser;
}
