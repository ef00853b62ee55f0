import express from "express";
import type { SellersRepository } from "../repositories/sellers.repository.js";
import type { TokenService } from "../utils/token.js";
import { AppError } from "../middlewares/errorHandler.js";
import { loginBodySchema, parseBody } from "../lib/validate.js";
import { verifyPassword } from "../utils/password.js";
import { logger } from "../lib/logger.js";

interface LoginRouterDeps {
  sellers: SellersRepository;
  tokens: TokenService;
}

export default function loginRoutes({ sellers, tokens }: LoginRouterDeps) {
  const router = express.Router();

  // Seller login. Both failures answer 404 with distinct messages (kept for
  // client compatibility, see DESIGN.md flagged item (b)).
  router.post("/login", async (req, res) => {
    const { username, password } = parseBody(loginBodySchema, req.body);

    const seller = sellers.findByUsername(username);
    if (!seller) throw new AppError(404, "Invalid user");

    const match = await verifyPassword(password, seller.passwordHash);
    if (!match) throw new AppError(404, "Invalid password");

    const accessToken = tokens.issue(seller.username);
    logger.info(`Seller ${seller.id} logged in`);
    res.json({ access_token: accessToken, token_type: "bearer" });
  });

  return router;
}
