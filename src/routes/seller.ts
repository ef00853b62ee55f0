import express, { type Response } from "express";
import type { SellersRepository } from "../repositories/sellers.repository.js";
import type { AuthRequest } from "../../types/AuthRequest.js";
import type { TokenService } from "../utils/token.js";
import { createAuthenticateToken } from "../middlewares/auth.js";
import { AppError } from "../middlewares/errorHandler.js";
import { parseBody, sellerBodySchema } from "../lib/validate.js";
import { hashPassword } from "../utils/password.js";
import { displaySeller, fullSeller } from "../utils/display.js";
import { logger } from "../lib/logger.js";

interface SellerRouterDeps {
  sellers: SellersRepository;
  tokens: TokenService;
}

export default function sellerRoutes({ sellers, tokens }: SellerRouterDeps) {
  const router = express.Router();
  const authenticateToken = createAuthenticateToken(tokens);

  // REGISTER seller. Responds with the stored record, password hash included.
  router.post("/seller", async (req, res) => {
    const { username, email, password } = parseBody(sellerBodySchema, req.body);

    if (sellers.findByUsername(username)) {
      throw new AppError(409, "Username already registered");
    }

    const passwordHash = await hashPassword(password);
    // A concurrent registration can still win the race; the unique index
    // turns that into a 409 in the error handler.
    const seller = sellers.create({ username, email, passwordHash });

    logger.info(`Seller ${seller.id} registered as ${username}`);
    res.json(fullSeller(seller));
  });

  // GET the seller the bearer token was issued to
  router.get("/seller/me", authenticateToken, (req: AuthRequest, res: Response) => {
    if (!req.user) throw new AppError(401, "Not authenticated");

    const seller = sellers.findByUsername(req.user.username);
    if (!seller) throw new AppError(404, "Seller not found");
    res.json(displaySeller(seller));
  });

  return router;
}
