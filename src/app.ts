import "express-async-errors";
import express from "express";
import cors from "cors";
import type { AppConfig } from "./config.js";
import { ping, type Db } from "./db/client.js";
import { createProductsRepository } from "./repositories/products.repository.js";
import { createSellersRepository } from "./repositories/sellers.repository.js";
import { TokenService } from "./utils/token.js";
import { requestLogger } from "./middlewares/requestLogger.js";
import { createErrorHandler, notFoundHandler } from "./middlewares/errorHandler.js";
import { logger } from "./lib/logger.js";
import { openApiDocument } from "./openapi/index.js";
import productRoutes from "./routes/product.js";
import sellerRoutes from "./routes/seller.js";
import loginRoutes from "./routes/login.js";

export function createApp(db: Db, config: AppConfig) {
  const products = createProductsRepository(db);
  const sellers = createSellersRepository(db);
  const tokens = new TokenService(config.token);

  const app = express();

  app.use(cors({
    origin: config.corsOrigin,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));
  app.use(express.json());
  app.use(requestLogger);

  // PRODUCTS
  app.use(productRoutes({ products, sellers }));

  // SELLER
  app.use(sellerRoutes({ sellers, tokens }));

  // LOGIN
  app.use(loginRoutes({ sellers, tokens }));

  // API description
  app.get("/openapi.json", (_req, res) => {
    res.json(openApiDocument);
  });

  // Health check
  app.get("/health", (_req, res) => {
    let dbStatus: "ok" | "error" = "error";
    try {
      if (ping(db)) dbStatus = "ok";
    } catch (err) {
      logger.error("Health check query failed:", err);
    }
    res.status(dbStatus === "ok" ? 200 : 503).json({
      status: dbStatus === "ok" ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      checks: { db: dbStatus },
    });
  });

  app.use(notFoundHandler);
  app.use(createErrorHandler(config.nodeEnv));

  return app;
}
