import express from "express";
import type { ProductsRepository } from "../repositories/products.repository.js";
import type { SellersRepository } from "../repositories/sellers.repository.js";
import { AppError, RequestValidationError } from "../middlewares/errorHandler.js";
import { parseBody, parseId, productBodySchema, productUpdateSchema } from "../lib/validate.js";
import { displayProduct, fullProduct } from "../utils/display.js";
import { logger } from "../lib/logger.js";
import { ZodError } from "zod";

interface ProductRouterDeps {
  products: ProductsRepository;
  sellers: SellersRepository;
}

export default function productRoutes({ products, sellers }: ProductRouterDeps) {
  const router = express.Router();

  // GET all products (display form, insertion order)
  router.get("/products", (_req, res) => {
    const rows = products.findAll();
    res.json(rows.map(({ product, seller }) => displayProduct(product, seller)));
  });

  // GET single product by ID
  router.get("/product/:id", (req, res) => {
    const id = parseId(req.params);
    const row = products.findById(id);
    if (!row) throw new AppError(404, `Product with id ${id} not found`);
    res.json(displayProduct(row.product, row.seller));
  });

  // CREATE product
  router.post("/product", (req, res) => {
    const body = parseBody(productBodySchema, req.body);

    if (body.seller_id != null && !sellers.findById(body.seller_id)) {
      throw new RequestValidationError(
        "body",
        new ZodError([
          { code: "custom", path: ["seller_id"], message: `Seller with id ${body.seller_id} does not exist` },
        ]),
      );
    }

    const product = products.create({
      name: body.name,
      description: body.description,
      price: body.price,
      sellerId: body.seller_id,
    });
    logger.info(`Product ${product.id} created`);
    res.status(201).json(fullProduct(product));
  });

  // UPDATE product (name, description, price)
  router.put("/product/:id", (req, res) => {
    const id = parseId(req.params);
    const body = parseBody(productUpdateSchema, req.body);

    const updated = products.update(id, body);
    if (!updated) throw new AppError(404, `Product with id ${id} not found`);

    logger.info(`Product ${id} updated`);
    res.json({ message: `Product: ${id} is successfully updated` });
  });

  // DELETE product
  router.delete("/product/:id", (req, res) => {
    const id = parseId(req.params);
    const deleted = products.delete(id);
    if (!deleted) throw new AppError(404, `Product with id ${id} not found`);

    logger.info(`Product ${id} deleted`);
    res.json({ message: "Product deleted successfully", id });
  });

  return router;
}
