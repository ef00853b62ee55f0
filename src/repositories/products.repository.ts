import { asc, eq } from "drizzle-orm";
import type { Db } from "../db/client.js";
import { products, sellers, type Product, type Seller } from "../db/schema.js";

export interface ProductInput {
  name: string;
  description: string;
  price: number;
  sellerId?: number | null;
}

export interface ProductWithSeller {
  product: Product;
  seller: Seller | null;
}

export function createProductsRepository(db: Db) {
  return {
    findAll(): ProductWithSeller[] {
      return db
        .select({ product: products, seller: sellers })
        .from(products)
        .leftJoin(sellers, eq(products.sellerId, sellers.id))
        .orderBy(asc(products.id))
        .all();
    },

    findById(id: number): ProductWithSeller | undefined {
      return db
        .select({ product: products, seller: sellers })
        .from(products)
        .leftJoin(sellers, eq(products.sellerId, sellers.id))
        .where(eq(products.id, id))
        .get();
    },

    create(input: ProductInput): Product {
      return db
        .insert(products)
        .values({
          name: input.name,
          description: input.description,
          price: input.price,
          sellerId: input.sellerId ?? null,
        })
        .returning()
        .get();
    },

    /** Replaces name, description and price. Returns false when no row has this id. */
    update(id: number, input: ProductInput): boolean {
      const result = db
        .update(products)
        .set({ name: input.name, description: input.description, price: input.price })
        .where(eq(products.id, id))
        .run();
      return result.changes > 0;
    },

    delete(id: number): boolean {
      const result = db.delete(products).where(eq(products.id, id)).run();
      return result.changes > 0;
    },
  };
}

export type ProductsRepository = ReturnType<typeof createProductsRepository>;
