import { eq } from "drizzle-orm";
import type { Db } from "../db/client.js";
import { sellers, type NewSeller, type Seller } from "../db/schema.js";

export function createSellersRepository(db: Db) {
  return {
    findById(id: number): Seller | undefined {
      return db.select().from(sellers).where(eq(sellers.id, id)).get();
    },

    findByUsername(username: string): Seller | undefined {
      return db.select().from(sellers).where(eq(sellers.username, username)).get();
    },

    create(data: NewSeller): Seller {
      return db.insert(sellers).values(data).returning().get();
    },
  };
}

export type SellersRepository = ReturnType<typeof createSellersRepository>;
