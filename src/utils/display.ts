import type { Product, Seller } from "../db/schema.js";

export interface SellerDisplay {
  username: string;
  email: string;
}

export interface ProductDisplay {
  name: string;
  description: string;
  seller: SellerDisplay | null;
}

export interface ProductFull {
  id: number;
  name: string;
  description: string;
  price: number;
  seller_id: number | null;
}

export interface SellerFull {
  id: number;
  username: string;
  email: string;
  password_hash: string;
}

export function displaySeller(seller: Seller): SellerDisplay {
  return { username: seller.username, email: seller.email };
}

// Price is never part of the display form.
export function displayProduct(product: Product, seller: Seller | null): ProductDisplay {
  return {
    name: product.name,
    description: product.description,
    seller: seller ? displaySeller(seller) : null,
  };
}

export function fullProduct(product: Product): ProductFull {
  return {
    id: product.id,
    name: product.name,
    description: product.description,
    price: product.price,
    seller_id: product.sellerId,
  };
}

/** Registration response. Includes the password hash; see DESIGN.md, flagged item (a). */
export function fullSeller(seller: Seller): SellerFull {
  return {
    id: seller.id,
    username: seller.username,
    email: seller.email,
    password_hash: seller.passwordHash,
  };
}
