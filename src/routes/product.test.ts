import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { startTestServer, type TestServer } from "../testServer.js";
import { createProductsRepository } from "../repositories/products.repository.js";

const laptop = { name: "Laptop", description: "16GB RAM", price: 129999 };
const phone = { name: "Phone", description: "128GB storage", price: 59900 };

describe("product routes", () => {
  let api: TestServer;

  beforeEach(async () => {
    api = await startTestServer();
  });

  afterEach(async () => {
    await api.stop();
  });

  it("returns the full product on creation and the display form on read", async () => {
    const created = await api.request("POST", "/product", { body: laptop });
    expect(created).toEqual({
      status: 201,
      body: { id: 1, name: "Laptop", description: "16GB RAM", price: 129999, seller_id: null },
    });

    const fetched = await api.request("GET", "/product/1");
    expect(fetched).toEqual({
      status: 200,
      body: { name: "Laptop", description: "16GB RAM", seller: null },
    });
  });

  it("lists products in creation order without prices", async () => {
    await api.request("POST", "/product", { body: laptop });
    await api.request("POST", "/product", { body: phone });

    const list = await api.request("GET", "/products");
    expect(list).toEqual({
      status: 200,
      body: [
        { name: "Laptop", description: "16GB RAM", seller: null },
        { name: "Phone", description: "128GB storage", seller: null },
      ],
    });
  });

  it("lists an empty catalog as an empty array", async () => {
    expect(await api.request("GET", "/products")).toEqual({ status: 200, body: [] });
  });

  it("nests the owning seller's display form, never its hash", async () => {
    await api.request("POST", "/seller", { body: { username: "alice", email: "a@x.com", password: "Secret123" } });
    const created = await api.request("POST", "/product", { body: { ...laptop, seller_id: 1 } });
    expect(created.body).toEqual({ id: 1, ...laptop, seller_id: 1 });

    const list = await api.request("GET", "/products");
    expect(list.body).toEqual([
      { name: "Laptop", description: "16GB RAM", seller: { username: "alice", email: "a@x.com" } },
    ]);
  });

  it("rejects a seller_id that names no seller", async () => {
    const res = await api.request("POST", "/product", { body: { ...laptop, seller_id: 42 } });
    expect(res).toEqual({
      status: 422,
      body: {
        detail: [{ loc: ["body", "seller_id"], msg: "Seller with id 42 does not exist", type: "custom" }],
      },
    });
  });

  it("reports each missing or mistyped field", async () => {
    const res = await api.request("POST", "/product", { body: { name: "Laptop", price: "cheap" } });
    expect(res).toEqual({
      status: 422,
      body: {
        detail: [
          { loc: ["body", "description"], msg: "Required", type: "invalid_type" },
          { loc: ["body", "price"], msg: "Expected number, received string", type: "invalid_type" },
        ],
      },
    });
  });

  it("rejects a non-integer price", async () => {
    const res = await api.request("POST", "/product", { body: { ...laptop, price: 12.5 } });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      detail: [{ loc: ["body", "price"], msg: "Expected integer, received float", type: "invalid_type" }],
    });
  });

  it("rejects prices beyond the safe integer range", async () => {
    const huge = await api.request("POST", "/product", { body: { ...laptop, price: 1e300 } });
    expect(huge.status).toBe(422);
    expect(huge.body).toMatchObject({ detail: [{ loc: ["body", "price"], type: "too_big" }] });

    const rounded = await api.request("POST", "/product", {
      raw: '{"name":"Laptop","description":"16GB RAM","price":9007199254740993}',
    });
    expect(rounded.status).toBe(422);
    expect(rounded.body).toMatchObject({ detail: [{ loc: ["body", "price"], type: "too_big" }] });

    const negative = await api.request("POST", "/product", { body: { ...laptop, price: -1e300 } });
    expect(negative.body).toMatchObject({ detail: [{ loc: ["body", "price"], type: "too_small" }] });

    expect(await api.request("GET", "/products")).toEqual({ status: 200, body: [] });
  });

  it("accepts the largest safe integer price", async () => {
    const res = await api.request("POST", "/product", { body: { ...laptop, price: Number.MAX_SAFE_INTEGER } });
    expect(res).toEqual({
      status: 201,
      body: { id: 1, name: "Laptop", description: "16GB RAM", price: 9007199254740991, seller_id: null },
    });
  });

  it("answers 404 for an unknown product id", async () => {
    expect(await api.request("GET", "/product/5")).toEqual({
      status: 404,
      body: { detail: "Product with id 5 not found" },
    });
  });

  it("answers 422 for a path id that is not a number", async () => {
    const res = await api.request("GET", "/product/abc");
    expect(res).toEqual({
      status: 422,
      body: { detail: [{ loc: ["path", "id"], msg: "Expected a positive integer", type: "invalid_string" }] },
    });
  });

  it("accepts only plain decimal digits as a path id", async () => {
    await api.request("POST", "/product", { body: laptop });
    expect((await api.request("GET", "/product/1")).status).toBe(200);

    for (const id of ["0x1", "1e0", "1.0", "%201", "-1"]) {
      const res = await api.request("GET", `/product/${id}`);
      expect(res.status, id).toBe(422);
      expect(res.body, id).toMatchObject({ detail: [{ loc: ["path", "id"] }] });
    }
  });

  it("answers 422 for a path id of zero", async () => {
    const res = await api.request("DELETE", "/product/0");
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ detail: [{ loc: ["path", "id"], type: "too_small" }] });
  });

  it("replaces name, description and price on update", async () => {
    await api.request("POST", "/product", { body: laptop });

    const res = await api.request("PUT", "/product/1", { body: { ...laptop, price: 119999 } });
    expect(res).toEqual({ status: 200, body: { message: "Product: 1 is successfully updated" } });

    const stored = createProductsRepository(api.db).findById(1);
    expect(stored?.product).toEqual({
      id: 1,
      name: "Laptop",
      description: "16GB RAM",
      price: 119999,
      sellerId: null,
    });
  });

  it("keeps the owner when a product is updated", async () => {
    await api.request("POST", "/seller", { body: { username: "alice", email: "a@x.com", password: "Secret123" } });
    await api.request("POST", "/product", { body: { ...laptop, seller_id: 1 } });

    await api.request("PUT", "/product/1", { body: { name: "Laptop Pro", description: "32GB RAM", price: 199999 } });

    const stored = createProductsRepository(api.db).findById(1);
    expect(stored?.product).toEqual({
      id: 1,
      name: "Laptop Pro",
      description: "32GB RAM",
      price: 199999,
      sellerId: 1,
    });
  });

  it("ignores a seller_id sent with an update", async () => {
    await api.request("POST", "/product", { body: laptop });

    const res = await api.request("PUT", "/product/1", { body: { ...laptop, seller_id: 999 } });
    expect(res).toEqual({ status: 200, body: { message: "Product: 1 is successfully updated" } });
    expect(createProductsRepository(api.db).findById(1)?.product.sellerId).toBeNull();
  });

  it("answers 404 when updating an unknown product", async () => {
    expect(await api.request("PUT", "/product/42", { body: laptop })).toEqual({
      status: 404,
      body: { detail: "Product with id 42 not found" },
    });
  });

  it("deletes a product and confirms with its id", async () => {
    await api.request("POST", "/product", { body: laptop });

    expect(await api.request("DELETE", "/product/1")).toEqual({
      status: 200,
      body: { message: "Product deleted successfully", id: 1 },
    });
    expect((await api.request("GET", "/product/1")).status).toBe(404);
  });

  it("answers 404 when deleting from an empty store", async () => {
    expect(await api.request("DELETE", "/product/99999")).toEqual({
      status: 404,
      body: { detail: "Product with id 99999 not found" },
    });
  });

  it("answers 400 for a body that is not valid JSON", async () => {
    expect(await api.request("POST", "/product", { raw: "{" })).toEqual({
      status: 400,
      body: { detail: "Malformed JSON body" },
    });
  });
});
