const json = (ref: string) => ({ "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } });

const idParameter = {
  name: "id",
  in: "path",
  required: true,
  schema: { type: "integer", minimum: 1 },
  description: "Product id",
} as const;

const productBody = {
  required: true,
  content: json("ProductInput"),
} as const;

export const productsPaths = {
  "/products": {
    get: {
      tags: ["Products"],
      summary: "List products",
      description: "Every product in insertion order, without prices.",
      responses: {
        "200": {
          description: "Products",
          content: { "application/json": { schema: { type: "array", items: { $ref: "#/components/schemas/ProductDisplay" } } } },
        },
      },
    },
  },
  "/product": {
    post: {
      tags: ["Products"],
      summary: "Create a product",
      requestBody: {
        ...productBody,
        content: {
          "application/json": {
            ...productBody.content["application/json"],
            example: { name: "Laptop", description: "16GB RAM", price: 129999 },
          },
        },
      },
      responses: {
        "201": { description: "Created", content: json("Product") },
        "422": { description: "Invalid body", content: json("ValidationError") },
      },
    },
  },
  "/product/{id}": {
    get: {
      tags: ["Products"],
      summary: "Get a product",
      parameters: [idParameter],
      responses: {
        "200": { description: "Product", content: json("ProductDisplay") },
        "404": { description: "Not found", content: json("Error") },
        "422": { description: "Invalid id", content: json("ValidationError") },
      },
    },
    put: {
      tags: ["Products"],
      summary: "Replace a product's name, description and price",
      parameters: [idParameter],
      requestBody: productBody,
      responses: {
        "200": { description: "Updated", content: json("Message") },
        "404": { description: "Not found", content: json("Error") },
        "422": { description: "Invalid id or body", content: json("ValidationError") },
      },
    },
    delete: {
      tags: ["Products"],
      summary: "Delete a product",
      parameters: [idParameter],
      responses: {
        "200": { description: "Deleted", content: json("Deleted") },
        "404": { description: "Not found", content: json("Error") },
      },
    },
  },
} as const;

export const productSchemas = {
  ProductInput: {
    type: "object",
    required: ["name", "description", "price"],
    properties: {
      name: { type: "string", minLength: 1 },
      description: { type: "string" },
      price: { type: "integer", description: "Smallest currency unit" },
      seller_id: { type: "integer", nullable: true, description: "Owning seller; ignored on update" },
    },
  },
  Product: {
    type: "object",
    properties: {
      id: { type: "integer" },
      name: { type: "string" },
      description: { type: "string" },
      price: { type: "integer" },
      seller_id: { type: "integer", nullable: true },
    },
  },
  ProductDisplay: {
    type: "object",
    properties: {
      name: { type: "string" },
      description: { type: "string" },
      seller: { allOf: [{ $ref: "#/components/schemas/SellerDisplay" }], nullable: true },
    },
  },
  Deleted: {
    type: "object",
    properties: { message: { type: "string" }, id: { type: "integer" } },
  },
} as const;
