import { productSchemas, productsPaths } from "./products.js";
import { sellerSchemas, sellersPaths } from "./sellers.js";

export const openApiDocument = {
  openapi: "3.0.3",
  info: {
    title: "Products API",
    version: "1.0.0",
    description: "Product catalog with seller registration and bearer-token login.",
  },
  tags: [{ name: "Products" }, { name: "Seller" }, { name: "Login" }],
  paths: {
    ...productsPaths,
    ...sellersPaths,
  },
  components: {
    securitySchemes: {
      bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
    },
    schemas: {
      ...productSchemas,
      ...sellerSchemas,
      Message: { type: "object", properties: { message: { type: "string" } } },
      Error: { type: "object", properties: { detail: { type: "string" } } },
      ValidationError: {
        type: "object",
        properties: {
          detail: {
            type: "array",
            items: {
              type: "object",
              properties: {
                loc: { type: "array", items: { oneOf: [{ type: "string" }, { type: "integer" }] } },
                msg: { type: "string" },
                type: { type: "string" },
              },
            },
          },
        },
      },
    },
  },
} as const;
