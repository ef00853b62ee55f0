const json = (ref: string) => ({ "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } });

export const sellersPaths = {
  "/seller": {
    post: {
      tags: ["Seller"],
      summary: "Register a seller",
      description: "Responds with the stored record, password hash included.",
      requestBody: {
        required: true,
        content: {
          "application/json": {
            schema: { $ref: "#/components/schemas/SellerInput" },
            example: { username: "alice", email: "a@x.com", password: "Secret123" },
          },
        },
      },
      responses: {
        "200": { description: "Registered", content: json("Seller") },
        "409": { description: "Username taken", content: json("Error") },
        "422": { description: "Invalid body", content: json("ValidationError") },
      },
    },
  },
  "/seller/me": {
    get: {
      tags: ["Seller"],
      summary: "The seller the bearer token was issued to",
      security: [{ bearerAuth: [] }],
      responses: {
        "200": { description: "Seller", content: json("SellerDisplay") },
        "401": { description: "Missing, invalid or expired token", content: json("Error") },
        "404": { description: "Seller no longer exists", content: json("Error") },
      },
    },
  },
  "/login": {
    post: {
      tags: ["Login"],
      summary: "Exchange credentials for a bearer token",
      requestBody: { required: true, content: json("LoginInput") },
      responses: {
        "200": { description: "Token issued", content: json("Token") },
        "404": { description: "Invalid user or invalid password", content: json("Error") },
        "422": { description: "Invalid body", content: json("ValidationError") },
      },
    },
  },
} as const;

export const sellerSchemas = {
  SellerInput: {
    type: "object",
    required: ["username", "email", "password"],
    properties: {
      username: { type: "string", minLength: 1 },
      email: { type: "string", format: "email" },
      password: { type: "string", minLength: 1 },
    },
  },
  Seller: {
    type: "object",
    properties: {
      id: { type: "integer" },
      username: { type: "string" },
      email: { type: "string" },
      password_hash: { type: "string" },
    },
  },
  SellerDisplay: {
    type: "object",
    properties: { username: { type: "string" }, email: { type: "string" } },
  },
  LoginInput: {
    type: "object",
    required: ["username", "password"],
    properties: { username: { type: "string" }, password: { type: "string" } },
  },
  Token: {
    type: "object",
    properties: {
      access_token: { type: "string" },
      token_type: { type: "string", enum: ["bearer"] },
    },
  },
} as const;
