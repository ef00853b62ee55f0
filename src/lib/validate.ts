import { z, type ZodTypeAny } from "zod";
import { RequestValidationError } from "../middlewares/errorHandler.js";

export const productBodySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  price: z.number().int().safe(),
  seller_id: z.number().int().positive().nullable().optional(),
});

// Updates replace name, description and price only; a seller_id in the body is dropped.
export const productUpdateSchema = productBodySchema.omit({ seller_id: true });

export const sellerBodySchema = z.object({
  username: z.string().min(1),
  email: z.string().email(),
  password: z.string().min(1),
});

export const loginBodySchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const idParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, "Expected a positive integer")
    .pipe(z.coerce.number().int().positive().safe()),
});

export type ProductBody = z.infer<typeof productBodySchema>;
export type ProductUpdateBody = z.infer<typeof productUpdateSchema>;
export type SellerBody = z.infer<typeof sellerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;

function parseWith<T extends ZodTypeAny>(location: "body" | "path", schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) throw new RequestValidationError(location, result.error);
  return result.data;
}

export const parseBody = <T extends ZodTypeAny>(schema: T, body: unknown): z.infer<T> =>
  parseWith("body", schema, body ?? {});

export const parseId = (params: unknown): number => parseWith("path", idParamSchema, params).id;
