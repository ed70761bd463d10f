/**
 * Runtime validation for orders using Zod.
 * Validate untyped input before handing it to a strategy.
 */

import { z } from "zod";
import type { Address, Order } from "./types.js";
import { validationError } from "./errors.js";

const addressSchema: z.ZodType<Address> = z.object({
  country: z.string(),
  region: z.string().optional(),
  city: z.string().optional(),
  postalCode: z.string().optional(),
  contactName: z.string().optional(),
});

export const orderSchema: z.ZodType<Order> = z.object({
  cost: z.number().finite().nonnegative(),
  destination: addressSchema,
  origin: addressSchema.optional(),
});

/** Validate an order; throws ZodError with details on failure */
export function validateOrder(input: unknown): Order {
  return orderSchema.parse(input);
}

/** Safe parse: returns { success: true, data } or { success: false, error } */
export function parseOrder(input: unknown): z.SafeParseReturnType<unknown, Order> {
  return orderSchema.safeParse(input);
}

/** Flatten zod issues into one "path: message" line each, joined with "; " */
export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
}

/** Parse an order, converting a ZodError into a VALIDATION_ERROR */
export function toValidOrder(input: unknown): Order {
  const result = parseOrder(input);
  if (!result.success) {
    throw validationError(formatIssues(result.error), result.error);
  }
  return result.data;
}
