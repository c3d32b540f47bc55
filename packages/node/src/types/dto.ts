/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, query and path validation.
 */

import { z } from "zod";
import { AddressSchema, HexSchema } from "./wire.js";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Token amount in display units, e.g. "12.5". Scaled by the token's decimals. */
export const TokenAmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Expected a decimal amount such as \"12.5\"");

export const TransferIdSchema = HexSchema.refine(
  (id) => id.length === 66,
  "Transfer id must be 32 bytes",
);

// =============================================================================
// Transfer DTOs
// =============================================================================

export const InitiateTransferSchema = z.object({
  /** Must match the caller when given */
  sender: AddressSchema.optional(),
  recipient: AddressSchema,
  amount: TokenAmountSchema,
});

export type InitiateTransferDto = z.infer<typeof InitiateTransferSchema>;

export const ListTransfersQuerySchema = z.object({
  sender: AddressSchema.optional(),
  recipient: AddressSchema.optional(),
});

export type ListTransfersQuery = z.infer<typeof ListTransfersQuerySchema>;

export const TransferIdParamSchema = z.object({
  id: TransferIdSchema,
});

// =============================================================================
// Link DTOs
// =============================================================================

export const LinkContractSchema = z.object({
  linkedContract: AddressSchema,
});

export type LinkContractDto = z.infer<typeof LinkContractSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  type: z.string().min(1).optional(),
  /** Return events after this global position */
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Balance DTOs
// =============================================================================

export const BalanceParamSchema = z.object({
  address: AddressSchema,
});
