/**
 * JSON wire forms of the protocol types.
 *
 * Bigints travel as decimal strings, subnets in their text form
 * (`/r<root>/<addr>…`), addresses and payloads as 0x-hex.
 */

import { z } from "zod";
import type {
  Address,
  Hex,
  IpcAddress,
  IpcEnvelope,
  SubnetId,
  UnconfirmedTransfer,
} from "@linked-token/types";
import { isAddress, isHex } from "@linked-token/types";
import { formatSubnetId, normalizeAddress, parseSubnetId } from "@linked-token/protocol";

const U64_LIMIT = 1n << 64n;

// =============================================================================
// Primitive Schemas
// =============================================================================

export const AddressSchema = z
  .custom<Address>(isAddress, "Invalid address")
  .transform((address) => normalizeAddress(address));

export const HexSchema = z.custom<Hex>(isHex, "Invalid hex string");

export const DecimalSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative decimal integer string")
  .transform((value) => BigInt(value));

export const U64Schema = DecimalSchema.refine((value) => value < U64_LIMIT, "Exceeds uint64");

export const SubnetSchema = z.string().transform((text, ctx): SubnetId => {
  try {
    return parseSubnetId(text);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : "Invalid subnet id",
    });
    return z.NEVER;
  }
});

export const IpcAddressSchema = z.object({
  subnetId: SubnetSchema,
  rawAddress: AddressSchema,
});

export const EnvelopeSchema = z.object({
  kind: z.enum(["transfer", "call", "result"]),
  localNonce: U64Schema,
  originalNonce: U64Schema,
  value: DecimalSchema,
  from: IpcAddressSchema,
  to: IpcAddressSchema,
  message: HexSchema,
});

// =============================================================================
// JSON Shapes
// =============================================================================

export type IpcAddressJson = z.input<typeof IpcAddressSchema>;
export type EnvelopeJson = z.input<typeof EnvelopeSchema>;

export interface TransferJson {
  readonly id: string;
  readonly sender: string;
  readonly recipient: string;
  readonly amount: string;
  readonly nonce: string;
  readonly createdAt: string;
}

// =============================================================================
// Serializers
// =============================================================================

export function serializeIpcAddress(address: IpcAddress): IpcAddressJson {
  return {
    subnetId: formatSubnetId(address.subnetId),
    rawAddress: address.rawAddress,
  };
}

export function serializeEnvelope(envelope: IpcEnvelope): EnvelopeJson {
  return {
    kind: envelope.kind,
    localNonce: envelope.localNonce.toString(),
    originalNonce: envelope.originalNonce.toString(),
    value: envelope.value.toString(),
    from: serializeIpcAddress(envelope.from),
    to: serializeIpcAddress(envelope.to),
    message: envelope.message,
  };
}

export function serializeTransfer(transfer: UnconfirmedTransfer): TransferJson {
  return {
    id: transfer.id,
    sender: transfer.sender,
    recipient: transfer.recipient,
    amount: transfer.amount.toString(),
    nonce: transfer.nonce.toString(),
    createdAt: transfer.createdAt,
  };
}
