/**
 * @linked-token/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Subnets are given in their text form (`/r314159/0x…`), amounts in
 * GENESIS_BALANCES in display units of the token.
 */

import { z } from "zod";
import type { Address } from "@linked-token/types";
import { isAddress } from "@linked-token/types";
import { parseAmount } from "@linked-token/ledger";
import { normalizeAddress } from "@linked-token/protocol";
import type { Role } from "./types/auth.js";
import { ROLES, isRole } from "./types/auth.js";
import { AddressSchema, SubnetSchema } from "./types/wire.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Token & link
  OWNER_ADDRESS: AddressSchema,
  TOKEN_ADDRESS: AddressSchema,
  TOKEN_SYMBOL: z.string().min(1).default("TOKEN"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  CUSTODY_MODE: z.enum(["lock", "mint"]).default("lock"),
  LOCAL_SUBNET: SubnetSchema,
  LINKED_SUBNET: SubnetSchema,
  LINKED_CONTRACT: AddressSchema.optional(),
  SELF_ADDRESS: AddressSchema,

  // Transport
  GATEWAY_URL: z.string().url().optional(),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),

  // Persistence
  EVENT_LOG_PATH: z.string().min(1).optional(),
  GENESIS_BALANCES: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:0xaddr1,key2:role2:0xaddr2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, address] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be one of: ${ROLES.join(", ")}`,
      );
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, role, address: normalizeAddress(address) });
  }

  return keys;
}

// =============================================================================
// Genesis Balances
// =============================================================================

export interface GenesisBalance {
  readonly holder: Address;
  readonly amount: bigint;
}

/**
 * Parse GENESIS_BALANCES into base units.
 *
 * Format: "0xaddr1:100,0xaddr2:2.5"
 */
export function parseGenesisBalances(raw: string, decimals: number): readonly GenesisBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  const balances: GenesisBalance[] = [];
  const holders = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [holder, amount] = parts;
    if (parts.length !== 2 || holder === undefined || amount === undefined) {
      throw new Error(
        `Invalid GENESIS_BALANCES entry: "${entry.trim()}". Expected format: address:amount`,
      );
    }
    if (!isAddress(holder)) {
      throw new Error(`Invalid address "${holder}" in GENESIS_BALANCES`);
    }
    if (holders.has(holder.toLowerCase())) {
      throw new Error(`Duplicate holder in GENESIS_BALANCES: ${holder}`);
    }

    let units: bigint;
    try {
      units = parseAmount(amount, decimals);
    } catch (err) {
      throw new Error(`Invalid amount "${amount}" in GENESIS_BALANCES`, { cause: err });
    }

    holders.add(holder.toLowerCase());
    balances.push({ holder: normalizeAddress(holder), amount: units });
  }

  return balances;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
