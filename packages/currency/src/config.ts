/**
 * @mintage/currency — Configuration.
 *
 * Loads and validates deployment policy from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, normalizeAddress } from "@mintage/types";
import type { CurrencyConfig } from "./types.js";
import { DEFAULT_MINT_CEILING, U64_MAX } from "./uint.js";

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_ROOT_AUTHORITY = "0xA550C18";

export const ConfigSchema = z.object({
  MINTAGE_ROOT_AUTHORITY: z
    .string()
    .refine(isAddress, "must be a 0x-prefixed hex address")
    .transform(normalizeAddress)
    .default(DEFAULT_ROOT_AUTHORITY),
  MINTAGE_MINT_CEILING: z
    .string()
    .regex(/^\d+$/, "must be a base-10 integer")
    .transform((v) => BigInt(v))
    .pipe(z.bigint().positive().max(U64_MAX))
    .default(DEFAULT_MINT_CEILING.toString()),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type LogLevel = AppConfig["LOG_LEVEL"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The policy slice the currency core needs.
 */
export function toCurrencyConfig(config: AppConfig): CurrencyConfig {
  return {
    rootAuthority: config.MINTAGE_ROOT_AUTHORITY,
    mintCeiling: config.MINTAGE_MINT_CEILING,
  };
}

export const DEFAULT_CURRENCY_CONFIG: CurrencyConfig = {
  rootAuthority: normalizeAddress(DEFAULT_ROOT_AUTHORITY),
  mintCeiling: DEFAULT_MINT_CEILING,
};
