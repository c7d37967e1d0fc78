/**
 * @strongbox/demo — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { PublicKey } from "@solana/web3.js";
import { z } from "zod";

function isAddress(value: string): boolean {
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Program
  VAULT_PROGRAM_ID: z
    .string()
    .default("BfJKG9PC4yKEJF1NkUppnSvXUoGjJgPKXEjNgkZthdPF")
    .refine(isAddress, { message: "VAULT_PROGRAM_ID must be a base58 32-byte address" })
    .transform((value) => new PublicKey(value)),

  // Rent
  RENT_LAMPORTS_PER_BYTE_YEAR: z.coerce.bigint().positive().default(3480n),
  RENT_EXEMPTION_THRESHOLD: z.coerce.bigint().positive().default(2n),

  // Walkthrough
  DEMO_AIRDROP_LAMPORTS: z.coerce
    .bigint()
    .nonnegative()
    .lte(18_446_744_073_709_551_615n)
    .default(10_000_000_000n),
});

export type DemoConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  return ConfigSchema.parse(env);
}
