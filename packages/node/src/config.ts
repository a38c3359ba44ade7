/**
 * @phasevault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { addressSchema } from "@phasevault/chain";

// =============================================================================
// Schema
// =============================================================================

const addressListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== ""),
  )
  .pipe(z.array(addressSchema).min(1, "At least one wallet owner is required"));

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Wallet
    WALLET_OWNERS: addressListSchema,
    WALLET_REQUIRED: z.coerce.number().int().min(1).default(1),

    // Token
    TOKEN_NAME: z.string().min(1).default("PhaseVault Token"),
    TOKEN_SYMBOL: z.string().min(1).default("PVT"),
    TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
    /** Whole tokens minted to the wallet at startup, as a decimal string */
    TOKEN_INITIAL_SUPPLY: z.string().regex(/^\d+(\.\d+)?$/, "Expected a decimal amount").default("0"),

    // Deployment
    DEPLOYER_ADDRESS: addressSchema.default("0x00000000000000000000000000000000000de910"),
  })
  .superRefine((config, ctx) => {
    if (config.WALLET_REQUIRED > config.WALLET_OWNERS.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WALLET_REQUIRED"],
        message: `Cannot require ${config.WALLET_REQUIRED} approvals from ${config.WALLET_OWNERS.length} owners`,
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

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
