import { z } from "zod";
import type { ProviderKind } from "@wa-gateway/shared-types";
import { PROVIDER_KINDS } from "../../lib/constants.js";
import type {
  Configuration,
  RateLimitPolicyOverrides,
} from "../store/store.interface.js";

const PolicyOverridesSchema = z
  .object({
    ratePerSecond: z.number().positive().max(1_000).optional(),
    burst: z.number().int().min(1).max(1_000).optional(),
    maxRetries: z.number().int().min(0).max(10).optional(),
    baseDelayMs: z.number().int().min(0).max(60_000).optional(),
    failureThreshold: z.number().int().min(1).max(100).optional(),
    coolDownMs: z.number().int().min(1_000).max(600_000).optional(),
  })
  .strict();

const E164 = /^\+[1-9]\d{9,14}$/;

export const CreateConfigurationSchema = z.object({
  name: z.string().trim().min(2).max(120),
  provider: z.enum(PROVIDER_KINDS),
  token: z.string().min(1, "token is required"),
  deviceId: z.string().min(1).nullable().default(null),
  accountSid: z.string().min(1).nullable().default(null),
  senderPhone: z
    .string()
    .regex(E164, "senderPhone must be in E.164 format, e.g. +14155550100")
    .nullable()
    .default(null),
  channelId: z.string().trim().min(1).max(255),
  webhookSecret: z.string().min(16, "webhookSecret must be at least 16 characters"),
  allowedScopes: z.array(z.string().trim().min(1).max(80)).default([]),
  policyOverrides: PolicyOverridesSchema.nullable().default(null),
});

export const UpdateConfigurationSchema = z
  .object({
    name: z.string().trim().min(2).max(120).optional(),
    token: z.string().min(1).optional(),
    deviceId: z.string().min(1).nullable().optional(),
    accountSid: z.string().min(1).nullable().optional(),
    senderPhone: z.string().regex(E164).nullable().optional(),
    channelId: z.string().trim().min(1).max(255).optional(),
    webhookSecret: z.string().min(16).optional(),
    allowedScopes: z.array(z.string().trim().min(1).max(80)).optional(),
    policyOverrides: PolicyOverridesSchema.nullable().optional(),
  })
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "At least one field must be provided",
  });

export const ListConfigurationsQuerySchema = z.object({
  active: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === "true")),
});

export type CreateConfigurationInput = z.infer<typeof CreateConfigurationSchema>;
export type UpdateConfigurationInput = z.infer<typeof UpdateConfigurationSchema>;

/** What the API returns: credentials are masked. */
export interface ConfigurationResponse {
  id: string;
  name: string;
  provider: ProviderKind;
  token: string;
  deviceId: string | null;
  accountSid: string | null;
  senderPhone: string | null;
  channelId: string;
  webhookSecret: string;
  active: boolean;
  allowedScopes: string[];
  needsAttention: boolean;
  attentionReason: string | null;
  policyOverrides: RateLimitPolicyOverrides | null;
  createdAt: string;
  updatedAt: string;
}

/** "****" plus the last four characters; short secrets are masked entirely. */
export function maskSecret(value: string): string {
  return value.length > 8 ? `****${value.slice(-4)}` : "****";
}

export function toConfigurationResponse(configuration: Configuration): ConfigurationResponse {
  return {
    ...configuration,
    token: maskSecret(configuration.token),
    webhookSecret: maskSecret(configuration.webhookSecret),
  };
}
