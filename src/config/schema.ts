import { z } from "zod";
import { UserInputError } from "../shared/errors.js";

/**
 * Video quality preferences for downloads.
 * Fixed resolutions fall back to the closest lower height.
 */
export const VIDEO_QUALITIES = ["highest", "lowest", "1080p", "720p", "480p", "360p"] as const;

export const videoQualitySchema = z.enum(VIDEO_QUALITIES);

export type VideoQuality = z.infer<typeof videoQualitySchema>;

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  outputDir: z.string().default("~/Downloads/lecturecap"),
  videoQuality: videoQualitySchema.default("highest"),
  concurrency: z.number().int().min(1).max(8).default(2),
  metadataConcurrency: z.number().int().min(1).max(16).default(4),
  retryAttempts: z.number().int().min(1).max(10).default(3),
  retryBaseDelayMs: z.number().int().min(0).max(60000).default(1000),
  requestTimeoutMs: z.number().int().min(1000).max(300000).default(30000),
  includeSecondaryTracks: z.boolean().default(true),
  vaultPath: z.string().default("~/.lecturecap/session.vault"),
  historyEnabled: z.boolean().default(false),
  loginTimeoutSeconds: z.number().int().min(30).max(3600).default(300),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Retry policy shared by metadata fetches and transfers.
 * `attempts` counts the first try.
 */
export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export function retryPolicyFromConfig(config: Config): RetryPolicy {
  return { attempts: config.retryAttempts, baseDelayMs: config.retryBaseDelayMs };
}

/**
 * Validates `current` with one key replaced. Throws UserInputError with the
 * schema's message when the result is not a valid config.
 */
export function applyConfigValue(current: Config, key: string, value: unknown): Config {
  const result = configSchema.safeParse({ ...current, [key]: value });
  if (!result.success) {
    throw new UserInputError(`Invalid value for ${key}`, {
      details: z.prettifyError(result.error),
    });
  }
  return result.data;
}
