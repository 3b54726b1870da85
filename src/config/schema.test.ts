import { describe, expect, it } from "vitest";
import { configSchema, retryPolicyFromConfig, videoQualitySchema } from "./schema.js";

describe("configSchema", () => {
  it("parses empty object with defaults", () => {
    const result = configSchema.parse({});
    expect(result).toEqual({
      outputDir: "~/Downloads/lecturecap",
      videoQuality: "highest",
      concurrency: 2,
      metadataConcurrency: 4,
      retryAttempts: 3,
      retryBaseDelayMs: 1000,
      requestTimeoutMs: 30000,
      includeSecondaryTracks: true,
      vaultPath: "~/.lecturecap/session.vault",
      historyEnabled: false,
      loginTimeoutSeconds: 300,
    });
  });

  it("accepts valid config values", () => {
    const result = configSchema.parse({
      outputDir: "/custom/path",
      videoQuality: "720p",
      concurrency: 4,
      historyEnabled: true,
    });
    expect(result).toMatchObject({
      outputDir: "/custom/path",
      videoQuality: "720p",
      concurrency: 4,
      historyEnabled: true,
    });
  });

  it("rejects invalid video quality", () => {
    expect(() => configSchema.parse({ videoQuality: "4k" })).toThrow();
  });

  it("rejects concurrency outside valid range", () => {
    expect(() => configSchema.parse({ concurrency: 0 })).toThrow();
    expect(() => configSchema.parse({ concurrency: 9 })).toThrow();
    expect(() => configSchema.parse({ metadataConcurrency: 17 })).toThrow();
  });

  it("rejects retry attempts outside valid range", () => {
    expect(() => configSchema.parse({ retryAttempts: 0 })).toThrow();
    expect(() => configSchema.parse({ retryAttempts: 11 })).toThrow();
  });

  it("accepts all valid video quality values", () => {
    const qualities = ["highest", "lowest", "1080p", "720p", "480p", "360p"] as const;
    for (const quality of qualities) {
      expect(videoQualitySchema.parse(quality)).toBe(quality);
    }
  });
});

describe("retryPolicyFromConfig", () => {
  it("reads attempts and base delay", () => {
    const config = configSchema.parse({ retryAttempts: 5, retryBaseDelayMs: 250 });
    expect(retryPolicyFromConfig(config)).toEqual({ attempts: 5, baseDelayMs: 250 });
  });
});
