import { describe, expect, it } from "vitest";
import { applyConfigValue, configSchema } from "../../config/schema.js";
import { UserInputError } from "../../shared/errors.js";
import { parseConfigInput } from "./config.js";

const defaults = configSchema.parse({});

describe("parseConfigInput", () => {
  it("converts to the type the key currently holds", () => {
    expect(parseConfigInput(true, "false")).toBe(false);
    expect(parseConfigInput(false, "1")).toBe(true);
    expect(parseConfigInput(2, "4")).toBe(4);
    expect(parseConfigInput("highest", "720p")).toBe("720p");
  });
});

describe("applyConfigValue", () => {
  it("replaces one key", () => {
    expect(applyConfigValue(defaults, "concurrency", 4)).toEqual({ ...defaults, concurrency: 4 });
  });

  it("rejects values the schema refuses", () => {
    expect(() => applyConfigValue(defaults, "concurrency", parseConfigInput(2, "lots"))).toThrow(
      UserInputError
    );
    expect(() => applyConfigValue(defaults, "videoQuality", "4k")).toThrow("Invalid value for videoQuality");
  });
});
