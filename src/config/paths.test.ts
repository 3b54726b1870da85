import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { APP_DIR, HISTORY_DB_PATH, expandPath } from "./paths.js";

/** Normalize path to POSIX format for cross-platform test assertions */
const toPosix = (p: string) => p.replace(/\\/g, "/");

describe("expandPath", () => {
  it("expands ~ to home directory", () => {
    const result = toPosix(expandPath("~/Downloads/lecturecap"));
    expect(result).toBe(`${toPosix(homedir())}/Downloads/lecturecap`);
  });

  it("returns absolute paths unchanged", () => {
    expect(expandPath("/usr/local/bin")).toBe("/usr/local/bin");
  });

  it("returns relative paths unchanged", () => {
    expect(expandPath("relative/path")).toBe("relative/path");
  });

  it("handles just ~ correctly", () => {
    expect(expandPath("~")).toBe(homedir());
  });
});

describe("app paths", () => {
  it("keeps state under the app directory", () => {
    expect(toPosix(APP_DIR)).toBe(`${toPosix(homedir())}/.lecturecap`);
    expect(toPosix(HISTORY_DB_PATH)).toBe(`${toPosix(APP_DIR)}/history.db`);
  });
});
