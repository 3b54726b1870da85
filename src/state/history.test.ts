import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DownloadHistory } from "./history.js";

describe("DownloadHistory", () => {
  let history: DownloadHistory;

  beforeEach(() => {
    history = new DownloadHistory(":memory:");
  });

  afterEach(() => {
    history.close();
  });

  it("starts empty", () => {
    expect(history.has("lec-1:primary")).toBe(false);
    expect(history.list()).toEqual([]);
  });

  it("remembers recorded keys", () => {
    history.record("lec-1:primary", "sec-1", "/out/a.mp4", new Date("2024-02-05T10:00:00Z"));

    expect(history.has("lec-1:primary")).toBe(true);
    expect(history.has("lec-1:secondary")).toBe(false);
    expect(history.list()).toEqual([
      {
        key: "lec-1:primary",
        courseId: "sec-1",
        destination: "/out/a.mp4",
        downloadedAt: "2024-02-05T10:00:00.000Z",
      },
    ]);
  });

  it("updates a key recorded twice", () => {
    history.record("lec-1:primary", "sec-1", "/out/a.mp4", new Date("2024-02-05T10:00:00Z"));
    history.record("lec-1:primary", "sec-1", "/out/b.mp4", new Date("2024-02-06T10:00:00Z"));

    expect(history.list().map((record) => record.destination)).toEqual(["/out/b.mp4"]);
  });

  it("lists and clears per course", () => {
    history.record("a:primary", "sec-1", "/out/a.mp4", new Date("2024-02-05T10:00:00Z"));
    history.record("b:primary", "sec-2", "/out/b.mp4", new Date("2024-02-04T10:00:00Z"));

    expect(history.list("sec-2").map((record) => record.key)).toEqual(["b:primary"]);
    expect(history.list().map((record) => record.key)).toEqual(["b:primary", "a:primary"]);

    expect(history.clear("sec-1")).toBe(1);
    expect(history.has("a:primary")).toBe(false);
    expect(history.has("b:primary")).toBe(true);
  });
});
