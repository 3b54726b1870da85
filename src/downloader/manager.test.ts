import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Session } from "../session/session.js";
import type { FetchLike } from "../shared/http.js";
import { silentLogger } from "../shared/logger.js";
import { pathExists } from "../shared/fs.js";
import { assignUniqueDestinations, DownloadManager, type DownloadManagerOptions } from "./manager.js";
import type { DownloadEvent, DownloadTask } from "./types.js";

const payload = Uint8Array.from({ length: 100 }, (_, i) => i);
const URL_A = "https://cdn.example.test/a.mp4";

function fakeFetch(handler: (request: Request, call: number) => Response | Promise<Response>) {
  const requests: Request[] = [];
  const fetch: FetchLike = async (input, init) => {
    const request = input instanceof Request ? input : new Request(input, init);
    requests.push(request);
    return handler(request, requests.length);
  };
  return { fetch, requests };
}

function full(body: Uint8Array = payload): Response {
  return new Response(body, { status: 200, headers: { "content-length": String(body.length) } });
}

function ranged(from: number): Response {
  const body = payload.slice(from);
  return new Response(body, {
    status: 206,
    headers: {
      "content-length": String(body.length),
      "content-range": `bytes ${from}-${payload.length - 1}/${payload.length}`,
    },
  });
}

describe("DownloadManager", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lecturecap-download-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function task(name = "a.mp4", overrides: Partial<DownloadTask> = {}): DownloadTask {
    return {
      id: name,
      label: name,
      destination: join(dir, name),
      url: URL_A,
      expectedBytes: payload.length,
      resumeOffset: 0,
      historyKey: undefined,
      ...overrides,
    };
  }

  function manager(fetch: FetchLike, options: DownloadManagerOptions = {}) {
    return new DownloadManager({
      fetch,
      logger: silentLogger,
      retry: { attempts: 3, baseDelayMs: 1 },
      ...options,
    });
  }

  it("downloads into place and removes the partial file", async () => {
    const { fetch } = fakeFetch(() => full());
    const events: DownloadEvent["type"][] = [];

    const [outcome] = await manager(fetch, { sink: (event) => events.push(event.type) }).download([
      task(),
    ]);

    expect(outcome).toMatchObject({ status: "completed", bytes: 100, alreadyPresent: false });
    expect(new Uint8Array(await readFile(join(dir, "a.mp4")))).toEqual(payload);
    expect(await pathExists(join(dir, "a.mp4.part"))).toBe(false);
    expect(events[0]).toBe("started");
    expect(events[events.length - 1]).toBe("completed");
  });

  it("resumes a partial file with a range request", async () => {
    await writeFile(join(dir, "a.mp4.part"), payload.slice(0, 40));
    const { fetch, requests } = fakeFetch((request) => {
      const range = request.headers.get("range");
      return range === "bytes=40-" ? ranged(40) : full();
    });
    const started: DownloadEvent[] = [];

    const downloadTask = task();
    const [outcome] = await manager(fetch, {
      sink: (event) => {
        if (event.type === "started") started.push(event);
      },
    }).download([downloadTask]);

    expect(requests.map((request) => request.headers.get("range"))).toEqual(["bytes=40-"]);
    expect(started).toEqual([
      { type: "started", taskId: "a.mp4", label: "a.mp4", offset: 40, totalBytes: 100 },
    ]);
    expect(outcome?.status).toBe("completed");
    expect(downloadTask.resumeOffset).toBe(100);
    expect(new Uint8Array(await readFile(join(dir, "a.mp4")))).toEqual(payload);
  });

  it("starts over when the server ignores the range", async () => {
    await writeFile(join(dir, "a.mp4.part"), new Uint8Array(40).fill(255));
    const { fetch, requests } = fakeFetch(() => full());

    const [outcome] = await manager(fetch).download([task()]);

    expect(requests.map((request) => request.headers.get("range"))).toEqual(["bytes=40-"]);
    expect(outcome).toMatchObject({ status: "completed", bytes: 100 });
    expect(new Uint8Array(await readFile(join(dir, "a.mp4")))).toEqual(payload);
  });

  it("starts over after 416", async () => {
    await writeFile(join(dir, "a.mp4.part"), new Uint8Array(120).fill(1));
    const { fetch, requests } = fakeFetch((request) =>
      request.headers.get("range") ? new Response(null, { status: 416 }) : full()
    );

    const [outcome] = await manager(fetch).download([task()]);

    expect(requests.map((request) => request.headers.get("range"))).toEqual(["bytes=120-", null]);
    expect(outcome?.status).toBe("completed");
    expect(new Uint8Array(await readFile(join(dir, "a.mp4")))).toEqual(payload);
  });

  it("fails on a size mismatch and keeps the partial file", async () => {
    const { fetch } = fakeFetch(
      () =>
        new Response(payload.slice(0, 60), {
          status: 200,
          headers: { "content-length": "100" },
        })
    );

    const [outcome] = await manager(fetch).download([task()]);

    expect(outcome).toMatchObject({ status: "failed", code: "INTEGRITY_ERROR" });
    expect(await pathExists(join(dir, "a.mp4"))).toBe(false);
    expect((await readFile(join(dir, "a.mp4.part"))).length).toBe(60);
  });

  it("retries a transient failure", async () => {
    const { fetch, requests } = fakeFetch((_request, call) => {
      if (call === 1) throw new TypeError("fetch failed");
      return full();
    });
    const events: DownloadEvent["type"][] = [];

    const [outcome] = await manager(fetch, { sink: (event) => events.push(event.type) }).download([
      task(),
    ]);

    expect(requests).toHaveLength(2);
    expect(events).toContain("retrying");
    expect(outcome?.status).toBe("completed");
  });

  it("reports a partial failure when bytes remain after the last attempt", async () => {
    let sent = false;
    const { fetch } = fakeFetch(() => {
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          if (!sent) {
            sent = true;
            controller.enqueue(payload.slice(0, 30));
          } else {
            controller.error(new TypeError("terminated"));
          }
        },
      });
      return new Response(body, { status: 200, headers: { "content-length": "100" } });
    });

    const [outcome] = await manager(fetch, { retry: { attempts: 1, baseDelayMs: 0 } }).download([
      task(),
    ]);

    expect(outcome).toMatchObject({
      status: "partial",
      bytesWritten: 30,
      code: "NETWORK_ERROR",
      cancelled: false,
    });
  });

  it("fails without retrying when access is refused", async () => {
    const { fetch, requests } = fakeFetch(() => new Response(null, { status: 403 }));

    const [outcome] = await manager(fetch).download([task()]);

    expect(requests).toHaveLength(1);
    expect(outcome).toMatchObject({ status: "failed", code: "AUTH_ERROR" });
  });

  it("fails without retrying on other client errors", async () => {
    const { fetch, requests } = fakeFetch(() => new Response(null, { status: 404 }));

    const [outcome] = await manager(fetch).download([task()]);

    expect(requests).toHaveLength(1);
    expect(outcome).toMatchObject({ status: "failed", code: "NETWORK_ERROR", reason: `HTTP 404 from ${URL_A}` });
  });

  it("skips destinations that already exist", async () => {
    await writeFile(join(dir, "a.mp4"), payload.slice(0, 10));
    const { fetch, requests } = fakeFetch(() => full());

    const [outcome] = await manager(fetch).download([task()]);

    expect(requests).toHaveLength(0);
    expect(outcome).toMatchObject({ status: "completed", bytes: 10, alreadyPresent: true });
  });

  it("renames colliding destinations instead of overwriting", async () => {
    const { fetch } = fakeFetch(() => full());
    const tasks = [task("a.mp4", { id: "1" }), task("a.mp4", { id: "2" })];

    const outcomes = await manager(fetch).download(tasks);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["completed", "completed"]);
    expect(tasks.map((t) => t.destination)).toEqual([join(dir, "a.mp4"), join(dir, "a-2.mp4")]);
    expect(await pathExists(join(dir, "a-2.mp4"))).toBe(true);
  });

  it("keeps at most the configured number of transfers in flight", async () => {
    let active = 0;
    let peak = 0;
    const { fetch } = fakeFetch(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return full();
    });

    const tasks = ["1.mp4", "2.mp4", "3.mp4", "4.mp4"].map((name) => task(name));
    const outcomes = await manager(fetch).download(tasks, 2);

    expect(peak).toBe(2);
    expect(outcomes.every((outcome) => outcome.status === "completed")).toBe(true);
  });

  it("does not start tasks once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { fetch, requests } = fakeFetch(() => full());

    const outcomes = await manager(fetch, { signal: controller.signal }).download([
      task("1.mp4"),
      task("2.mp4"),
    ]);

    expect(requests).toHaveLength(0);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["partial", "partial"]);
    expect(outcomes[0]).toMatchObject({ cancelled: true, bytesWritten: 0 });
  });

  it("stops a running transfer and keeps the partial file for resuming", async () => {
    const controller = new AbortController();
    let pulls = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(stream) {
        pulls++;
        if (pulls <= 2) {
          stream.enqueue(payload.slice((pulls - 1) * 10, pulls * 10));
        } else {
          controller.abort();
        }
      },
    });
    const { fetch } = fakeFetch(
      () => new Response(body, { status: 200, headers: { "content-length": "100" } })
    );

    const downloadTask = task();
    const [outcome] = await manager(fetch, { signal: controller.signal }).download([downloadTask]);

    expect(outcome).toMatchObject({ status: "partial", bytesWritten: 20, cancelled: true });
    expect(downloadTask.resumeOffset).toBe(20);
    expect(new Uint8Array(await readFile(join(dir, "a.mp4.part")))).toEqual(payload.slice(0, 20));
    expect(await pathExists(join(dir, "a.mp4"))).toBe(false);
  });

  it("sends session cookies only to hosts they apply to", async () => {
    const session = new Session("https://video.example.test", [
      { name: "shared", value: "test-secret", domain: ".example.test" },
      { name: "hostonly", value: "test-secret" },
    ]);
    const { fetch, requests } = fakeFetch(() => full());

    await manager(fetch, { session }).download([task()]);

    expect(requests[0]?.headers.get("cookie")).toBe("shared=test-secret");
  });
});

describe("assignUniqueDestinations", () => {
  it("numbers repeats in task order", () => {
    const tasks = ["a.mp4", "b.mp4", "a.mp4", "a.mp4"].map(
      (name, i): DownloadTask => ({
        id: String(i),
        label: name,
        destination: join("/out", name),
        url: URL_A,
        expectedBytes: undefined,
        resumeOffset: 0,
        historyKey: undefined,
      })
    );

    assignUniqueDestinations(tasks);

    expect(tasks.map((t) => t.destination)).toEqual([
      join("/out", "a.mp4"),
      join("/out", "b.mp4"),
      join("/out", "a-2.mp4"),
      join("/out", "a-3.mp4"),
    ]);
  });
});
