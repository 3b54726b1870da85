import { basename, dirname, extname, join } from "node:path";
import type { KyInstance } from "ky";
import PQueue from "p-queue";
import type { RetryPolicy } from "../config/schema.js";
import type { Session } from "../session/session.js";
import { type ErrorCode, LectureCapError, errorMessage } from "../shared/errors.js";
import { getFileSize, pathExists } from "../shared/fs.js";
import { createDownloadClient, type FetchLike } from "../shared/http.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { DEFAULT_RETRY_POLICY, retryTransient } from "../shared/retry.js";
import { getPartialPath, transferFile } from "./transfer.js";
import type { DownloadOutcome, DownloadSink, DownloadTask } from "./types.js";

export interface DownloadManagerOptions {
  /** Parallel transfers (default: 2) */
  concurrency?: number | undefined;
  retry?: RetryPolicy | undefined;
  timeoutMs?: number | undefined;
  fetch?: FetchLike | undefined;
  /** Supplies cookies for media hosts the session's cookies apply to */
  session?: Session | undefined;
  signal?: AbortSignal | undefined;
  sink?: DownloadSink | undefined;
  logger?: Logger | undefined;
}

/**
 * Makes destinations unique in task order: the second task writing to
 * `a.mp4` becomes `a-2.mp4`, the third `a-3.mp4`. Mutates the tasks.
 */
export function assignUniqueDestinations(tasks: readonly DownloadTask[]): void {
  const taken = new Set<string>();

  for (const task of tasks) {
    let candidate = task.destination;
    const extension = extname(candidate);
    const stem = join(dirname(candidate), basename(candidate, extension));

    for (let suffix = 2; taken.has(candidate); suffix++) {
      candidate = `${stem}-${suffix}${extension}`;
    }

    taken.add(candidate);
    task.destination = candidate;
  }
}

/**
 * Runs download tasks through a bounded queue.
 *
 * Every task yields exactly one outcome, in task order; a failing task never
 * stops its siblings.
 */
export class DownloadManager {
  private readonly options: DownloadManagerOptions;
  private readonly client: KyInstance;
  private readonly logger: Logger;

  constructor(options: DownloadManagerOptions = {}) {
    this.options = options;
    this.client = createDownloadClient({ timeoutMs: options.timeoutMs, fetch: options.fetch });
    this.logger = options.logger ?? createLogger("download");
  }

  async download(
    tasks: DownloadTask[],
    concurrencyLimit: number = this.options.concurrency ?? 2
  ): Promise<DownloadOutcome[]> {
    assignUniqueDestinations(tasks);

    const queue = new PQueue({ concurrency: Math.max(1, concurrencyLimit) });
    const outcomes: DownloadOutcome[] = [];

    await queue.addAll(
      tasks.map((task, index) => async () => {
        outcomes[index] = await this.runTask(task);
      })
    );

    return outcomes;
  }

  private emit(...args: Parameters<DownloadSink>): void {
    this.options.sink?.(...args);
  }

  private async runTask(task: DownloadTask): Promise<DownloadOutcome> {
    const { signal } = this.options;

    if (signal?.aborted) {
      return this.interrupted(task, "Cancelled before start", undefined, true);
    }

    if (await pathExists(task.destination)) {
      const bytes = (await getFileSize(task.destination)) ?? 0;
      this.logger.debug(`Already present: ${task.destination}`);
      this.emit({ type: "completed", taskId: task.id, bytes, alreadyPresent: true });
      return { status: "completed", task, bytes, alreadyPresent: true };
    }

    const headers = this.headersFor(task.url);

    try {
      const result = await retryTransient(
        () =>
          transferFile(this.client, task, {
            headers,
            signal,
            onStart: (offset, totalBytes) => {
              if (offset > 0) this.logger.debug(`Resuming ${task.label} at byte ${offset}`);
              this.emit({ type: "started", taskId: task.id, label: task.label, offset, totalBytes });
            },
            onProgress: (bytes, totalBytes) =>
              this.emit({ type: "progress", taskId: task.id, bytes, totalBytes }),
          }),
        this.options.retry ?? DEFAULT_RETRY_POLICY,
        {
          signal,
          onRetry: (error, attempt) => {
            this.logger.debug(`${task.label}: attempt ${attempt} failed (${errorMessage(error)})`);
            this.emit({ type: "retrying", taskId: task.id, attempt, reason: errorMessage(error) });
          },
        }
      );

      this.emit({ type: "completed", taskId: task.id, bytes: result.bytes, alreadyPresent: false });
      return { status: "completed", task, bytes: result.bytes, alreadyPresent: false };
    } catch (error) {
      const code = error instanceof LectureCapError ? error.code : undefined;

      if (signal?.aborted) {
        return this.interrupted(task, "Cancelled", code, true);
      }
      if (code === "INTEGRITY_ERROR" || code === "AUTH_ERROR") {
        return this.failed(task, errorMessage(error), code);
      }
      return this.interrupted(task, errorMessage(error), code, false);
    }
  }

  /**
   * Cookies go only to hosts the session's cookies apply to.
   */
  private headersFor(url: string): Record<string, string> | undefined {
    const cookie = this.options.session?.cookieHeaderFor(url);
    return cookie ? { Cookie: cookie } : undefined;
  }

  /**
   * Partial failure when bytes are left to resume from, otherwise failure.
   */
  private async interrupted(
    task: DownloadTask,
    reason: string,
    code: ErrorCode | undefined,
    cancelled: boolean
  ): Promise<DownloadOutcome> {
    const bytesWritten = (await getFileSize(getPartialPath(task.destination))) ?? 0;
    if (bytesWritten > 0 || cancelled) {
      this.emit({ type: "failed", taskId: task.id, reason });
      return { status: "partial", task, bytesWritten, reason, code, cancelled };
    }
    return this.failed(task, reason, code);
  }

  private failed(
    task: DownloadTask,
    reason: string,
    code: ErrorCode | undefined
  ): DownloadOutcome {
    this.logger.debug(`${task.label} failed: ${reason}`);
    this.emit({ type: "failed", taskId: task.id, reason });
    return { status: "failed", task, reason, code };
  }
}
