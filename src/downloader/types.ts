/**
 * Types shared by the transfer and the download manager.
 */
import type { ErrorCode } from "../shared/errors.js";

// ============================================================================
// Tasks
// ============================================================================

/**
 * One file to fetch. `resumeOffset` is the only field that changes while
 * the task runs: it tracks the bytes safely on disk in the partial file.
 */
export interface DownloadTask {
  id: string;
  /** Human-readable name for progress output */
  label: string;
  destination: string;
  url: string;
  /** Size reported by the catalog, used when the server reports none */
  expectedBytes: number | undefined;
  resumeOffset: number;
  /** DownloadHistory key, `<lecture id>:<track>` */
  historyKey: string | undefined;
}

// ============================================================================
// Outcomes
// ============================================================================

export interface CompletedOutcome {
  status: "completed";
  task: DownloadTask;
  bytes: number;
  /** The destination already existed; nothing was fetched */
  alreadyPresent: boolean;
}

export interface PartialOutcome {
  status: "partial";
  task: DownloadTask;
  /** Bytes kept in the partial file for the next run */
  bytesWritten: number;
  reason: string;
  code: ErrorCode | undefined;
  cancelled: boolean;
}

export interface FailedOutcome {
  status: "failed";
  task: DownloadTask;
  reason: string;
  code: ErrorCode | undefined;
}

export type DownloadOutcome = CompletedOutcome | PartialOutcome | FailedOutcome;

// ============================================================================
// Progress events
// ============================================================================

export type DownloadEvent =
  | { type: "started"; taskId: string; label: string; offset: number; totalBytes: number | undefined }
  | { type: "progress"; taskId: string; bytes: number; totalBytes: number | undefined }
  | { type: "retrying"; taskId: string; attempt: number; reason: string }
  | { type: "completed"; taskId: string; bytes: number; alreadyPresent: boolean }
  | { type: "failed"; taskId: string; reason: string };

/**
 * Push-model progress sink. Called synchronously from the transfer loop,
 * so it must not block.
 */
export type DownloadSink = (event: DownloadEvent) => void;
