/**
 * Resumable single-file transfer.
 *
 * Bytes go to `<destination>.part` and the file is renamed into place only
 * once the byte count matches the expected total.
 */
import { open, rename } from "node:fs/promises";
import { dirname } from "node:path";
import type { KyInstance } from "ky";
import { AuthError, IntegrityError, NetworkError, isAuthStatus } from "../shared/errors.js";
import { ensureDir, getFileSize } from "../shared/fs.js";
import { toTransportError } from "../shared/http.js";
import type { DownloadTask } from "./types.js";

export interface TransferOptions {
  /** Extra request headers, e.g. the session cookie for the media host */
  headers?: Record<string, string> | undefined;
  signal?: AbortSignal | undefined;
  onStart?: ((offset: number, totalBytes: number | undefined) => void) | undefined;
  onProgress?: ((bytes: number, totalBytes: number | undefined) => void) | undefined;
}

export interface TransferResult {
  bytes: number;
  /** Offset the transfer continued from; 0 for a fresh download */
  resumedFrom: number;
}

export function getPartialPath(destination: string): string {
  return `${destination}.part`;
}

/**
 * Parses `Content-Range: bytes <start>-<end>/<total|*>`.
 */
export function parseContentRange(
  header: string | null
): { start: number; total: number | undefined } | undefined {
  const match = /^bytes (\d+)-\d+\/(\d+|\*)$/.exec(header?.trim() ?? "");
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  return {
    start: Number(match[1]),
    total: match[2] === "*" ? undefined : Number(match[2]),
  };
}

async function request(
  client: KyInstance,
  url: string,
  offset: number,
  options: TransferOptions
): Promise<Response> {
  const headers = offset > 0 ? { ...options.headers, Range: `bytes=${offset}-` } : options.headers;
  try {
    return await client.get(url, {
      ...(headers ? { headers } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
    });
  } catch (error) {
    throw toTransportError(error, url);
  }
}

function assertUsable(response: Response, url: string): void {
  if (isAuthStatus(response.status)) {
    throw new AuthError(`Download refused (HTTP ${response.status})`, { details: url });
  }
  if (!response.ok) {
    throw new NetworkError(`HTTP ${response.status} from ${url}`, {
      statusCode: response.status,
    });
  }
}

/**
 * Total size of the complete file as reported by the server, if it says.
 */
function reportedTotal(response: Response, offset: number): number | undefined {
  if (response.status === 206) {
    const range = parseContentRange(response.headers.get("content-range"));
    if (range?.total !== undefined) return range.total;
  }
  const length = response.headers.get("content-length");
  return length !== null && /^\d+$/.test(length) ? offset + Number(length) : undefined;
}

/**
 * Downloads one task, continuing from its partial file when the server
 * honours the range request.
 *
 * - 206 with a matching Content-Range: append
 * - 200 to a range request: the server ignored it, start over
 * - 416, or a 206 for the wrong range: drop the partial data, start over
 *
 * Throws IntegrityError when the final size differs from the expected total;
 * the partial file is left in place.
 */
export async function transferFile(
  client: KyInstance,
  task: DownloadTask,
  options: TransferOptions = {}
): Promise<TransferResult> {
  const { signal } = options;
  const partPath = getPartialPath(task.destination);
  await ensureDir(dirname(task.destination));

  let offset = (await getFileSize(partPath)) ?? 0;
  let response = await request(client, task.url, offset, options);

  if (offset > 0) {
    const range = parseContentRange(response.headers.get("content-range"));
    const continues = response.status === 206 && range?.start === offset;

    if (!continues && (response.status === 206 || response.status === 416)) {
      await response.body?.cancel();
      offset = 0;
      response = await request(client, task.url, 0, options);
    } else if (!continues && response.ok) {
      offset = 0;
    }
  }

  assertUsable(response, task.url);

  const totalBytes = reportedTotal(response, offset) ?? task.expectedBytes;
  task.resumeOffset = offset;
  options.onStart?.(offset, totalBytes);

  const file = await open(partPath, offset > 0 ? "a" : "w");
  try {
    const reader = response.body?.getReader();
    const nextChunk = async (): Promise<Uint8Array | undefined> => {
      if (!reader) return undefined;
      try {
        const { done, value } = await reader.read();
        return done ? undefined : value;
      } catch (error) {
        throw signal?.aborted ? error : toTransportError(error, task.url);
      }
    };

    for (let chunk = await nextChunk(); chunk; chunk = await nextChunk()) {
      await file.write(chunk);
      task.resumeOffset += chunk.byteLength;
      options.onProgress?.(task.resumeOffset, totalBytes);
      signal?.throwIfAborted();
    }
  } finally {
    await file.close();
  }

  if (totalBytes !== undefined && task.resumeOffset !== totalBytes) {
    throw new IntegrityError(totalBytes, task.resumeOffset);
  }

  await rename(partPath, task.destination);
  return { bytes: task.resumeOffset, resumedFrom: offset };
}
