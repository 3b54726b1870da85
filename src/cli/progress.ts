import cliProgress from "cli-progress";
import type { DownloadEvent, DownloadSink } from "../downloader/types.js";

/**
 * Human-readable byte count, e.g. "12.4 MB".
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[0]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function shortenLabel(label: string, max = 40): string {
  return label.length > max ? `${label.substring(0, max - 3)}...` : label;
}

export interface ProgressView {
  sink: DownloadSink;
  stop: () => void;
}

/**
 * Progress without bars: one line per finished transfer.
 */
export function createLineView(print: (line: string) => void = console.log): ProgressView {
  const labels = new Map<string, string>();

  const sink = (event: DownloadEvent) => {
    if (event.type === "started") {
      labels.set(event.taskId, event.label);
      return;
    }
    const label = labels.get(event.taskId);
    if (label === undefined) return;
    if (event.type === "completed") {
      print(`✓ ${label} (${formatBytes(event.bytes)})`);
      labels.delete(event.taskId);
    } else if (event.type === "failed") {
      print(`✗ ${label}: ${event.reason}`);
      labels.delete(event.taskId);
    }
  };

  return { sink, stop: () => labels.clear() };
}

// ============================================
// Terminal rendering - not unit testable
// ============================================
/* v8 ignore start */

/**
 * Multi-bar progress display fed by DownloadManager events:
 * one overall bar plus one bar per running transfer.
 */
export function createProgressView(totalTasks: number): ProgressView {
  const multibar = new cliProgress.MultiBar(
    {
      clearOnComplete: true,
      hideCursor: true,
      format: "   {bar} {percentage}% | {size} | {label}",
      barCompleteChar: "█",
      barIncompleteChar: "░",
      barsize: 25,
      autopadding: true,
    },
    cliProgress.Presets.shades_grey
  );

  const overallBar = multibar.create(totalTasks, 0, {
    size: "".padEnd(9),
    label: `0/${totalTasks} videos`,
  });

  const bars = new Map<string, { bar: cliProgress.SingleBar; label: string }>();
  let finished = 0;
  let failed = 0;

  const finish = (taskId: string, ok: boolean) => {
    const entry = bars.get(taskId);
    if (entry) {
      multibar.remove(entry.bar);
      bars.delete(taskId);
    }
    finished++;
    if (!ok) failed++;
    overallBar.update(finished, {
      label: `${finished}/${totalTasks} videos${failed > 0 ? ` (${failed} failed)` : ""}`,
    });
  };

  const sink = (event: DownloadEvent) => {
    switch (event.type) {
      case "started": {
        const total = event.totalBytes ?? 0;
        const existing = bars.get(event.taskId);
        if (existing) {
          existing.bar.setTotal(total);
          existing.bar.update(event.offset, { label: existing.label });
        } else {
          const label = shortenLabel(event.label);
          const bar = multibar.create(total, event.offset, {
            size: formatBytes(event.offset).padEnd(9),
            label,
          });
          bars.set(event.taskId, { bar, label });
        }
        break;
      }
      case "progress":
        bars.get(event.taskId)?.bar.update(event.bytes, { size: formatBytes(event.bytes).padEnd(9) });
        break;
      case "retrying": {
        const entry = bars.get(event.taskId);
        entry?.bar.update({ label: `${entry.label} (retry ${event.attempt})` });
        break;
      }
      case "completed":
        finish(event.taskId, true);
        break;
      case "failed":
        finish(event.taskId, false);
        break;
    }
  };

  return { sink, stop: () => multibar.stop() };
}

/* v8 ignore stop */
