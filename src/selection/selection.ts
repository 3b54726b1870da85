/**
 * Lecture and stream selection.
 *
 * Selection specs are `all` or whitespace-separated 1-based indices and
 * inclusive ranges (`3`, `2-5`). Indices address catalog positions, empty
 * entries included, so numbering matches the displayed table.
 */
import type { VideoQuality } from "../config/schema.js";
import type { Catalog, CatalogEntry, MediaManifest, MediaStream, StreamTrack } from "../scraper/types.js";
import { UserInputError } from "../shared/errors.js";

export interface IndexRange {
  start: number;
  end: number;
}

export type SelectionSpec = { kind: "all" } | { kind: "ranges"; ranges: IndexRange[] };

export interface SelectionResult {
  /** Selected entries in catalog order, each at most once */
  selected: CatalogEntry[];
  /** Requested positions past the end of the catalog, e.g. "12" or "9-14" */
  outOfRange: string[];
}

export interface StreamPreference {
  quality: VideoQuality;
  includeSecondary: boolean;
}

const TOKEN_PATTERN = /^(\d+)(?:-(\d+))?$/;
const TRACKS: readonly StreamTrack[] = ["primary", "secondary"];

/**
 * Sorts ranges and merges overlapping or adjacent ones.
 */
function mergeRanges(ranges: IndexRange[]): IndexRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: IndexRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

/**
 * Parses a selection spec. Any token that is not a positive integer or an
 * ascending range invalidates the whole spec.
 */
export function parseSelectionSpec(input: string): SelectionSpec {
  const tokens = input.trim().split(/\s+/).filter((token) => token.length > 0);

  if (tokens.length === 1 && tokens[0]?.toLowerCase() === "all") {
    return { kind: "all" };
  }

  const ranges: IndexRange[] = [];
  const invalid: string[] = [];

  for (const token of tokens) {
    const match = TOKEN_PATTERN.exec(token);
    const start = Number(match?.[1]);
    const end = match?.[2] === undefined ? start : Number(match[2]);

    if (!match || !Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 1 || end < start) {
      invalid.push(token);
      continue;
    }
    ranges.push({ start, end });
  }

  if (invalid.length > 0) {
    throw new UserInputError(`Invalid selection: ${invalid.join(", ")}`, {
      details: 'Use numbers (3), ranges (2-5) separated by spaces, or "all"',
    });
  }

  return { kind: "ranges", ranges: mergeRanges(ranges) };
}

/**
 * Applies a spec to a catalog. Strings are parsed first and may throw UserInputError.
 */
export function select(catalog: Catalog, spec: SelectionSpec | string): SelectionResult {
  const parsed = typeof spec === "string" ? parseSelectionSpec(spec) : spec;
  const { entries } = catalog;

  if (parsed.kind === "all") {
    return { selected: [...entries], outOfRange: [] };
  }

  const selected: CatalogEntry[] = [];
  const outOfRange: string[] = [];

  for (const { start, end } of mergeRanges(parsed.ranges)) {
    for (let position = start; position <= Math.min(end, entries.length); position++) {
      const entry = entries[position - 1];
      if (entry) selected.push(entry);
    }
    if (end > entries.length) {
      const from = Math.max(start, entries.length + 1);
      outOfRange.push(from === end ? `${end}` : `${from}-${end}`);
    }
  }

  return { selected, outOfRange };
}

function targetHeight(quality: VideoQuality): number | undefined {
  const match = /^(\d+)p$/.exec(quality);
  return match?.[1] ? Number(match[1]) : undefined;
}

/**
 * Orders streams best-first: height (descending, or ascending for "lowest"),
 * then byte size descending, then URL. Streams without a height go last.
 */
function compareStreams(a: MediaStream, b: MediaStream, ascendingHeight: boolean): number {
  if (a.height === undefined || b.height === undefined) {
    if (a.height !== b.height) return a.height === undefined ? 1 : -1;
  } else if (a.height !== b.height) {
    return ascendingHeight ? a.height - b.height : b.height - a.height;
  }

  const sizeDelta = (b.size ?? 0) - (a.size ?? 0);
  if (sizeDelta !== 0) return sizeDelta;

  if (a.url === b.url) return 0;
  return a.url < b.url ? -1 : 1;
}

/**
 * Ranks streams for a quality preference. For a fixed resolution the exact
 * height wins, then the closest lower one, then everything else best-first.
 */
export function rankStreams(streams: readonly MediaStream[], quality: VideoQuality): MediaStream[] {
  const ordered = [...streams].sort((a, b) => compareStreams(a, b, quality === "lowest"));
  const target = targetHeight(quality);
  if (target === undefined) {
    return ordered;
  }

  const exact = ordered.filter((stream) => stream.height === target);
  const lower = ordered.filter((stream) => stream.height !== undefined && stream.height < target);
  const rest = ordered.filter((stream) => !exact.includes(stream) && !lower.includes(stream));
  return [...exact, ...lower, ...rest];
}

/**
 * Picks one stream per track: primary first, secondary when enabled.
 */
export function pickStreams(manifest: MediaManifest, preference: StreamPreference): MediaStream[] {
  const picked: MediaStream[] = [];

  for (const track of TRACKS) {
    if (track === "secondary" && !preference.includeSecondary) continue;

    const [best] = rankStreams(
      manifest.streams.filter((stream) => stream.track === track),
      preference.quality
    );
    if (best) picked.push(best);
  }

  return picked;
}
