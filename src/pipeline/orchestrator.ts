/**
 * Runs the whole pipeline for a list of course links, one course at a time.
 *
 * Failures stay inside the course they happen in: every input URL gets a
 * report, in input order, whatever happened to the others.
 */
import type { DownloadOutcome, DownloadTask } from "../downloader/types.js";
import type { Course } from "../scraper/course.js";
import { requireCourse } from "../scraper/course.js";
import type { Catalog, CatalogIssue } from "../scraper/types.js";
import { select, type SelectionSpec, type StreamPreference } from "../selection/selection.js";
import type { Session } from "../session/session.js";
import { AuthError, type ErrorCode, LectureCapError, errorMessage } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { buildDownloadTasks, formatSourceLines } from "../storage/fileSystem.js";

// ============================================================================
// Collaborators
// ============================================================================

export interface SessionSource {
  acquire(course: Course): Promise<Session>;
}

export interface CatalogSource {
  resolve(course: Course, session: Session): Promise<Catalog>;
}

export interface Downloader {
  download(tasks: DownloadTask[]): Promise<DownloadOutcome[]>;
}

/**
 * The subset of DownloadHistory the pipeline needs.
 */
export interface HistoryStore {
  has(key: string): boolean;
  record(key: string, courseId: string, destination: string): void;
}

export type RunEvent =
  | { type: "course"; url: string; index: number; total: number }
  | { type: "session"; course: Course; reused: boolean }
  | { type: "catalog"; course: Course; catalog: Catalog }
  | { type: "download"; course: Course; tasks: DownloadTask[] };

export interface OrchestratorOptions {
  sessions: SessionSource;
  resolver: CatalogSource;
  /** Creates the downloader for one course; the session supplies media cookies */
  createDownloader: (session: Session) => Downloader;
  /** Returns the selection spec for a catalog, e.g. by asking the user */
  chooseSelection: (catalog: Catalog, course: Course) => Promise<SelectionSpec | string>;
  preference: StreamPreference;
  outputDir: string;
  history?: HistoryStore | undefined;
  /** Print-source mode: tasks are handed here instead of being downloaded */
  sourceSink?: ((lines: string[], course: Course) => void) | undefined;
  onEvent?: ((event: RunEvent) => void) | undefined;
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
}

// ============================================================================
// Reports
// ============================================================================

export type CourseStatus = "completed" | "partial" | "failed" | "cancelled";

export interface SkippedLecture {
  ordinal: number;
  title: string;
  reason: string;
}

export interface CourseReport {
  url: string;
  course: Course | undefined;
  courseTitle: string | undefined;
  status: CourseStatus;
  /** Set when the course could not be processed at all */
  error: { code: ErrorCode | undefined; message: string } | undefined;
  issues: CatalogIssue[];
  outOfRange: string[];
  /** Selected lectures that had nothing to download */
  skipped: SkippedLecture[];
  /** Tasks left out because the history lists them */
  skippedByHistory: number;
  outcomes: DownloadOutcome[];
  /** Source lines handed to the sink in print-source mode */
  sources: string[];
}

export interface RunSummary {
  reports: CourseReport[];
}

function newReport(url: string): CourseReport {
  return {
    url,
    course: undefined,
    courseTitle: undefined,
    status: "completed",
    error: undefined,
    issues: [],
    outOfRange: [],
    skipped: [],
    skippedByHistory: 0,
    outcomes: [],
    sources: [],
  };
}

/**
 * True when any course failed outright or any task did not complete.
 */
export function hasFailures(summary: RunSummary): boolean {
  return summary.reports.some(
    (report) =>
      report.status === "failed" ||
      report.outcomes.some((outcome) => outcome.status !== "completed")
  );
}

function statusFromOutcomes(outcomes: readonly DownloadOutcome[]): CourseStatus {
  if (outcomes.some((outcome) => outcome.status === "partial" && outcome.cancelled)) {
    return "cancelled";
  }
  return outcomes.every((outcome) => outcome.status === "completed") ? "completed" : "partial";
}

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;
  /** Sessions by origin, for this run only */
  private readonly sessions = new Map<string, Session>();

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("pipeline");
  }

  async run(courseUrls: readonly string[]): Promise<RunSummary> {
    const reports: CourseReport[] = [];

    for (const [index, url] of courseUrls.entries()) {
      if (this.options.signal?.aborted) {
        reports.push({ ...newReport(url), status: "cancelled" });
        continue;
      }
      this.options.onEvent?.({ type: "course", url, index, total: courseUrls.length });
      reports.push(await this.runCourse(url));
    }

    return { reports };
  }

  private async session(course: Course): Promise<Session> {
    const cached = this.sessions.get(course.origin);
    if (cached) {
      this.options.onEvent?.({ type: "session", course, reused: true });
      return cached;
    }

    const session = await this.options.sessions.acquire(course);
    this.sessions.set(course.origin, session);
    this.options.onEvent?.({ type: "session", course, reused: false });
    return session;
  }

  private async runCourse(url: string): Promise<CourseReport> {
    const { signal, history } = this.options;
    const report = newReport(url);

    try {
      const course = requireCourse(url);
      report.course = course;

      const session = await this.session(course);
      const catalog = await this.options.resolver.resolve(course, session);
      report.courseTitle = catalog.courseTitle;
      report.issues = catalog.issues;
      this.options.onEvent?.({ type: "catalog", course, catalog });

      if (catalog.entries.length === 0) {
        this.logger.warn(`No lectures found for ${url}`);
        return report;
      }

      const spec = await this.options.chooseSelection(catalog, course);
      signal?.throwIfAborted();

      const { selected, outOfRange } = select(catalog, spec);
      report.outOfRange = outOfRange;
      report.skipped = selected
        .filter((entry) => entry.manifest.streams.length === 0)
        .map((entry) => ({
          ordinal: entry.ordinal,
          title: entry.lecture.title,
          reason: entry.skipReason ?? "Video not available",
        }));

      const tasks = buildDownloadTasks(
        course,
        catalog,
        selected,
        this.options.preference,
        this.options.outputDir
      ).filter((task) => {
        const known = history !== undefined && task.historyKey !== undefined && history.has(task.historyKey);
        if (known) report.skippedByHistory++;
        return !known;
      });

      if (this.options.sourceSink) {
        report.sources = formatSourceLines(tasks);
        this.options.sourceSink(report.sources, course);
        return report;
      }

      if (tasks.length === 0) {
        return report;
      }

      this.options.onEvent?.({ type: "download", course, tasks });
      report.outcomes = await this.options.createDownloader(session).download(tasks);
      report.status = statusFromOutcomes(report.outcomes);

      for (const outcome of report.outcomes) {
        if (outcome.status === "completed" && outcome.task.historyKey && history) {
          history.record(outcome.task.historyKey, course.sectionId, outcome.task.destination);
        }
      }

      if (report.outcomes.some((outcome) => outcome.status !== "completed" && outcome.code === "AUTH_ERROR")) {
        this.sessions.delete(course.origin);
      }

      return report;
    } catch (error) {
      if (error instanceof AuthError && report.course) {
        this.sessions.delete(report.course.origin);
      }

      if (signal?.aborted) {
        report.status = "cancelled";
        return report;
      }

      report.status = "failed";
      report.error = {
        code: error instanceof LectureCapError ? error.code : undefined,
        message: errorMessage(error),
      };
      this.logger.debug(`${url} failed: ${report.error.message}`);
      return report;
    }
  }
}
