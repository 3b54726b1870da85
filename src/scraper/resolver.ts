/**
 * Metadata resolution: course → syllabus → per-lecture media manifests.
 */
import type { RetryPolicy } from "../config/schema.js";
import type { Session } from "../session/session.js";
import { isPlatformLoginPage } from "../shared/auth.js";
import { AuthError, NetworkError, SchemaError, errorMessage } from "../shared/errors.js";
import { createPlatformClient, type FetchLike, getJson } from "../shared/http.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { parallelProcess } from "../shared/parallelWorker.js";
import { DEFAULT_RETRY_POLICY, retryTransient } from "../shared/retry.js";
import { type Course, getLessonMediaUrl, getSyllabusUrl } from "./course.js";
import { parseLessonMedia, parseSyllabus, type SyllabusLecture } from "./extractor.js";
import {
  type Catalog,
  type CatalogEntry,
  type CatalogIssue,
  emptyManifest,
  type MediaManifest,
} from "./types.js";

export interface ResolverOptions {
  /** Parallel manifest fetches (default: 4) */
  concurrency?: number | undefined;
  retry?: RetryPolicy | undefined;
  timeoutMs?: number | undefined;
  fetch?: FetchLike | undefined;
  isLoginPage?: ((url: string) => boolean) | undefined;
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
  /** Called after each lecture's manifest has been handled */
  onProgress?: ((done: number, total: number) => void) | undefined;
}

interface LectureOutcome {
  entry: CatalogEntry;
  issue: CatalogIssue | undefined;
  networkFailure: boolean;
  fetched: boolean;
}

export class MetadataResolver {
  private readonly options: ResolverOptions;
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? createLogger("resolver");
  }

  /**
   * Resolves the course into catalog entries in syllabus order.
   *
   * Throws AuthError when the session is rejected at any point and
   * NetworkError when the syllabus cannot be fetched or every media request
   * failed. Per-lecture problems end up in `issues`.
   */
  async resolve(course: Course, session: Session): Promise<Catalog> {
    if (session.origin !== course.origin) {
      throw new AuthError(`Session is for ${session.origin}, not ${course.origin}`);
    }

    const { signal } = this.options;
    const isLoginPage = this.options.isLoginPage ?? isPlatformLoginPage;
    const retry = this.options.retry ?? DEFAULT_RETRY_POLICY;
    const client = createPlatformClient(session, {
      timeoutMs: this.options.timeoutMs,
      fetch: this.options.fetch,
    });

    const syllabusUrl = getSyllabusUrl(course);
    let rawSyllabus: unknown;
    try {
      rawSyllabus = await retryTransient(
        () => getJson(client, syllabusUrl, isLoginPage, signal),
        retry,
        {
          signal,
          onRetry: (error, attempt, left) =>
            this.logger.debug(
              `Syllabus attempt ${attempt} failed (${errorMessage(error)}), ${left} retries left`
            ),
        }
      );
    } catch (error) {
      if (error instanceof SchemaError) {
        this.logger.warn(`${error.message} (course ${course.sectionId})`);
        return {
          courseTitle: undefined,
          entries: [],
          issues: [{ lectureId: undefined, code: "SCHEMA_ERROR", message: error.message }],
        };
      }
      throw error;
    }

    const syllabus = parseSyllabus(rawSyllabus);
    const issues: CatalogIssue[] = syllabus.problems.map((message) => {
      this.logger.warn(`${message} (course ${course.sectionId})`);
      return { lectureId: undefined, code: "SCHEMA_ERROR", message };
    });
    this.logger.debug(`Syllabus lists ${syllabus.lectures.length} lectures`);

    let done = 0;
    const total = syllabus.lectures.length;
    const result = await parallelProcess(
      syllabus.lectures,
      async (item) => {
        const outcome = await this.resolveLecture(course.origin, item, client, isLoginPage);
        done++;
        this.options.onProgress?.(done, total);
        return outcome;
      },
      {
        concurrency: this.options.concurrency ?? 4,
        shouldContinue: () => !signal?.aborted,
        // Anything resolveLecture lets through stops the whole course
        isFatal: () => true,
      }
    );

    if (result.stoppedBy) {
      throw result.stoppedBy.error;
    }
    signal?.throwIfAborted();

    const outcomes = result.slots.filter((slot): slot is LectureOutcome => slot !== undefined);
    const fetched = outcomes.filter((outcome) => outcome.fetched);
    if (fetched.length > 0 && fetched.every((outcome) => outcome.networkFailure)) {
      throw new NetworkError(
        `Lost connection: all ${fetched.length} media requests for course ${course.sectionId} failed`
      );
    }

    for (const outcome of outcomes) {
      if (outcome.issue) issues.push(outcome.issue);
    }

    const entries = outcomes.map((outcome) => outcome.entry);
    return {
      courseTitle: entries.find((entry) => entry.manifest.courseTitle)?.manifest.courseTitle,
      entries,
      issues,
    };
  }

  private async resolveLecture(
    origin: string,
    item: SyllabusLecture,
    client: ReturnType<typeof createPlatformClient>,
    isLoginPage: (url: string) => boolean
  ): Promise<LectureOutcome> {
    const { lecture } = item;
    const entry = (manifest: MediaManifest, skipReason: string | undefined): CatalogEntry => ({
      ordinal: lecture.ordinal,
      lecture,
      manifest,
      skipReason,
    });

    if (!item.hasMedia) {
      this.logger.debug(`Skipping media lookup for ${lecture.id}: no media listed`);
      return {
        entry: entry(emptyManifest(lecture.id), "No recording"),
        issue: undefined,
        networkFailure: false,
        fetched: false,
      };
    }

    const url = getLessonMediaUrl(origin, lecture.id);
    try {
      const raw = await retryTransient(
        () => getJson(client, url, isLoginPage, this.options.signal),
        this.options.retry ?? DEFAULT_RETRY_POLICY,
        {
          signal: this.options.signal,
          onRetry: (error, attempt, left) =>
            this.logger.debug(
              `Media for ${lecture.id}: attempt ${attempt} failed (${errorMessage(error)}), ${left} retries left`
            ),
        }
      );
      const manifest = parseLessonMedia(lecture.id, raw);
      return {
        entry: entry(manifest, manifest.streams.length === 0 ? "Video not available" : undefined),
        issue: undefined,
        networkFailure: false,
        fetched: true,
      };
    } catch (error) {
      if (error instanceof SchemaError || error instanceof NetworkError) {
        const schemaProblem = error instanceof SchemaError;
        this.logger.warn(`${lecture.title}: ${error.message}`);
        return {
          entry: entry(
            emptyManifest(lecture.id),
            schemaProblem ? "Unreadable media data" : "Media could not be fetched"
          ),
          issue: {
            lectureId: lecture.id,
            code: schemaProblem ? "SCHEMA_ERROR" : "NETWORK_ERROR",
            message: error.message,
          },
          networkFailure: !schemaProblem,
          fetched: true,
        };
      }
      throw error;
    }
  }
}
