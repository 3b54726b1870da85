import chalk from "chalk";
import ora, { type Ora } from "ora";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { loadConfig } from "../../config/configManager.js";
import { expandPath } from "../../config/paths.js";
import { type Config, configSchema, retryPolicyFromConfig } from "../../config/schema.js";
import { DownloadManager } from "../../downloader/manager.js";
import type { DownloadOutcome } from "../../downloader/types.js";
import {
  type CatalogSource,
  type CourseReport,
  type Downloader,
  hasFailures,
  Orchestrator,
  type RunEvent,
  type RunSummary,
  type SessionSource,
} from "../../pipeline/orchestrator.js";
import { parseCourseList } from "../../scraper/course.js";
import { MetadataResolver } from "../../scraper/resolver.js";
import type { Catalog, CatalogEntry } from "../../scraper/types.js";
import { createBrowserLogin } from "../../session/browserLogin.js";
import { SessionProvider } from "../../session/provider.js";
import type { Session } from "../../session/session.js";
import { UserInputError } from "../../shared/errors.js";
import { pathExists } from "../../shared/fs.js";
import { setVerbose } from "../../shared/logger.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { padOrdinal } from "../../shared/slug.js";
import { DownloadHistory } from "../../state/history.js";
import { formatCaptureDate, saveSourceList } from "../../storage/fileSystem.js";
import { createLineView, createProgressView, formatBytes, type ProgressView } from "../progress.js";
import {
  promptCredentials,
  promptPersistence,
  promptSelection,
  promptVaultPassphrase,
} from "../prompts.js";

export interface DownloadOptions {
  file?: string | undefined;
  all?: boolean | undefined;
  select?: string | undefined;
  destination?: string | undefined;
  quality?: string | undefined;
  concurrency?: number | undefined;
  history?: boolean | undefined;
  /** true prints to stdout, a string names the file to write */
  printSource?: string | boolean | undefined;
  vault?: string | undefined;
  saveSession?: boolean | undefined;
  hideProgressBar?: boolean | undefined;
  verbose?: boolean | undefined;
}

// ============================================
// Pure functions - testable without mocking
// ============================================

/**
 * Applies command-line overrides to the stored config and validates the result.
 */
export function resolveRunSettings(config: Config, options: DownloadOptions): Config {
  const result = configSchema.safeParse({
    ...config,
    ...(options.destination !== undefined ? { outputDir: options.destination } : {}),
    ...(options.quality !== undefined ? { videoQuality: options.quality } : {}),
    ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
    ...(options.history ? { historyEnabled: true } : {}),
    ...(options.vault !== undefined ? { vaultPath: options.vault } : {}),
  });

  if (!result.success) {
    throw new UserInputError("Invalid option", { details: z.prettifyError(result.error) });
  }
  return result.data;
}

/**
 * Selection given on the command line, or undefined to ask per course.
 */
export function selectionFromOptions(options: DownloadOptions): string | undefined {
  if (options.all && options.select !== undefined) {
    throw new UserInputError("Use either --all or --select, not both");
  }
  return options.all ? "all" : options.select;
}

/**
 * Links from the arguments first, then from the list file, without repeats.
 */
export function collectCourseUrls(args: readonly string[], fileContent?: string): string[] {
  const urls = [...args.map((arg) => arg.trim()), ...(fileContent ? parseCourseList(fileContent) : [])];
  return [...new Set(urls.filter((url) => url.length > 0))];
}

function describeStreams(entry: CatalogEntry): string {
  const { streams } = entry.manifest;
  if (streams.length === 0) {
    return `(${entry.skipReason ?? "Video not available"})`;
  }

  const primary = streams.filter((stream) => stream.track === "primary").map((stream) => stream.label);
  const hasSecondary = streams.some((stream) => stream.track === "secondary");
  return `[${[...new Set(primary)].join(", ")}]${hasSecondary ? " + secondary" : ""}`;
}

/**
 * Numbered catalog listing shown before the selection prompt.
 */
export function formatCatalogTable(catalog: Catalog): string[] {
  const width = String(catalog.entries.length).length;

  return catalog.entries.map((entry) => {
    const date = formatCaptureDate(entry.manifest.recordedAt ?? entry.lecture.captureDate) ?? "----------";
    return `${padOrdinal(entry.ordinal, width)}  ${date}  ${entry.lecture.title}  ${describeStreams(entry)}`;
  });
}

function describeOutcome(outcome: DownloadOutcome): string | undefined {
  switch (outcome.status) {
    case "completed":
      return undefined;
    case "partial":
      return `${outcome.task.label}: ${outcome.reason} (${formatBytes(outcome.bytesWritten)} kept to resume)`;
    case "failed":
      return `${outcome.task.label}: ${outcome.reason}`;
  }
}

/**
 * Plain-text lines describing one course's result.
 */
export function formatReport(report: CourseReport): string[] {
  const name = report.courseTitle ?? report.course?.sectionId ?? report.url;
  const lines = [`${name}: ${report.status}`];

  if (report.error) {
    lines.push(`  ${report.error.message}`);
  }
  for (const issue of report.issues) {
    lines.push(`  ! ${issue.message}`);
  }
  if (report.outOfRange.length > 0) {
    lines.push(`  Not in this course: ${report.outOfRange.join(", ")}`);
  }
  for (const skipped of report.skipped) {
    lines.push(`  Skipped ${skipped.ordinal} ${skipped.title}: ${skipped.reason}`);
  }
  if (report.skippedByHistory > 0) {
    lines.push(`  ${report.skippedByHistory} downloaded in an earlier run`);
  }
  if (report.sources.length > 0) {
    lines.push(`  ${report.sources.length} sources listed`);
  }

  if (report.outcomes.length > 0) {
    const count = (predicate: (outcome: DownloadOutcome) => boolean) =>
      report.outcomes.filter(predicate).length;
    const downloaded = count((outcome) => outcome.status === "completed" && !outcome.alreadyPresent);
    const present = count((outcome) => outcome.status === "completed" && outcome.alreadyPresent);
    const interrupted = count((outcome) => outcome.status === "partial");
    const failed = count((outcome) => outcome.status === "failed");

    lines.push(
      `  ${downloaded} downloaded, ${present} already present, ${interrupted} interrupted, ${failed} failed`
    );
    for (const outcome of report.outcomes) {
      const description = describeOutcome(outcome);
      if (description) lines.push(`  ✗ ${description}`);
    }
  }

  return lines;
}

// ============================================
// Command - interactive, not unit testable
// ============================================
/* v8 ignore start */

const STATUS_COLORS = {
  completed: chalk.green,
  partial: chalk.yellow,
  failed: chalk.red,
  cancelled: chalk.gray,
} as const;

function printSummary(summary: RunSummary): void {
  console.log(chalk.blue("\n📊 Summary\n"));
  for (const report of summary.reports) {
    const [header, ...details] = formatReport(report);
    console.log(`   ${STATUS_COLORS[report.status](header)}`);
    for (const line of details) {
      console.log(chalk.gray(`   ${line}`));
    }
  }
  console.log();
}

function printEvent(event: RunEvent): void {
  switch (event.type) {
    case "course":
      console.log(chalk.blue(`\n📚 Course ${event.index + 1}/${event.total}`));
      console.log(chalk.gray(`   ${event.url}\n`));
      break;
    case "session":
      if (event.reused) console.log(chalk.gray(`   Using the session for ${event.course.origin}`));
      break;
    case "catalog":
      for (const issue of event.catalog.issues) {
        console.log(chalk.yellow(`   ⚠️  ${issue.message}`));
      }
      break;
    case "download":
      console.log(chalk.blue(`\n🎬 Downloading ${event.tasks.length} videos...\n`));
      break;
  }
}

/**
 * Handles the download command: every course link goes through session,
 * catalog, selection and download in turn.
 */
export async function downloadCommand(urls: string[], options: DownloadOptions): Promise<void> {
  if (options.verbose) {
    setVerbose(true);
  }

  const config = resolveRunSettings(loadConfig(), options);
  const fixedSelection = selectionFromOptions(options);
  const fileContent = options.file ? await readFile(expandPath(options.file), "utf-8") : undefined;
  const courseUrls = collectCourseUrls(urls, fileContent);

  if (courseUrls.length === 0) {
    throw new UserInputError("No course links given", {
      details: "Pass links as arguments or list them in a file with --file",
    });
  }

  console.log(chalk.blue("\n🎓 Lecture Download\n"));
  console.log(chalk.gray(`   Output: ${expandPath(config.outputDir)}`));

  const shutdown = createShutdownManager();
  shutdown.setup();

  const retry = retryPolicyFromConfig(config);
  const vaultPath = expandPath(config.vaultPath);
  const history = config.historyEnabled ? new DownloadHistory() : undefined;
  const sourceLines: string[] = [];

  let spinner: Ora | undefined;
  let progress: ProgressView | undefined;
  shutdown.registerCleanup(() => {
    spinner?.stop();
    progress?.stop();
  });

  const provider = new SessionProvider({
    login: createBrowserLogin({ loginTimeout: config.loginTimeoutSeconds * 1000 }),
    requestCredentials: promptCredentials,
    offerPersistence: options.saveSession === false ? undefined : promptPersistence,
    timeoutMs: config.requestTimeoutMs,
  });

  const sessions: SessionSource = {
    acquire: async (course) => {
      const passphrase = (await pathExists(vaultPath)) ? await promptVaultPassphrase() : undefined;
      return provider.acquire(course, vaultPath, passphrase);
    },
  };

  const resolver = new MetadataResolver({
    concurrency: config.metadataConcurrency,
    retry,
    timeoutMs: config.requestTimeoutMs,
    signal: shutdown.signal,
    onProgress: (done, total) => {
      if (spinner) spinner.text = `Reading lectures ${done}/${total}...`;
    },
  });

  const catalogs: CatalogSource = {
    resolve: async (course, session) => {
      const active = ora("Reading the course syllabus...").start();
      spinner = active;
      try {
        const catalog = await resolver.resolve(course, session);
        const title = catalog.courseTitle ? ` in ${catalog.courseTitle}` : "";
        active.succeed(`Found ${catalog.entries.length} lectures${title}`);
        return catalog;
      } catch (error) {
        active.fail("Could not read the course");
        throw error;
      } finally {
        spinner = undefined;
      }
    },
  };

  const createDownloader = (session: Session): Downloader => ({
    download: async (tasks) => {
      const view = options.hideProgressBar ? createLineView() : createProgressView(tasks.length);
      progress = view;
      const manager = new DownloadManager({
        concurrency: config.concurrency,
        retry,
        timeoutMs: config.requestTimeoutMs,
        session,
        signal: shutdown.signal,
        sink: view.sink,
      });
      try {
        return await manager.download(tasks);
      } finally {
        view.stop();
        progress = undefined;
      }
    },
  });

  const chooseSelection = async (catalog: Catalog): Promise<string> => {
    if (fixedSelection !== undefined) {
      return fixedSelection;
    }
    console.log();
    for (const line of formatCatalogTable(catalog)) {
      console.log(`   ${line}`);
    }
    console.log();
    return promptSelection();
  };

  const printSource = options.printSource;
  const sourceSink =
    printSource === undefined || printSource === false
      ? undefined
      : (lines: string[]) => {
          if (typeof printSource === "string") {
            sourceLines.push(...lines);
          } else {
            for (const line of lines) console.log(line);
          }
        };

  const orchestrator = new Orchestrator({
    sessions,
    resolver: catalogs,
    createDownloader,
    chooseSelection,
    preference: { quality: config.videoQuality, includeSecondary: config.includeSecondaryTracks },
    outputDir: config.outputDir,
    history,
    sourceSink,
    onEvent: printEvent,
    signal: shutdown.signal,
  });

  let summary: RunSummary;
  try {
    summary = await orchestrator.run(courseUrls);
  } finally {
    history?.close();
  }

  if (typeof printSource === "string") {
    await saveSourceList(printSource, sourceLines);
    console.log(chalk.gray(`\n   Sources written to ${expandPath(printSource)}`));
  }

  printSummary(summary);

  if (shutdown.isShuttingDown()) {
    process.exit(130);
  }
  if (hasFailures(summary)) {
    process.exit(1);
  }
}

/* v8 ignore stop */
