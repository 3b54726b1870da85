/**
 * Library entry: the download pipeline without the command-line surface.
 */
export { type Config, configSchema, type RetryPolicy, type VideoQuality } from "./config/schema.js";
export { assignUniqueDestinations, DownloadManager, type DownloadManagerOptions } from "./downloader/manager.js";
export type {
  DownloadEvent,
  DownloadOutcome,
  DownloadSink,
  DownloadTask,
} from "./downloader/types.js";
export {
  type CatalogSource,
  type CourseReport,
  type Downloader,
  hasFailures,
  type HistoryStore,
  Orchestrator,
  type OrchestratorOptions,
  type RunEvent,
  type RunSummary,
  type SessionSource,
} from "./pipeline/orchestrator.js";
export { type Course, parseCourseList, parseCourseUrl, requireCourse } from "./scraper/course.js";
export { MetadataResolver, type ResolverOptions } from "./scraper/resolver.js";
export type { Catalog, CatalogEntry, CatalogIssue, LectureSession, MediaManifest, MediaStream } from "./scraper/types.js";
export {
  parseSelectionSpec,
  pickStreams,
  rankStreams,
  select,
  type SelectionSpec,
  type StreamPreference,
} from "./selection/selection.js";
export { createBrowserLogin } from "./session/browserLogin.js";
export {
  type Credentials,
  type LoginCapability,
  SessionProvider,
  type SessionProviderOptions,
} from "./session/provider.js";
export { Session, type SessionCookie } from "./session/session.js";
export { decrypt, encrypt, loadVault, saveVault, type VaultContents } from "./session/vault.js";
export {
  AuthError,
  type ErrorCode,
  IntegrityError,
  LectureCapError,
  NetworkError,
  SchemaError,
  UserInputError,
  VaultVersionError,
} from "./shared/errors.js";
export { createLogger, type Logger, silentLogger } from "./shared/logger.js";
export { DownloadHistory, type HistoryRecord } from "./state/history.js";
export { buildDownloadTasks } from "./storage/fileSystem.js";
