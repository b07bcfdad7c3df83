/**
 * @reelkeeper/operations
 *
 * Operation managers and the pieces only they use:
 * - Shared run loop (OperationManager)
 * - Download, process, refresh, tidy and update managers
 * - Directory reconciliation
 * - Downloader output parsing
 * - Corruption probe
 */

// Run loop
export {
  OperationManager,
  type OperationKind,
  type OperationContext,
  type OperationProgress,
  type OperationResult,
  type TerminalState,
  type ChildOutcome,
  type ChildLineHandlers,
} from './operationManager.js';

// Reconciliation
export {
  reconcileDirectory,
  toDiskFile,
  type DiskFile,
  type ReconcileMatch,
  type ReconcilePlan,
} from './reconcile.js';

// Managers
export { RefreshManager, type RefreshTally, type RefreshOptions } from './refreshManager.js';

export {
  TidyManager,
  NO_TIDY_CHOICES,
  type TidyChoices,
  type TidyTally,
  type TidyOptions,
} from './tidyManager.js';

export { ProcessManager, type ProcessTally, type ProcessOptions } from './processManager.js';

export {
  UpdateManager,
  compileUpdateCommand,
  extractInstalledVersion,
  isBenignUpdateWarning,
  isUpdateFailureNotice,
  type UpdateTarget,
  type UpdateTally,
} from './updateManager.js';

export {
  DownloadManager,
  orderForDownload,
  type DownloadTally,
  type DownloadOptions,
} from './downloadManager.js';

// Downloader output
export {
  parseDownloadLine,
  classifyDownloaderStderr,
  isFormatFragment,
  type DownloadEvent,
  type DownloadEventType,
  type StderrClass,
} from './downloadParser.js';

// Corruption probe
export {
  FFmpegCorruptionProbe,
  type CorruptionProbe,
  type ProbeVerdict,
} from './corruptionProbe.js';
