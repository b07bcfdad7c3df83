/**
 * @reelkeeper/core
 * 
 * Core package containing:
 * - Operation state machine
 * - Media entity model and registry
 * - Error taxonomy
 * - Configuration and binary resolution
 * - Format tables
 */

// State machine
export {
  OperationState,
  OperationStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  OperationStateTransition,
} from './stateMachine.js';

// Types
export {
  assertNever,
  isContainer,
  entityLabel,
  remoteSource,
} from './types/media.js';

export type {
  Dbid,
  ClipStamp,
  SliceRange,
  Video,
  Channel,
  Playlist,
  Folder,
  Container,
  MediaEntity,
  MediaKind,
  ContainerKind,
} from './types/media.js';

export { nullSink, type ProgressSink } from './types/progress.js';

// Registry
export {
  MediaRegistry,
  type RegistryLayout,
  type NewContainerOptions,
} from './registry/mediaRegistry.js';

export {
  snapshotSchema,
  toSnapshot,
  fromSnapshot,
  loadRegistry,
  saveRegistry,
  type RegistrySnapshot,
} from './registry/snapshot.js';

// Errors
export {
  ReelkeeperError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  SpawnFailedError,
  NonZeroExitError,
  FileMissingError,
  DestinationConflictError,
  ProbeTimeoutError,
  MalformedStreamDataError,
  describeError,
  type SpawnFailureReason,
} from './errors/index.js';

// Formats
export {
  VIDEO_FORMATS,
  AUDIO_FORMATS,
  IMAGE_FORMATS,
  MEDIA_FORMATS,
  COMPANION_SUFFIXES,
  isMediaExtension,
  isImageExtension,
  type CompanionKind,
} from './formats.js';

// Configuration
export {
  loadConfig,
  envSchema,
  type AppConfig,
  type UpdateStrategy,
} from './config/index.js';

export {
  getBinariesConfig,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
