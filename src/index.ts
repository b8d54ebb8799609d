// Core exports
export { toMediaFile, type MediaFile } from './core/media-file.js';
export {
  deduplicate,
  groupByDigest,
  duplicatesOnly,
  type DuplicateGroup,
  type DeduplicateOptions,
} from './core/deduplicator.js';
export {
  DateExtractor,
  extractDate,
  parseYyyymmdd,
  findDigitWindows,
  calendarDate,
  yyyymmddStrategy,
  DEFAULT_DATE_STRATEGIES,
  type DateStrategy,
} from './core/date-extractor.js';
export { resolveNames, type NameGroup, type ResolvedNames } from './core/name-resolver.js';
export {
  planDestinations,
  planPlacements,
  bucketByDate,
  formatBucket,
  generateNames,
  DEFAULT_RENAME_SUFFIX,
  NO_DATE_BUCKET,
  DEPTHS,
  DEPTH_LEVELS,
  type Depth,
  type Placement,
  type PlanOptions,
} from './core/planner.js';
export {
  discoverMedia,
  createExtensionFilter,
  assertDirectory,
  assertOutputDirectory,
  type DiscoverOptions,
  type FilePredicate,
} from './core/scanner.js';
export { sortMedia, type SortOptions, type SortResult, type SortStage } from './core/sorter.js';

// Action exports
export {
  copyPlacements,
  findConflicts,
  findBlockedFolders,
  CONFLICT_POLICIES,
  type ConflictPolicy,
  type CopyOptions,
  type CopyResult,
  type Conflict,
} from './actions/copy.js';
export {
  compressDirectory,
  archiveExtension,
  ARCHIVE_FORMATS,
  type ArchiveFormat,
} from './actions/archive.js';

// Errors
export {
  MediaSortError,
  UnreadableFileError,
  InvalidDirectoryError,
  DestinationConflictError,
  ConfigError,
} from './utils/errors.js';

// Hashing
export { hashFile, digestStream, HASH_ALGORITHMS, type HashAlgorithm } from './utils/file-hash.js';

// Config exports
export {
  loadConfig,
  saveConfig,
  getAppPaths,
  expandPath,
  DEFAULT_CONFIG,
  DEFAULT_MEDIA_EXTENSIONS,
  VERSION,
  type Config,
  type Settings,
  type AppPaths,
} from './config.js';
