// Errors
export type { EditSuggestion, RootguardErrorCode } from "./core/errors.js";
export {
  AccessDeniedError,
  EditMatchNotFoundError,
  getErrnoCode,
  InvalidArgumentsError,
  InvalidEditError,
  InvalidPathError,
  IOError,
  isRootguardError,
  NotAbsoluteError,
  NotFoundError,
  RootguardError,
  RootNotADirectoryError,
  RootNotFoundError,
  toIOError,
} from "./core/errors.js";
// Filesystem abstraction used for confinement
export type { FileStats, FileSystem } from "./fs/file-system.js";
export { nodeFileSystem } from "./fs/file-system.js";
// Logging
export type { ILogObj, Logger, LoggerOptions } from "./logging/logger.js";
export { createLogger, defaultLogger, parseLogLevel, stripAnsi } from "./logging/logger.js";
// Mutation
export { atomicWriteFile } from "./mutation/atomic-write.js";
export { createUnifiedDiff, fenceDiff } from "./mutation/diff.js";
export { applyReplacement, findMatch, findSuggestions } from "./mutation/edit/matcher.js";
export type {
  EditOperation,
  EditResult,
  MatchResult,
  MatchStrategy,
  SuggestionMatch,
} from "./mutation/edit/types.js";
export type { FileMutationEngineOptions, MoveOperations } from "./mutation/engine.js";
export { FileMutationEngine } from "./mutation/engine.js";
// Paths
export type { PathOptions } from "./paths/normalize.js";
export {
  canonicalPath,
  expandHome,
  findContainingRoot,
  isAbsolutePath,
  isPathWithinRoot,
  normalizePath,
} from "./paths/normalize.js";
export type { PathResolverOptions, ResolvedPath } from "./paths/resolver.js";
export { PathResolver } from "./paths/resolver.js";
// Readers
export type { FileInfo } from "./reading/file-info.js";
export { formatFileInfo, getFileInfo } from "./reading/file-info.js";
export type { MediaContent, MediaKind, ReadTextOptions } from "./reading/reader.js";
export { readMediaFile, readMultipleFiles, readTextFile } from "./reading/reader.js";
// Roots
export type { RootCheck, RootRegistryOptions, RootSet, RootSnapshot } from "./roots/registry.js";
export { RootRegistry, toRootSnapshot } from "./roots/registry.js";
// Tools
export { builtinTools } from "./tools/builtins.js";
export type { CreateToolConfig } from "./tools/create-tool.js";
export { createTool, toInputJsonSchema } from "./tools/create-tool.js";
export type { ToolDescriptor, ToolDispatcherOptions } from "./tools/dispatcher.js";
export { errorResult, ToolDispatcher } from "./tools/dispatcher.js";
export type {
  Tool,
  ToolAnnotations,
  ToolContent,
  ToolContext,
  ToolInputSchema,
  ToolLimits,
  ToolResult,
} from "./tools/types.js";
export { DEFAULT_TOOL_LIMITS } from "./tools/types.js";
// Traversal
export type {
  DirectoryEntry,
  ListWithSizesOptions,
  SizedEntry,
  SortBy,
  TreeOptions,
  TreeResult,
} from "./traversal/engine.js";
export { TraversalEngine } from "./traversal/engine.js";
// Formatting
export { formatSize } from "./utils/format.js";
