/**
 * Bitmask of diagnostic fields added to formatted errors. Only applied while the application
 * wide debug switch (`appDebug`) is enabled.
 */
export const DebugFlag = {
  None: 0,
  IncludeDebugMessage: 1,
  IncludeTrace: 2,
  RethrowInternalExceptions: 4,
  RethrowUnsafeExceptions: 8,
} as const;

export type DebugFlags = number;

export const ALL_DEBUG_FLAGS: DebugFlags =
  DebugFlag.IncludeDebugMessage |
  DebugFlag.IncludeTrace |
  DebugFlag.RethrowInternalExceptions |
  DebugFlag.RethrowUnsafeExceptions;

export function hasDebugFlag(flags: DebugFlags, flag: number): boolean {
  return (flags & flag) === flag;
}

/**
 * The application debug switch gates the GraphQL specific flags: without it, no debug output is produced.
 */
export function resolveDebugFlags(appDebug: boolean, configuredFlags: DebugFlags): DebugFlags {
  return appDebug ? configuredFlags : DebugFlag.None;
}
