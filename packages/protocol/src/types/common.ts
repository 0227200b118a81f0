// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Semantic version string (major.minor.patch, optional prerelease)
 */
export type SemVer = string;

/**
 * Identity of a loaded participant: the absolute path of its archive.
 */
export type ParticipantId = string;

/**
 * Identity of a module in one of the resolution pools.
 *
 * Host modules: path relative to the host module directory, without extension
 * (e.g. "Core", "systems/Physics").
 * Patch modules: "<manifest id>:<archive path>" (e.g. "better-ui:patches/menu.js").
 */
export type ModuleIdentity = string;

/**
 * Log levels, most severe first.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * A log message, either ready or produced on demand.
 * Producers are only evaluated when a sink actually accepts the level.
 */
export type LogMessage = string | (() => string);

/**
 * Structured logger handed to patches.
 */
export type PatchLogger = {
  error(message: LogMessage, data?: Record<string, unknown>): void;
  warn(message: LogMessage, data?: Record<string, unknown>): void;
  info(message: LogMessage, data?: Record<string, unknown>): void;
  debug(message: LogMessage, data?: Record<string, unknown>): void;
};
