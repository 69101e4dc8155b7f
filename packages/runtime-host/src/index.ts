/**
 * @mockwork/runtime-host
 *
 * Node-side implementations for the Mockwork kernel: the JSONL dispatch
 * log sink and its reader, log storage, and home/config resolution.
 *
 * The kernel package defines interfaces; this package provides
 * implementations. No kernel code imports from this package.
 */

// Logging
export { DEFAULT_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export type { UlidFactory, UlidSources } from './logging/ulid.js';
export { createUlidFactory, ulid } from './logging/ulid.js';
export type {
  LogFilter,
  LogReadResult,
  LogReadStats,
  StoredLogEntry,
} from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Log storage
export type { LogStore } from './state/log-store.js';
export { FileLogStore, MemoryLogStore } from './state/log-store.js';

// Home and configuration
export type { ResolveMockworkHomeOptions } from './home.js';
export { logsDir, mockworkHomePath, resolveMockworkHome } from './home.js';
export type { MockworkConfig } from './config.js';
export { CONFIG_FILE, DEFAULT_CONFIG, loadConfig, validateConfig } from './config.js';
