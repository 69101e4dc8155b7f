/**
 * Mockwork Kernel — Log Sink Interface
 *
 * Injection point for dispatch log persistence. The kernel owns this
 * contract and never writes anywhere itself; concrete sinks live in
 * @mockwork/runtime-host.
 */

import type { DispatchLogEntry } from '../types/log.js';

/**
 * Receives dispatch and verification entries.
 *
 * append() is called synchronously, after the kernel state the entry
 * describes has been updated.
 */
export interface LogSink {
  append(entry: DispatchLogEntry): void;
}
