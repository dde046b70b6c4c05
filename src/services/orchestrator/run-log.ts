// Run log - timestamped record of one orchestrator run, mirrored to pino

import type { Logger } from 'pino';
import { componentLogger } from '../../utils/logger.js';
import type { RunLogEntry, RunLogKind } from './types.js';

export class RunLog {
  private entries: RunLogEntry[] = [];

  constructor(
    private log: Logger = componentLogger('orchestrator'),
    private clock: () => Date = () => new Date(),
  ) {}

  record(kind: RunLogKind, message: string, data?: Record<string, unknown>): RunLogEntry {
    const entry: RunLogEntry = { timestamp: this.clock().toISOString(), kind, message };
    if (data) entry.data = data;
    this.entries.push(entry);

    if (kind === 'error') {
      this.log.error({ kind, ...data }, message);
    } else {
      this.log.info({ kind, ...data }, message);
    }
    return entry;
  }

  all(): RunLogEntry[] {
    return [...this.entries];
  }
}
