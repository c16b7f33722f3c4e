/**
 * JSONL audit log writers with daily rotation.
 *
 * Writes never throw: a log failure is reported on stderr and dropped.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import type { ExecutionLogEntry, ServiceLogEntry } from './types.js';

const logger = new Logger('forge:audit');

function dailyFile(logDir: string, prefix: string): string {
  const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
  return join(logDir, `${prefix}-${date}.jsonl`);
}

async function appendEntry(logDir: string, prefix: string, entry: object): Promise<void> {
  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(dailyFile(logDir, prefix), JSON.stringify(entry) + '\n', 'utf-8');
  } catch (err) {
    logger.error(`Failed to write ${prefix} log: ${toErrorMessage(err)}`);
  }
}

export function logExecution(logDir: string, entry: ExecutionLogEntry): Promise<void> {
  return appendEntry(logDir, 'executions', entry);
}

export function logServiceEvent(logDir: string, entry: ServiceLogEntry): Promise<void> {
  return appendEntry(logDir, 'services', entry);
}
