/**
 * Append-only audit log of state-changing operations
 *
 * One JSON object per line at the configured `paths.logFile`. Every lifecycle
 * operation records its outcome here, failures included, before the error
 * propagates to the caller. Key contents are never written, only paths.
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { userInfo } from 'os';
import { z } from 'zod';
import { pathExists } from './paths.js';
import { errorMessage } from '../errors.js';
import { logger } from '../ui/logger.js';

// ============================================================================
// Types
// ============================================================================

export const AUDIT_OPERATIONS = [
  'create',
  'open',
  'mount',
  'unmount',
  'close',
  'key-generate',
  'key-master',
  'key-add',
  'key-remove',
  'rotate-master',
  'seal',
  'unseal',
  'close-all',
  'unmount-all',
] as const;

export type AuditOperation = (typeof AUDIT_OPERATIONS)[number];

export type AuditOutcome = 'success' | 'failure' | 'declined';

const auditEntrySchema = z.object({
  timestamp: z.string(),
  operation: z.enum(AUDIT_OPERATIONS),
  target: z.string(),
  outcome: z.enum(['success', 'failure', 'declined']),
  details: z.string().optional(),
  user: z.string().optional(),
});

export type AuditEntry = z.infer<typeof auditEntrySchema>;

export interface AuditRecord {
  operation: AuditOperation;
  target: string;
  outcome: AuditOutcome;
  details?: string;
}

/** Where the lifecycle manager sends its records */
export interface AuditSink {
  record(entry: AuditRecord): Promise<void>;
}

// ============================================================================
// Logging
// ============================================================================

const currentUser = (): string | undefined => {
  if (process.env.SUDO_USER) {
    return process.env.SUDO_USER;
  }
  try {
    return userInfo().username;
  } catch {
    return process.env.USER;
  }
};

/**
 * Append one entry. A write failure is reported as a warning and does not
 * fail the operation being audited.
 */
export async function logAuditEntry(logFile: string, record: AuditRecord): Promise<void> {
  const entry: AuditEntry = {
    timestamp: new Date().toISOString(),
    ...record,
    user: currentUser(),
  };

  try {
    await mkdir(dirname(logFile), { recursive: true });
    await appendFile(logFile, JSON.stringify(entry) + '\n', 'utf-8');
  } catch (error) {
    logger.warning(`Could not write audit log ${logFile}: ${errorMessage(error)}`);
  }
}

export const createFileAuditSink = (logFile: string): AuditSink => ({
  record: (entry) => logAuditEntry(logFile, entry),
});

// ============================================================================
// Reading
// ============================================================================

/**
 * Most recent entries, oldest first. Lines that are not valid entries are
 * skipped.
 *
 * @param target - only entries for this container name
 */
export async function getRecentAuditEntries(
  logFile: string,
  limit = 10,
  target?: string
): Promise<AuditEntry[]> {
  if (!(await pathExists(logFile))) {
    return [];
  }

  const content = await readFile(logFile, 'utf-8');
  const entries = content
    .split('\n')
    .filter(Boolean)
    .flatMap((line) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        logger.debug(`Skipping malformed audit line: ${line}`);
        return [];
      }
      const parsed = auditEntrySchema.safeParse(raw);
      return parsed.success ? [parsed.data] : [];
    })
    .filter((entry) => target === undefined || entry.target === target);

  return entries.slice(-limit);
}
