import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Append one JSON line to the audit log, stamped with an ISO timestamp.
 */
export async function logAudit(logPath: string, entry: Record<string, unknown>): Promise<void> {
  await mkdir(dirname(logPath), { recursive: true });
  const line = JSON.stringify({ ...entry, timestamp: new Date().toISOString() }) + '\n';
  await appendFile(logPath, line);
}
