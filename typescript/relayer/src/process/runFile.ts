import fs from 'fs';
import { z } from 'zod';

import { hasErrorCode, stringifyJson, writeFileAtomic } from '@icmctl/utils';

import { RelayerConfigError } from '../errors.js';

export const RelayerRunRecordSchema = z.object({
  pid: z.number().int().positive(),
  // clock ticks since boot, used to detect pid reuse
  startTime: z.number().int().nonnegative().optional(),
});

export type RelayerRunRecord = z.infer<typeof RelayerRunRecordSchema>;

interface ProcStat {
  state: string;
  startTime: number;
}

/**
 * Parses /proc/<pid>/stat. Returns undefined where procfs is unavailable
 * or the process is gone.
 */
export function readProcStat(pid: number): ProcStat | undefined {
  let content: string;
  try {
    content = fs.readFileSync(`/proc/${pid}/stat`, 'utf8');
  } catch {
    return undefined;
  }
  // comm (field 2) is parenthesized and may itself contain spaces
  const fields = content
    .slice(content.lastIndexOf(')') + 2)
    .trim()
    .split(' ');
  // fields[0] is field 3 (state), so field 22 (starttime) is fields[19]
  const startTime = Number(fields[19]);
  if (!fields[0] || !Number.isInteger(startTime)) return undefined;
  return { state: fields[0], startTime };
}

export function getProcessStartTime(pid: number): number | undefined {
  return readProcStat(pid)?.startTime;
}

export function readRelayerRunFile(
  runFilePath: string,
): RelayerRunRecord | null {
  let content: string;
  try {
    content = fs.readFileSync(runFilePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new RelayerConfigError(
      `Malformed relayer run-file at ${runFilePath}`,
      error,
    );
  }
  const result = RelayerRunRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new RelayerConfigError(
      `Malformed relayer run-file at ${runFilePath}`,
      result.error,
    );
  }
  return result.data;
}

export function saveRelayerRunFile(
  runFilePath: string,
  pid: number,
  startTime = getProcessStartTime(pid),
): RelayerRunRecord {
  const record: RelayerRunRecord =
    startTime === undefined ? { pid } : { pid, startTime };
  writeFileAtomic(runFilePath, stringifyJson(record));
  return record;
}

export function removeRelayerRunFile(runFilePath: string): void {
  fs.rmSync(runFilePath, { force: true });
}
