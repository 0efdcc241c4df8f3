import fs from 'fs';

import { hasErrorCode, pollAsync, rootLogger } from '@icmctl/utils';

import { RELAYER_CHECK_POLL_MS, RELAYER_STOP_TIMEOUT_MS } from '../consts.js';
import { RelayerShutdownError } from '../errors.js';

import {
  RelayerRunRecord,
  readProcStat,
  readRelayerRunFile,
  removeRelayerRunFile,
} from './runFile.js';

export type RelayerLiveness =
  | { alive: false; pid: 0 }
  | { alive: true; pid: number; record: RelayerRunRecord };

export interface RelayerStopOptions {
  pollIntervalMs?: number;
  // How long to wait after SIGINT before escalating to SIGKILL
  stopTimeoutMs?: number;
}

const NOT_RUNNING: RelayerLiveness = { alive: false, pid: 0 };

const getLogger = () => rootLogger.child({ module: 'relayer-process' });

/**
 * Probes a pid with signal 0. A zombie still answers the probe, so procfs
 * is consulted where available.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (error) {
    if (hasErrorCode(error, 'ESRCH')) return false;
    // exists but belongs to another user
    if (hasErrorCode(error, 'EPERM')) return true;
    throw error;
  }
  return readProcStat(pid)?.state !== 'Z';
}

function isSameProcess(record: RelayerRunRecord): boolean {
  if (!isProcessAlive(record.pid)) return false;
  if (record.startTime === undefined) return true;
  const startTime = readProcStat(record.pid)?.startTime;
  return startTime === undefined || startTime === record.startTime;
}

/**
 * Derives relayer liveness from the run-file and the OS process table.
 * A run-file pointing at a dead or reused pid is removed.
 */
export function isRelayerUp(runFilePath: string): RelayerLiveness {
  const record = readRelayerRunFile(runFilePath);
  if (!record) return NOT_RUNNING;

  if (!isSameProcess(record)) {
    getLogger().debug(
      { runFilePath, pid: record.pid },
      'Removing stale relayer run-file',
    );
    removeRelayerRunFile(runFilePath);
    return NOT_RUNNING;
  }
  return { alive: true, pid: record.pid, record };
}

/**
 * @returns false if the process was already gone
 */
function sendSignal(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ESRCH')) return false;
    throw new RelayerShutdownError(
      `Failed to send ${signal} to relayer process ${pid}`,
      pid,
      error,
    );
  }
}

async function waitForExit(
  pid: number,
  pollIntervalMs: number,
  timeoutMs: number,
): Promise<boolean> {
  try {
    await pollAsync(
      async () => {
        if (isProcessAlive(pid)) {
          throw new Error(`Relayer process ${pid} is still running`);
        }
      },
      pollIntervalMs,
      Math.max(1, Math.ceil(timeoutMs / pollIntervalMs)),
    );
    return true;
  } catch {
    return false;
  }
}

/**
 * Interrupts a process and escalates to SIGKILL when it has not exited
 * within the stop timeout.
 */
export async function stopProcess(
  pid: number,
  options: RelayerStopOptions = {},
): Promise<void> {
  const pollIntervalMs = options.pollIntervalMs ?? RELAYER_CHECK_POLL_MS;
  const stopTimeoutMs = options.stopTimeoutMs ?? RELAYER_STOP_TIMEOUT_MS;
  const logger = getLogger();

  if (!sendSignal(pid, 'SIGINT')) return;
  if (await waitForExit(pid, pollIntervalMs, stopTimeoutMs)) return;

  logger.warn(
    { pid },
    `Relayer did not exit within ${stopTimeoutMs}ms of SIGINT, sending SIGKILL`,
  );
  if (!sendSignal(pid, 'SIGKILL')) return;
  if (await waitForExit(pid, pollIntervalMs, stopTimeoutMs)) return;

  throw new RelayerShutdownError(
    `Relayer process ${pid} is still running after SIGKILL`,
    pid,
  );
}

/**
 * Removes the relayer storage directory and stops the relayer recorded in
 * the run-file, if any.
 * @returns whether a running relayer was stopped
 */
export async function relayerCleanup(
  runFilePath: string,
  storageDir: string,
  options: RelayerStopOptions = {},
): Promise<boolean> {
  fs.rmSync(storageDir, { recursive: true, force: true });

  const liveness = isRelayerUp(runFilePath);
  if (!liveness.alive) return false;

  getLogger().debug({ pid: liveness.pid }, 'Stopping relayer');
  await stopProcess(liveness.pid, options);
  removeRelayerRunFile(runFilePath);
  return true;
}
