import { ChildProcess, spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';

import {
  DEFAULT_DIR_MODE,
  DEFAULT_FILE_MODE,
  isExecutable,
  isFile,
  rootLogger,
  sleep,
} from '@icmctl/utils';

import { loadRelayerConfig } from '../config/RelayerConfig.js';
import {
  ICM_RELAYER_BIN,
  RELAYER_CHECK_POLL_MS,
  RELAYER_INITIALIZED_LOG_MARKER,
  RELAYER_INIT_TIMEOUT_MS,
  RELAYER_SETUP_GRACE_MS,
  RELAYER_STOP_TIMEOUT_MS,
} from '../consts.js';
import {
  RelayerAlreadyRunningError,
  RelayerConfigError,
  RelayerLaunchError,
  RelayerNotRunningError,
} from '../errors.js';
import { Downloader } from '../install/downloader.js';
import { installRelayer } from '../install/installer.js';
import { RelayerPaths } from '../paths.js';
import {
  RelayerLiveness,
  isRelayerUp,
  relayerCleanup,
  stopProcess,
} from '../process/RelayerProcess.js';
import { saveRelayerRunFile } from '../process/runFile.js';

export enum RelayerState {
  NotDeployed = 'not-deployed',
  Installed = 'installed',
  Configured = 'configured',
  Running = 'running',
  Stopped = 'stopped',
}

export interface LocalRelayerOptions {
  downloader?: Downloader;
  platform?: NodeJS.Platform;
  arch?: string;
  setupGraceMs?: number;
  initTimeoutMs?: number;
  pollIntervalMs?: number;
  stopTimeoutMs?: number;
  logger?: Logger;
}

export interface RelayerDeployOptions {
  version: string;
  // Skips installation and runs this binary instead
  binPath?: string;
  // Wait until every source blockchain listener reports it is initialized
  waitForInitialization?: boolean;
}

export interface RelayerDeployResult {
  binPath: string;
  pid: number;
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Manages a relayer running as a detached process on this host. No state is
 * kept in memory between invocations: liveness always comes from the run-file
 * and the OS process table.
 */
export class LocalRelayer {
  protected readonly logger: Logger;
  protected readonly setupGraceMs: number;
  protected readonly initTimeoutMs: number;
  protected readonly pollIntervalMs: number;
  protected readonly stopTimeoutMs: number;

  constructor(
    public readonly paths: RelayerPaths,
    protected readonly options: LocalRelayerOptions = {},
  ) {
    this.logger =
      options.logger ?? rootLogger.child({ module: 'LocalRelayer' });
    this.setupGraceMs = options.setupGraceMs ?? RELAYER_SETUP_GRACE_MS;
    this.initTimeoutMs = options.initTimeoutMs ?? RELAYER_INIT_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? RELAYER_CHECK_POLL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? RELAYER_STOP_TIMEOUT_MS;
  }

  isUp(): RelayerLiveness {
    return isRelayerUp(this.paths.runFilePath);
  }

  getState(binPath?: string): RelayerState {
    if (this.isUp().alive) return RelayerState.Running;
    // A log file means the relayer was launched at least once
    if (isFile(this.paths.configPath)) {
      return isFile(this.paths.logPath)
        ? RelayerState.Stopped
        : RelayerState.Configured;
    }
    const installed = binPath
      ? isExecutable(binPath)
      : this.getInstalledBinaries().length > 0;
    return installed ? RelayerState.Installed : RelayerState.NotDeployed;
  }

  getInstalledBinaries(): string[] {
    const { binDir } = this.paths;
    if (!fs.existsSync(binDir)) return [];
    return fs
      .readdirSync(binDir, { recursive: true, encoding: 'utf8' })
      .filter((entry) => path.basename(entry) === ICM_RELAYER_BIN)
      .map((entry) => path.join(binDir, entry))
      .filter((entry) => isExecutable(entry));
  }

  async start(options: RelayerDeployOptions): Promise<RelayerDeployResult> {
    const liveness = this.isUp();
    if (liveness.alive) {
      throw new RelayerAlreadyRunningError(
        `Relayer is already running with pid ${liveness.pid}`,
      );
    }
    return this.deploy(options);
  }

  async stop(): Promise<void> {
    const liveness = this.isUp();
    if (!liveness.alive) {
      throw new RelayerNotRunningError('Relayer is not running');
    }
    await this.cleanup();
    this.logger.info(`Relayer with pid ${liveness.pid} stopped`);
  }

  async cleanup(): Promise<boolean> {
    return relayerCleanup(this.paths.runFilePath, this.paths.storageDir, {
      pollIntervalMs: this.pollIntervalMs,
      stopTimeoutMs: this.stopTimeoutMs,
    });
  }

  /**
   * Stops any previous instance, installs the binary and launches it in the
   * background. The run-file is only written once the process has survived
   * its startup, so a failed deploy leaves none behind.
   */
  async deploy({
    version,
    binPath,
    waitForInitialization = false,
  }: RelayerDeployOptions): Promise<RelayerDeployResult> {
    const { configPath, logPath, runFilePath, binDir } = this.paths;

    await this.cleanup();
    if (!isFile(configPath)) {
      throw new RelayerConfigError(
        `No relayer configuration found at ${configPath}`,
      );
    }
    const sourceBlockchainIDs = [
      ...loadRelayerConfig(configPath).sourceBlockchains.keys(),
    ];

    const resolvedBinPath =
      binPath ??
      (await installRelayer(binDir, version, {
        downloader: this.options.downloader,
        platform: this.options.platform,
        arch: this.options.arch,
      }));

    const child = await this.launch(resolvedBinPath);
    const pid = child.pid;
    if (pid === undefined) {
      throw new RelayerLaunchError('Relayer started without a pid', logPath);
    }

    try {
      await this.waitForSetup(child);
      if (waitForInitialization) {
        await this.waitForInitialization(child, sourceBlockchainIDs);
      }
      saveRelayerRunFile(runFilePath, pid);
    } catch (error) {
      await this.killLaunched(pid);
      throw error;
    }

    child.unref();
    this.logger.info(`Relayer started with pid ${pid}`);
    return { binPath: resolvedBinPath, pid };
  }

  protected async launch(binPath: string): Promise<ChildProcess> {
    const { configPath, logPath } = this.paths;
    fs.mkdirSync(path.dirname(logPath), {
      recursive: true,
      mode: DEFAULT_DIR_MODE,
    });
    const logFd = fs.openSync(logPath, 'w', DEFAULT_FILE_MODE);

    this.logger.debug({ binPath, configPath }, 'Launching relayer');
    try {
      const child = spawn(binPath, ['--config-file', configPath], {
        detached: true,
        stdio: ['ignore', logFd, logFd],
      });
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => {
          child.removeListener('error', reject);
          resolve();
        });
        child.once('error', reject);
      });
      child.on('error', (error) =>
        this.logger.debug({ error }, 'Relayer process error'),
      );
      return child;
    } catch (error) {
      throw new RelayerLaunchError(
        `Failed to launch relayer ${binPath}`,
        logPath,
        error,
      );
    } finally {
      fs.closeSync(logFd);
    }
  }

  // A relayer that rejects its configuration exits within the grace period
  protected async waitForSetup(child: ChildProcess): Promise<void> {
    if (!hasExited(child)) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          child.removeListener('exit', onExit);
          resolve();
        }, this.setupGraceMs);
        const onExit = () => {
          clearTimeout(timer);
          resolve();
        };
        child.once('exit', onExit);
      });
    }
    if (hasExited(child)) {
      throw new RelayerLaunchError(
        `Relayer exited during startup (code=${child.exitCode}, signal=${child.signalCode})`,
        this.paths.logPath,
      );
    }
  }

  protected async waitForInitialization(
    child: ChildProcess,
    sourceBlockchainIDs: string[],
  ): Promise<void> {
    const deadline = Date.now() + this.initTimeoutMs;
    let pending = sourceBlockchainIDs;
    this.logger.info('Waiting for relayer to initialize');
    for (;;) {
      if (hasExited(child)) {
        throw new RelayerLaunchError(
          'Relayer exited before initializing',
          this.paths.logPath,
        );
      }
      pending = this.getUninitializedSources(pending);
      if (pending.length === 0) return;
      if (Date.now() >= deadline) {
        throw new RelayerLaunchError(
          `Timed out after ${this.initTimeoutMs}ms waiting for relayer listeners of ${pending.join(', ')}`,
          this.paths.logPath,
        );
      }
      await sleep(this.pollIntervalMs);
    }
  }

  protected getUninitializedSources(blockchainIDs: string[]): string[] {
    const initializedLines = fs
      .readFileSync(this.paths.logPath, 'utf8')
      .split('\n')
      .filter((line) => line.includes(RELAYER_INITIALIZED_LOG_MARKER));
    return blockchainIDs.filter(
      (id) => !initializedLines.some((line) => line.includes(id)),
    );
  }

  protected async killLaunched(pid: number): Promise<void> {
    try {
      await stopProcess(pid, {
        pollIntervalMs: this.pollIntervalMs,
        stopTimeoutMs: this.stopTimeoutMs,
      });
    } catch (error) {
      this.logger.warn(
        { pid, error },
        'Failed to stop relayer after a failed launch',
      );
    }
  }
}
