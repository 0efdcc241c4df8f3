import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';

import { DEFAULT_DIR_MODE, isExecutable, rootLogger } from '@icmctl/utils';

import {
  GITHUB_ORG,
  ICM_RELAYER_BIN,
  ICM_RELAYER_COMPONENT,
  ICM_SERVICES_REPO,
  LATEST_PRERELEASE_VERSION_TAG,
  LATEST_RELEASE_VERSION_TAG,
} from '../consts.js';
import { RelayerInstallError } from '../errors.js';

import { Downloader, GithubDownloader } from './downloader.js';

export interface InstallRelayerOptions {
  downloader?: Downloader;
  platform?: NodeJS.Platform;
  arch?: string;
}

const SUPPORTED_PLATFORMS: NodeJS.Platform[] = ['linux', 'darwin'];

const RELEASE_ARCH: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64',
};

const getLogger = () => rootLogger.child({ module: 'relayer-installer' });

/**
 * Resolves the "latest" and "latest-prerelease" aliases (and an empty
 * version) to a concrete release tag.
 */
export async function resolveRelayerVersion(
  version: string,
  downloader: Downloader,
): Promise<string> {
  if (!version || version === LATEST_PRERELEASE_VERSION_TAG) {
    return downloader.getLatestPreReleaseVersion(
      GITHUB_ORG,
      ICM_SERVICES_REPO,
      ICM_RELAYER_COMPONENT,
    );
  }
  if (version === LATEST_RELEASE_VERSION_TAG) {
    return downloader.getLatestReleaseVersion(
      GITHUB_ORG,
      ICM_SERVICES_REPO,
      ICM_RELAYER_COMPONENT,
    );
  }
  return version;
}

/**
 * Builds the release archive url for a tag. Tags come in three shapes:
 * icm-relayer/vX.Y.Z, icm-relayer-vX.Y.Z and vX.Y.Z.
 */
export function getRelayerUrl(
  version: string,
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  if (!SUPPORTED_PLATFORMS.includes(platform)) {
    throw new RelayerInstallError(`OS not supported: ${platform}`);
  }
  const releaseArch = RELEASE_ARCH[arch];
  if (!releaseArch) {
    throw new RelayerInstallError(`Architecture not supported: ${arch}`);
  }

  let releaseTag = version;
  let semanticVersion = version;
  if (version.startsWith(`${ICM_RELAYER_COMPONENT}/`)) {
    semanticVersion = version.slice(ICM_RELAYER_COMPONENT.length + 1);
    releaseTag = encodeURIComponent(version);
  } else if (version.startsWith(`${ICM_RELAYER_COMPONENT}-`)) {
    semanticVersion = version.slice(ICM_RELAYER_COMPONENT.length + 1);
  }
  const archiveVersion = semanticVersion.replace(/^v/, '');

  return `https://github.com/${GITHUB_ORG}/${ICM_SERVICES_REPO}/releases/download/${releaseTag}/${ICM_RELAYER_BIN}_${archiveVersion}_${platform}_${releaseArch}.tar.gz`;
}

function extractTarGz(archivePath: string, destination: string) {
  return new Promise<void>((resolve, reject) => {
    execFile('tar', ['-xzf', archivePath, '-C', destination], (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

export function getRelayerBinPath(binDir: string, version: string): string {
  return path.join(binDir, version, ICM_RELAYER_BIN);
}

/**
 * Ensures the relayer binary for a version exists under
 * binDir/<version>/, downloading it when missing.
 * @returns path of the executable
 */
export async function installRelayer(
  binDir: string,
  version: string,
  {
    downloader = new GithubDownloader(),
    platform = process.platform,
    arch = process.arch,
  }: InstallRelayerOptions = {},
): Promise<string> {
  const logger = getLogger();
  const resolvedVersion = await resolveRelayerVersion(version, downloader);
  logger.info(`Relayer version ${resolvedVersion}`);

  const binPath = getRelayerBinPath(binDir, resolvedVersion);
  if (isExecutable(binPath)) {
    logger.debug({ binPath }, 'Relayer already installed');
    return binPath;
  }

  logger.info('Installing relayer');
  const url = getRelayerUrl(resolvedVersion, platform, arch);
  const archive = await downloader.download(url);

  const versionDir = path.dirname(binPath);
  fs.mkdirSync(versionDir, { recursive: true, mode: DEFAULT_DIR_MODE });
  const archivePath = path.join(versionDir, `${ICM_RELAYER_BIN}.tar.gz`);
  try {
    fs.writeFileSync(archivePath, archive);
    await extractTarGz(archivePath, versionDir);
  } catch (error) {
    throw new RelayerInstallError(
      `Failed to extract relayer archive from ${url}`,
      error,
    );
  } finally {
    fs.rmSync(archivePath, { force: true });
  }

  if (!isExecutable(binPath)) {
    throw new RelayerInstallError(
      `Relayer binary not found at ${binPath} after extracting ${url}`,
    );
  }
  return binPath;
}
