import { z } from 'zod';

import {
  fetchWithTimeout,
  retryAsync,
  rootLogger,
  safelyAccessEnvVar,
} from '@icmctl/utils';

import { RelayerInstallError } from '../errors.js';

const GITHUB_API_URL = 'https://api.github.com';
const API_TIMEOUT_MS = 15_000;
const DOWNLOAD_TIMEOUT_MS = 5 * 60_000;
const DOWNLOAD_ATTEMPTS = 3;

export enum ReleaseKind {
  All = 'all',
  Release = 'release',
  Prerelease = 'prerelease',
}

export interface Downloader {
  download(url: string): Promise<Uint8Array>;
  // Newest release or pre-release tag of a component
  getLatestPreReleaseVersion(
    org: string,
    repo: string,
    component: string,
  ): Promise<string>;
  // Newest stable release tag of a component
  getLatestReleaseVersion(
    org: string,
    repo: string,
    component: string,
  ): Promise<string>;
}

export const GithubReleaseSchema = z.object({
  tag_name: z.string(),
  draft: z.boolean().optional(),
  prerelease: z.boolean(),
});

export type GithubRelease = z.infer<typeof GithubReleaseSchema>;

/**
 * Picks the first matching tag from a release list in the API's
 * newest-first order. Drafts are never picked.
 */
export function selectReleaseTag(
  releases: GithubRelease[],
  kind: ReleaseKind,
  component: string,
): string | undefined {
  return releases.find(
    (release) =>
      !release.draft &&
      (kind !== ReleaseKind.Release || !release.prerelease) &&
      (kind !== ReleaseKind.Prerelease || release.prerelease) &&
      release.tag_name.startsWith(component),
  )?.tag_name;
}

export class GithubDownloader implements Downloader {
  protected readonly logger = rootLogger.child({ module: 'downloader' });

  constructor(
    protected readonly token = safelyAccessEnvVar('GITHUB_TOKEN'),
    protected readonly apiUrl = GITHUB_API_URL,
  ) {}

  async download(url: string): Promise<Uint8Array> {
    this.logger.debug({ url }, 'Downloading');
    return retryAsync(async () => {
      const response = await this.request(url, DOWNLOAD_TIMEOUT_MS);
      return new Uint8Array(await response.arrayBuffer());
    }, DOWNLOAD_ATTEMPTS);
  }

  async getLatestPreReleaseVersion(
    org: string,
    repo: string,
    component: string,
  ): Promise<string> {
    return this.getLatestTag(org, repo, component, ReleaseKind.All);
  }

  async getLatestReleaseVersion(
    org: string,
    repo: string,
    component: string,
  ): Promise<string> {
    return this.getLatestTag(org, repo, component, ReleaseKind.Release);
  }

  async getReleases(org: string, repo: string): Promise<GithubRelease[]> {
    const url = `${this.apiUrl}/repos/${org}/${repo}/releases`;
    const response = await this.request(url, API_TIMEOUT_MS, {
      Accept: 'application/vnd.github+json',
    });
    const result = z.array(GithubReleaseSchema).safeParse(await response.json());
    if (!result.success) {
      throw new RelayerInstallError(
        `Unexpected release list format from ${url}`,
        result.error,
      );
    }
    return result.data;
  }

  protected async getLatestTag(
    org: string,
    repo: string,
    component: string,
    kind: ReleaseKind,
  ): Promise<string> {
    const releases = await this.getReleases(org, repo);
    const tag = selectReleaseTag(releases, kind, component);
    if (!tag) {
      throw new RelayerInstallError(
        `No ${kind === ReleaseKind.Release ? 'releases' : 'releases or prereleases'} found for ${org}/${repo} component ${component}`,
      );
    }
    return tag;
  }

  protected async request(
    url: string,
    timeoutMs: number,
    headers: Record<string, string> = {},
  ): Promise<Response> {
    // The token is only sent to the API, release assets are public
    if (this.token && url.startsWith(this.apiUrl)) {
      headers = { ...headers, Authorization: `Bearer ${this.token}` };
    }
    let response: Response;
    try {
      response = await fetchWithTimeout(url, { headers }, timeoutMs);
    } catch (error) {
      throw new RelayerInstallError(`Request to ${url} failed`, error);
    }
    if (!response.ok) {
      throw new RelayerInstallError(
        `Request to ${url} failed with status ${response.status}`,
      );
    }
    return response;
  }
}
