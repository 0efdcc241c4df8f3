import { expect, use as chaiUse } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { execFileSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import sinon from 'sinon';

import { RelayerInstallError } from '../errors.js';

import { Downloader } from './downloader.js';
import {
  getRelayerUrl,
  installRelayer,
  resolveRelayerVersion,
} from './installer.js';

chaiUse(chaiAsPromised);

function buildRelayerArchive(workDir: string, mode = 0o755): Uint8Array {
  const srcDir = path.join(workDir, 'archive-src');
  fs.mkdirSync(srcDir, { recursive: true });
  fs.writeFileSync(path.join(srcDir, 'icm-relayer'), '#!/bin/sh\necho relayer\n', {
    mode,
  });
  fs.chmodSync(path.join(srcDir, 'icm-relayer'), mode);
  const archivePath = path.join(workDir, 'relayer.tar.gz');
  execFileSync('tar', ['-czf', archivePath, '-C', srcDir, 'icm-relayer']);
  return fs.readFileSync(archivePath);
}

function stubDownloader(archive: Uint8Array = new Uint8Array()) {
  return {
    download: sinon.stub<[string], Promise<Uint8Array>>().resolves(archive),
    getLatestPreReleaseVersion: sinon
      .stub<[string, string, string], Promise<string>>()
      .resolves('icm-relayer-v1.5.0-rc.1'),
    getLatestReleaseVersion: sinon
      .stub<[string, string, string], Promise<string>>()
      .resolves('icm-relayer/v1.4.0'),
  } satisfies Downloader;
}

describe('relayer installer', () => {
  describe('getRelayerUrl', () => {
    it('encodes slash separated component tags', () => {
      expect(getRelayerUrl('icm-relayer/v1.4.0', 'linux', 'x64')).to.equal(
        'https://github.com/ava-labs/icm-services/releases/download/icm-relayer%2Fv1.4.0/icm-relayer_1.4.0_linux_amd64.tar.gz',
      );
    });

    it('handles dash separated component tags', () => {
      expect(getRelayerUrl('icm-relayer-v1.4.0', 'darwin', 'arm64')).to.equal(
        'https://github.com/ava-labs/icm-services/releases/download/icm-relayer-v1.4.0/icm-relayer_1.4.0_darwin_arm64.tar.gz',
      );
    });

    it('handles plain semantic version tags', () => {
      expect(getRelayerUrl('v1.3.2', 'linux', 'arm64')).to.equal(
        'https://github.com/ava-labs/icm-services/releases/download/v1.3.2/icm-relayer_1.3.2_linux_arm64.tar.gz',
      );
    });

    it('rejects unsupported platforms', () => {
      expect(() => getRelayerUrl('v1.3.2', 'win32', 'x64')).to.throw(
        RelayerInstallError,
        'OS not supported: win32',
      );
      expect(() => getRelayerUrl('v1.3.2', 'linux', 'ia32')).to.throw(
        RelayerInstallError,
        'Architecture not supported: ia32',
      );
    });
  });

  describe('resolveRelayerVersion', () => {
    it('resolves empty and latest-prerelease to the newest tag', async () => {
      const downloader = stubDownloader();
      expect(await resolveRelayerVersion('', downloader)).to.equal(
        'icm-relayer-v1.5.0-rc.1',
      );
      expect(
        await resolveRelayerVersion('latest-prerelease', downloader),
      ).to.equal('icm-relayer-v1.5.0-rc.1');
      expect(
        downloader.getLatestPreReleaseVersion.alwaysCalledWithExactly(
          'ava-labs',
          'icm-services',
          'icm-relayer',
        ),
      ).to.be.true;
    });

    it('resolves latest to the newest stable tag', async () => {
      const downloader = stubDownloader();
      expect(await resolveRelayerVersion('latest', downloader)).to.equal(
        'icm-relayer/v1.4.0',
      );
      expect(downloader.getLatestPreReleaseVersion.called).to.be.false;
    });

    it('passes explicit versions through', async () => {
      const downloader = stubDownloader();
      expect(await resolveRelayerVersion('v1.3.2', downloader)).to.equal(
        'v1.3.2',
      );
      expect(downloader.getLatestReleaseVersion.called).to.be.false;
    });
  });

  describe('installRelayer', () => {
    let tempDir: string;
    let binDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relayer-install-test-'));
      binDir = path.join(tempDir, 'bin', 'icm-relayer');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('downloads and extracts once, then hits the cache', async () => {
      const downloader = stubDownloader(buildRelayerArchive(tempDir));
      const options = { downloader, platform: 'linux' as const, arch: 'x64' };

      const first = await installRelayer(binDir, 'v1.3.2', options);
      const second = await installRelayer(binDir, 'v1.3.2', options);

      expect(first).to.equal(path.join(binDir, 'v1.3.2', 'icm-relayer'));
      expect(second).to.equal(first);
      expect(downloader.download.callCount).to.equal(1);
      expect(downloader.download.firstCall.args[0]).to.equal(
        'https://github.com/ava-labs/icm-services/releases/download/v1.3.2/icm-relayer_1.3.2_linux_amd64.tar.gz',
      );
      expect(fs.existsSync(path.join(binDir, 'v1.3.2', 'icm-relayer.tar.gz'))).to
        .be.false;
    });

    it('uses a pre-populated executable without downloading', async () => {
      const binPath = path.join(binDir, 'v1.3.2', 'icm-relayer');
      fs.mkdirSync(path.dirname(binPath), { recursive: true });
      fs.writeFileSync(binPath, '#!/bin/sh\n', { mode: 0o755 });
      const downloader = stubDownloader();

      expect(
        await installRelayer(binDir, 'v1.3.2', {
          downloader,
          platform: 'darwin',
          arch: 'arm64',
        }),
      ).to.equal(binPath);
      expect(downloader.download.called).to.be.false;
    });

    it('fails when the archive is not a tarball', async () => {
      const downloader = stubDownloader(new TextEncoder().encode('not a tar'));

      await expect(
        installRelayer(binDir, 'v1.3.2', {
          downloader,
          platform: 'linux',
          arch: 'x64',
        }),
      ).to.be.rejectedWith(
        RelayerInstallError,
        'Failed to extract relayer archive',
      );
    });

    it('fails when the archive has no executable relayer', async () => {
      const downloader = stubDownloader(buildRelayerArchive(tempDir, 0o644));

      await expect(
        installRelayer(binDir, 'v1.3.2', {
          downloader,
          platform: 'linux',
          arch: 'x64',
        }),
      ).to.be.rejectedWith(RelayerInstallError, 'Relayer binary not found');
    });

    it('fails on unsupported platforms before downloading', async () => {
      const downloader = stubDownloader();

      await expect(
        installRelayer(binDir, 'v1.3.2', {
          downloader,
          platform: 'win32',
          arch: 'x64',
        }),
      ).to.be.rejectedWith(RelayerInstallError, 'OS not supported');
      expect(downloader.download.called).to.be.false;
    });
  });
});
