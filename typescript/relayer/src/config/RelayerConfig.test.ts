import { expect, use as chaiUse } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { lockPathFor } from '@icmctl/utils';

import { RelayerConfigError } from '../errors.js';
import { NetworkKind, getNetwork } from '../network.js';

import {
  BaseRelayerConfigOptions,
  MergeOutcome,
  RelayerDestinationInput,
  RelayerSourceInput,
  addDestinationToRelayerConfig,
  addSourceAndDestinationToRelayerConfig,
  addSourceToRelayerConfig,
  createBaseRelayerConfig,
  createBaseRelayerConfigIfMissing,
  loadRelayerConfig,
  saveRelayerConfig,
  serializeRelayerConfig,
} from './RelayerConfig.js';
import { MessageFormat } from './schema.js';

chaiUse(chaiAsPromised);

const MESSENGER = '0x253b2784c75e510dD0fF1da844684a1aC0aa5fcf';
const REGISTRY_A = '0x1111111111111111111111111111111111111111';
const REGISTRY_B = '0x2222222222222222222222222222222222222222';
const REWARD = '0x3333333333333333333333333333333333333333';

function sourceInput(
  blockchainID: string,
  overrides: Partial<RelayerSourceInput> = {},
): RelayerSourceInput {
  return {
    subnetID: `subnet-${blockchainID}`,
    blockchainID,
    rpcEndpoint: `http://127.0.0.1:9650/ext/bc/${blockchainID}/rpc`,
    messengerAddress: MESSENGER,
    registryAddress: REGISTRY_A,
    rewardAddress: REWARD,
    ...overrides,
  };
}

function destinationInput(blockchainID: string): RelayerDestinationInput {
  return {
    subnetID: `subnet-${blockchainID}`,
    blockchainID,
    rpcEndpoint: `http://127.0.0.1:9650/ext/bc/${blockchainID}/rpc`,
    privateKey: 'test-secret',
  };
}

describe('RelayerConfig', () => {
  let tempDir: string;
  let configPath: string;
  let baseOptions: BaseRelayerConfigOptions;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relayer-config-test-'));
    configPath = path.join(tempDir, 'icm-relayer-config.json');
    baseOptions = {
      logLevel: 'info',
      storageLocation: path.join(tempDir, 'storage'),
      network: getNetwork(NetworkKind.Local),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('createBaseRelayerConfigIfMissing', () => {
    it('writes a skeleton config with empty tables', async () => {
      const created = await createBaseRelayerConfigIfMissing(
        configPath,
        baseOptions,
      );
      expect(created).to.be.true;

      const config = loadRelayerConfig(configPath);
      expect(config.sourceBlockchains.size).to.equal(0);
      expect(config.destinationBlockchains.size).to.equal(0);
      expect(config.pChainAPI.baseURL).to.equal('http://127.0.0.1:9650');
      expect(config.infoAPI.baseURL).to.equal('http://127.0.0.1:9650');
      expect(config.metricsPort).to.equal(9091);
      expect(config.dbWriteIntervalSeconds).to.equal(10);
      expect(config.signatureCacheSize).to.equal(1048576);
      expect(config.allowPrivateIPs).to.be.true;
      expect(fs.existsSync(lockPathFor(configPath))).to.be.false;
    });

    it('never overwrites an existing config', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));
      const before = fs.readFileSync(configPath, 'utf8');

      const created = await createBaseRelayerConfigIfMissing(configPath, {
        ...baseOptions,
        logLevel: 'debug',
      });

      expect(created).to.be.false;
      expect(fs.readFileSync(configPath, 'utf8')).to.equal(before);
    });

    it('disables private ips outside the local network', async () => {
      await createBaseRelayerConfigIfMissing(configPath, {
        ...baseOptions,
        network: getNetwork(NetworkKind.Fuji),
      });
      const config = loadRelayerConfig(configPath);
      expect(config.allowPrivateIPs).to.be.false;
      expect(config.pChainAPI.baseURL).to.equal(
        'https://api.avax-test.network',
      );
    });
  });

  describe('createBaseRelayerConfig', () => {
    it('replaces an existing config', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));

      await createBaseRelayerConfig(configPath, {
        ...baseOptions,
        metricsPort: 9191,
      });

      const config = loadRelayerConfig(configPath);
      expect(config.sourceBlockchains.size).to.equal(0);
      expect(config.metricsPort).to.equal(9191);
    });
  });

  describe('addSourceToRelayerConfig', () => {
    beforeEach(async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
    });

    it('builds both message contract bindings', async () => {
      const outcome = await addSourceToRelayerConfig(
        configPath,
        sourceInput('2CA6'),
      );
      expect(outcome).to.equal(MergeOutcome.Added);

      const source = loadRelayerConfig(configPath).sourceBlockchains.get(
        '2CA6',
      );
      expect(source?.vm).to.equal('evm');
      expect(source?.wsEndpoint.baseURL).to.equal(
        'ws://127.0.0.1:9650/ext/bc/2CA6/ws',
      );
      expect(source?.messageContracts.get(MESSENGER)).to.deep.equal({
        messageFormat: MessageFormat.Teleporter,
        settings: { rewardAddress: REWARD },
      });
      expect(
        source?.messageContracts.get(
          '0x0000000000000000000000000000000000000000',
        ),
      ).to.deep.equal({
        messageFormat: MessageFormat.OffChainRegistry,
        settings: { teleporterRegistryAddress: REGISTRY_A },
      });
    });

    it('keeps an explicit websocket endpoint', async () => {
      await addSourceToRelayerConfig(
        configPath,
        sourceInput('2CA6', { wsEndpoint: 'wss://node.example/ws' }),
      );
      const source = loadRelayerConfig(configPath).sourceBlockchains.get(
        '2CA6',
      );
      expect(source?.wsEndpoint.baseURL).to.equal('wss://node.example/ws');
    });

    it('is idempotent per blockchainID', async () => {
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));
      const outcome = await addSourceToRelayerConfig(
        configPath,
        sourceInput('2CA6'),
      );
      expect(outcome).to.equal(MergeOutcome.Unchanged);
      expect(loadRelayerConfig(configPath).sourceBlockchains.size).to.equal(1);
    });

    it('keeps the first entry when parameters differ', async () => {
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));
      const outcome = await addSourceToRelayerConfig(
        configPath,
        sourceInput('2CA6', { messengerAddress: REGISTRY_B }),
      );
      expect(outcome).to.equal(MergeOutcome.Conflict);

      const config = loadRelayerConfig(configPath);
      expect(config.sourceBlockchains.size).to.equal(1);
      expect([
        ...(config.sourceBlockchains.get('2CA6')?.messageContracts.keys() ??
          []),
      ]).to.deep.equal([
        MESSENGER,
        '0x0000000000000000000000000000000000000000',
      ]);
    });

    it('appends distinct blockchains in insertion order', async () => {
      await addSourceToRelayerConfig(configPath, sourceInput('zzz'));
      await addSourceToRelayerConfig(configPath, sourceInput('aaa'));

      const config = loadRelayerConfig(configPath);
      expect([...config.sourceBlockchains.keys()]).to.deep.equal([
        'zzz',
        'aaa',
      ]);
    });

    it('serializes concurrent updates', async () => {
      const ids = ['a1', 'b2', 'c3', 'd4', 'e5'];
      await Promise.all(
        ids.map((id) =>
          addSourceToRelayerConfig(configPath, sourceInput(id), {
            retryDelayMs: 5,
          }),
        ),
      );
      const config = loadRelayerConfig(configPath);
      expect([...config.sourceBlockchains.keys()].sort()).to.deep.equal(ids);
    });

    it('fails when no config exists', async () => {
      fs.rmSync(configPath);
      await expect(
        addSourceToRelayerConfig(configPath, sourceInput('2CA6')),
      ).to.be.rejectedWith(RelayerConfigError);
      expect(fs.existsSync(lockPathFor(configPath))).to.be.false;
    });
  });

  describe('addDestinationToRelayerConfig', () => {
    beforeEach(async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
    });

    it('adds a destination once', async () => {
      expect(
        await addDestinationToRelayerConfig(
          configPath,
          destinationInput('2CA6'),
        ),
      ).to.equal(MergeOutcome.Added);
      expect(
        await addDestinationToRelayerConfig(
          configPath,
          destinationInput('2CA6'),
        ),
      ).to.equal(MergeOutcome.Unchanged);

      const config = loadRelayerConfig(configPath);
      expect(config.destinationBlockchains.size).to.equal(1);
      expect(
        config.destinationBlockchains.get('2CA6')?.accountPrivateKey,
      ).to.equal('test-secret');
    });
  });

  describe('addSourceAndDestinationToRelayerConfig', () => {
    it('keeps the original registry address on re-registration', async () => {
      const created = await createBaseRelayerConfigIfMissing(
        configPath,
        baseOptions,
      );
      expect(created).to.be.true;

      const first = await addSourceAndDestinationToRelayerConfig(
        configPath,
        sourceInput('2CA6'),
        destinationInput('2CA6'),
      );
      expect(first).to.deep.equal({
        source: MergeOutcome.Added,
        destination: MergeOutcome.Added,
      });

      const second = await addSourceAndDestinationToRelayerConfig(
        configPath,
        sourceInput('2CA6', { registryAddress: REGISTRY_B }),
        destinationInput('2CA6'),
      );
      expect(second).to.deep.equal({
        source: MergeOutcome.Conflict,
        destination: MergeOutcome.Unchanged,
      });

      const config = loadRelayerConfig(configPath);
      expect(config.sourceBlockchains.size).to.equal(1);
      expect(config.destinationBlockchains.size).to.equal(1);
      expect(
        config.sourceBlockchains
          .get('2CA6')
          ?.messageContracts.get('0x0000000000000000000000000000000000000000'),
      ).to.deep.equal({
        messageFormat: MessageFormat.OffChainRegistry,
        settings: { teleporterRegistryAddress: REGISTRY_A },
      });
    });
  });

  describe('persistence', () => {
    it('keeps settings it does not manage across merges', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));
      const raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      raw['api-port'] = 8080;
      raw['manual-warp-messages'] = [];
      raw['source-blockchains'][0]['supported-destinations'] = [
        { 'blockchain-id': 'Xyz9' },
      ];
      raw['source-blockchains'][0]['rpc-endpoint']['http-headers'] = {
        authorization: 'test-secret',
      };
      fs.writeFileSync(configPath, JSON.stringify(raw));

      const source = await addSourceToRelayerConfig(
        configPath,
        sourceInput('2CA6'),
      );
      await addDestinationToRelayerConfig(configPath, destinationInput('Xyz9'));

      expect(source).to.equal(MergeOutcome.Unchanged);
      const merged = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      expect(merged['api-port']).to.equal(8080);
      expect(merged['manual-warp-messages']).to.deep.equal([]);
      expect(
        merged['source-blockchains'][0]['supported-destinations'],
      ).to.deep.equal([{ 'blockchain-id': 'Xyz9' }]);
      expect(
        merged['source-blockchains'][0]['rpc-endpoint']['http-headers'],
      ).to.deep.equal({ authorization: 'test-secret' });
      expect(Object.keys(merged).slice(-2)).to.deep.equal([
        'api-port',
        'manual-warp-messages',
      ]);
      expect(merged['destination-blockchains']).to.have.length(1);
    });

    it('round trips byte for byte', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addSourceAndDestinationToRelayerConfig(
        configPath,
        sourceInput('2CA6'),
        destinationInput('2CA6'),
      );
      await addSourceToRelayerConfig(configPath, sourceInput('Xyz9'));
      const written = fs.readFileSync(configPath, 'utf8');

      const reloaded = loadRelayerConfig(configPath);
      expect(serializeRelayerConfig(reloaded)).to.equal(written);

      const copyPath = path.join(tempDir, 'copy.json');
      saveRelayerConfig(reloaded, copyPath);
      expect(fs.readFileSync(copyPath, 'utf8')).to.equal(written);
    });

    it('writes the keys the relayer binary reads', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addDestinationToRelayerConfig(configPath, destinationInput('2CA6'));

      const raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      expect(Object.keys(raw)).to.deep.equal([
        'log-level',
        'p-chain-api',
        'info-api',
        'storage-location',
        'process-missed-blocks',
        'source-blockchains',
        'destination-blockchains',
        'metrics-port',
        'db-write-interval-seconds',
        'signature-cache-size',
        'allow-private-ips',
      ]);
      expect(raw['destination-blockchains']).to.deep.equal([
        {
          'subnet-id': 'subnet-2CA6',
          'blockchain-id': '2CA6',
          vm: 'evm',
          'rpc-endpoint': {
            'base-url': 'http://127.0.0.1:9650/ext/bc/2CA6/rpc',
            'query-parameters': {},
          },
          'account-private-key': 'test-secret',
        },
      ]);
    });

    it('rejects unparseable files without touching them', () => {
      fs.writeFileSync(configPath, '{ not json');
      expect(() => loadRelayerConfig(configPath)).to.throw(
        RelayerConfigError,
        /Failed to read relayer config/,
      );
      expect(fs.readFileSync(configPath, 'utf8')).to.equal('{ not json');
    });

    it('rejects duplicate blockchain entries', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addDestinationToRelayerConfig(configPath, destinationInput('2CA6'));
      const raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      raw['destination-blockchains'].push(raw['destination-blockchains'][0]);
      fs.writeFileSync(configPath, JSON.stringify(raw));

      expect(() => loadRelayerConfig(configPath)).to.throw(
        RelayerConfigError,
        /Duplicate destination entry for blockchain 2CA6/,
      );
    });

    it('rejects unknown message formats', async () => {
      await createBaseRelayerConfigIfMissing(configPath, baseOptions);
      await addSourceToRelayerConfig(configPath, sourceInput('2CA6'));
      const raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      raw['source-blockchains'][0]['message-contracts'][MESSENGER][
        'message-format'
      ] = 'unknown';
      fs.writeFileSync(configPath, JSON.stringify(raw));

      expect(() => loadRelayerConfig(configPath)).to.throw(RelayerConfigError);
    });
  });
});
