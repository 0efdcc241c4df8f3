import { expect, use as chaiUse } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { BigNumber, Wallet, providers, utils } from 'ethers';
import fs from 'fs';
import os from 'os';
import path from 'path';
import sinon from 'sinon';

import { RelayerConfigError, RelayerFundingError } from '../errors.js';

import { ensureRelayerFunded } from './funding.js';
import { getRelayerKeyInfo } from './keys.js';

chaiUse(chaiAsPromised);

const RELAYER = '0x4444444444444444444444444444444444444444';
const FUNDER_KEY = '0x' + '11'.repeat(32);

describe('relayer funding', () => {
  let provider: providers.JsonRpcProvider;
  let funder: Wallet;
  let getBalance: sinon.SinonStub;
  let sendTransaction: sinon.SinonStub;

  beforeEach(() => {
    provider = new providers.JsonRpcProvider('http://127.0.0.1:9650', {
      name: 'test',
      chainId: 43112,
    });
    funder = new Wallet(FUNDER_KEY, provider);
    getBalance = sinon.stub(provider, 'getBalance');
    sendTransaction = sinon.stub(funder, 'sendTransaction');
    sendTransaction.resolves({ wait: sinon.stub().resolves({ status: 1 }) });
  });

  afterEach(() => {
    sinon.restore();
  });

  it('does nothing when the relayer holds enough', async () => {
    getBalance.resolves(utils.parseEther('600'));

    const result = await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress: RELAYER,
    });

    expect(result.transferred.isZero()).to.be.true;
    expect(result.balance.eq(utils.parseEther('600'))).to.be.true;
    expect(sendTransaction.called).to.be.false;
  });

  it('transfers the shortfall up to 500 units', async () => {
    getBalance.onFirstCall().resolves(utils.parseEther('120'));
    getBalance.onSecondCall().resolves(utils.parseEther('500'));

    const result = await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress: RELAYER,
    });

    expect(sendTransaction.calledOnce).to.be.true;
    const [tx] = sendTransaction.firstCall.args;
    expect(tx.to).to.equal(RELAYER);
    expect(BigNumber.from(tx.value).eq(utils.parseEther('380'))).to.be.true;
    expect(result.transferred.eq(utils.parseEther('380'))).to.be.true;
  });

  it('honours a custom required balance', async () => {
    getBalance.onFirstCall().resolves(BigNumber.from(0));
    getBalance.onSecondCall().resolves(utils.parseEther('2'));

    await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress: RELAYER,
      requiredBalance: utils.parseEther('2'),
    });

    expect(
      BigNumber.from(sendTransaction.firstCall.args[0].value).eq(
        utils.parseEther('2'),
      ),
    ).to.be.true;
  });

  it('fails when the balance is still short after funding', async () => {
    getBalance.resolves(utils.parseEther('100'));

    const error = await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress: RELAYER,
    }).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(error).to.be.instanceOf(RelayerFundingError);
    if (!(error instanceof RelayerFundingError)) return;
    expect(error.address).to.equal(RELAYER);
    expect(error.required).to.equal('500.0');
    expect(error.actual).to.equal('100.0');
  });

  it('wraps rpc failures', async () => {
    getBalance.rejects(new Error('connection refused'));

    await expect(
      ensureRelayerFunded({ provider, funder, relayerAddress: RELAYER }),
    ).to.be.rejectedWith(
      RelayerFundingError,
      `Failed to read the balance of relayer ${RELAYER}`,
    );
  });

  it('wraps transfer failures', async () => {
    getBalance.resolves(BigNumber.from(0));
    sendTransaction.rejects(new Error('insufficient funds'));

    await expect(
      ensureRelayerFunded({ provider, funder, relayerAddress: RELAYER }),
    ).to.be.rejectedWith(RelayerFundingError, `Failed to fund relayer ${RELAYER}`);
  });
});

describe('getRelayerKeyInfo', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relayer-key-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates a key once and reloads it', () => {
    const keyPath = path.join(tempDir, 'keys', 'icm-relayer.pk');

    const created = getRelayerKeyInfo(keyPath);
    const loaded = getRelayerKeyInfo(keyPath);

    expect(loaded).to.deep.equal(created);
    expect(fs.readFileSync(keyPath, 'utf8')).to.equal(
      created.privateKey.slice(2),
    );
    expect(fs.statSync(keyPath).mode & 0o777).to.equal(0o600);
  });

  it('reads keys with or without a 0x prefix', () => {
    const keyPath = path.join(tempDir, 'funder.pk');
    fs.writeFileSync(keyPath, `${FUNDER_KEY}\n`);

    const info = getRelayerKeyInfo(keyPath);

    expect(info.privateKey).to.equal(FUNDER_KEY);
    expect(info.address).to.equal(new Wallet(FUNDER_KEY).address);
  });

  it('rejects invalid keys', () => {
    const keyPath = path.join(tempDir, 'bad.pk');
    fs.writeFileSync(keyPath, 'test-secret');

    expect(() => getRelayerKeyInfo(keyPath)).to.throw(
      RelayerConfigError,
      'Invalid private key',
    );
  });
});
