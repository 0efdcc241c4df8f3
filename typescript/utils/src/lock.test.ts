import { expect } from 'chai';
import fs from 'fs';
import os from 'os';
import path from 'path';
import sinon from 'sinon';

import { sleep } from './async.js';
import { lockPathFor, withFileLock } from './lock.js';

describe('withFileLock', () => {
  let tmpDir: string;
  let target: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'icmctl-lock-test-'));
    target = path.join(tmpDir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('holds the lock file while the callback runs and removes it after', async () => {
    const result = await withFileLock(target, () => {
      expect(fs.existsSync(lockPathFor(target))).to.be.true;
      return 42;
    });
    expect(result).to.equal(42);
    expect(fs.existsSync(lockPathFor(target))).to.be.false;
  });

  it('releases the lock when the callback throws', async () => {
    try {
      await withFileLock(target, () => {
        throw new Error('boom');
      });
      throw new Error('Expected error');
    } catch (error: unknown) {
      expect(error)
        .to.be.instanceOf(Error)
        .with.property('message', 'boom');
    }
    expect(fs.existsSync(lockPathFor(target))).to.be.false;
  });

  it('serializes concurrent read-modify-write cycles', async () => {
    fs.writeFileSync(target, '0');
    const increment = () =>
      withFileLock(
        target,
        async () => {
          const value = Number(fs.readFileSync(target, 'utf8'));
          await sleep(5);
          fs.writeFileSync(target, String(value + 1));
        },
        { retryDelayMs: 2 },
      );
    await Promise.all([increment(), increment(), increment(), increment()]);
    expect(fs.readFileSync(target, 'utf8')).to.equal('4');
  });

  it('gives up after maxAttempts when the lock is held', async () => {
    fs.writeFileSync(lockPathFor(target), '1');
    try {
      await withFileLock(target, () => 1, { retryDelayMs: 1, maxAttempts: 3 });
      throw new Error('Expected error');
    } catch (error: unknown) {
      expect(error)
        .to.be.instanceOf(Error)
        .with.property(
          'message',
          `Timed out waiting for lock ${lockPathFor(target)}`,
        );
    }
  });

  it('takes over a stale lock', async () => {
    const lockPath = lockPathFor(target);
    fs.writeFileSync(lockPath, '1');
    const past = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, past, past);
    const result = await withFileLock(target, () => 'ok', {
      retryDelayMs: 1,
      maxAttempts: 3,
    });
    expect(result).to.equal('ok');
  });

  it('leaves a lock alone that was re-created while taking over', async () => {
    const lockPath = lockPathFor(target);
    fs.writeFileSync(lockPath, '1');
    const past = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, past, past);

    // another process replaces the stale lock just before it is moved aside
    const renameSync = fs.renameSync;
    const rename = sinon.stub(fs, 'renameSync');
    rename.onFirstCall().callsFake((from, to) => {
      fs.unlinkSync(lockPath);
      fs.writeFileSync(lockPath, '999');
      renameSync(from, to);
    });
    rename.callThrough();

    try {
      await withFileLock(target, () => 'ok', {
        retryDelayMs: 1,
        maxAttempts: 2,
      });
      throw new Error('Expected error');
    } catch (error: unknown) {
      expect(error)
        .to.be.instanceOf(Error)
        .with.property('message', `Timed out waiting for lock ${lockPath}`);
    } finally {
      rename.restore();
    }
    expect(fs.readFileSync(lockPath, 'utf8')).to.equal('999');
    expect(fs.readdirSync(tmpDir)).to.deep.equal(['config.json.lock']);
  });
});
