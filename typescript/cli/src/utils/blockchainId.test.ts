import { expect } from 'chai';
import { utils } from 'ethers';

import { blockchainIdToBytes32 } from './blockchainId.js';

const PAYLOAD = '0x' + '11'.repeat(32);

function encodeCb58(payload: string): string {
  const checksum = utils.hexDataSlice(utils.sha256(payload), 28);
  return utils.base58.encode(utils.concat([payload, checksum]));
}

describe('blockchainIdToBytes32', () => {
  it('decodes cb58 blockchain IDs', () => {
    expect(blockchainIdToBytes32(encodeCb58(PAYLOAD))).to.equal(PAYLOAD);
  });

  it('passes hex blockchain IDs through', () => {
    expect(blockchainIdToBytes32('0x' + 'AB'.repeat(32))).to.equal(
      '0x' + 'ab'.repeat(32),
    );
  });

  it('rejects a wrong checksum', () => {
    const id = utils.base58.encode(utils.concat([PAYLOAD, '0x00000000']));
    expect(() => blockchainIdToBytes32(id)).to.throw(
      `Invalid checksum in blockchain ID ${id}`,
    );
  });

  it('rejects IDs that are not cb58', () => {
    expect(() => blockchainIdToBytes32('not-an-id!')).to.throw(
      'Invalid blockchain ID not-an-id!',
    );
    expect(() => blockchainIdToBytes32('2CA6')).to.throw(
      'Invalid blockchain ID 2CA6',
    );
  });
});
