import { utils } from 'ethers';

const CB58_CHECKSUM_LENGTH = 4;
const BLOCKCHAIN_ID_LENGTH = 32;

/**
 * Converts a blockchain ID, either cb58 encoded or already hex, to the
 * bytes32 form the messaging contracts take.
 */
export function blockchainIdToBytes32(blockchainId: string): string {
  if (utils.isHexString(blockchainId, BLOCKCHAIN_ID_LENGTH)) {
    return blockchainId.toLowerCase();
  }

  let decoded: Uint8Array;
  try {
    decoded = utils.base58.decode(blockchainId);
  } catch (error) {
    throw new Error(`Invalid blockchain ID ${blockchainId}`, { cause: error });
  }
  if (decoded.length !== BLOCKCHAIN_ID_LENGTH + CB58_CHECKSUM_LENGTH) {
    throw new Error(`Invalid blockchain ID ${blockchainId}`);
  }

  const payload = decoded.slice(0, BLOCKCHAIN_ID_LENGTH);
  const checksum = utils.hexlify(decoded.slice(BLOCKCHAIN_ID_LENGTH));
  const expected = utils.hexDataSlice(
    utils.sha256(payload),
    BLOCKCHAIN_ID_LENGTH - CB58_CHECKSUM_LENGTH,
  );
  if (checksum !== expected) {
    throw new Error(`Invalid checksum in blockchain ID ${blockchainId}`);
  }
  return utils.hexlify(payload);
}
