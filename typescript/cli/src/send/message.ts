import { Signer, constants, providers, utils } from 'ethers';

import { WrappedError, ensure0x, rootLogger, sleep } from '@icmctl/utils';

import {
  MESSAGE_DELIVERY_POLL_MS,
  MESSAGE_DELIVERY_TIMEOUT_MS,
  MESSENGER_ABI,
} from '../consts.js';
import { blockchainIdToBytes32 } from '../utils/blockchainId.js';

export class MessageDeliveryError extends WrappedError {}

export const MESSENGER_INTERFACE = new utils.Interface(MESSENGER_ABI);

export interface SentMessage {
  messageId: string;
  txHash: string;
}

export function encodeMessage(message: string, hexEncoded = false): string {
  if (!hexEncoded) return utils.hexlify(utils.toUtf8Bytes(message));
  const hex = ensure0x(message.replace(/^0X/, ''));
  if (!utils.isHexString(hex) || hex.length % 2 !== 0) {
    throw new MessageDeliveryError(`Invalid hex format at ${message}`);
  }
  return hex.toLowerCase();
}

export async function assertMessengerDeployed(
  provider: providers.Provider,
  messengerAddress: string,
  chain: string,
): Promise<void> {
  let code: string;
  try {
    code = await provider.getCode(messengerAddress);
  } catch (error) {
    throw new MessageDeliveryError(
      `Failed to read code at ${messengerAddress} on ${chain}`,
      error,
    );
  }
  if (code === '0x') {
    throw new MessageDeliveryError(
      `No messenger deployed at ${messengerAddress} on ${chain}`,
    );
  }
}

/**
 * Sends a message through the messenger on the source chain and checks the
 * emitted event carries it to the expected destination.
 */
export async function sendCrossChainMessage({
  signer,
  messengerAddress,
  destinationBlockchainId,
  destinationAddress = constants.AddressZero,
  message,
}: {
  signer: Signer;
  messengerAddress: string;
  destinationBlockchainId: string;
  destinationAddress?: string;
  // hex encoded payload
  message: string;
}): Promise<SentMessage> {
  const destinationBlockchainID = blockchainIdToBytes32(
    destinationBlockchainId,
  );
  const data = MESSENGER_INTERFACE.encodeFunctionData('sendCrossChainMessage', [
    {
      destinationBlockchainID,
      destinationAddress,
      feeInfo: { feeTokenAddress: constants.AddressZero, amount: 0 },
      requiredGasLimit: 1,
      allowedRelayerAddresses: [],
      message,
    },
  ]);

  let receipt: providers.TransactionReceipt;
  try {
    const tx = await signer.sendTransaction({ to: messengerAddress, data });
    receipt = await tx.wait();
  } catch (error) {
    throw new MessageDeliveryError('Failed to send cross chain message', error);
  }

  const event = receipt.logs
    .filter(
      (log) => log.address.toLowerCase() === messengerAddress.toLowerCase(),
    )
    .map((log) => {
      try {
        return MESSENGER_INTERFACE.parseLog(log);
      } catch (error) {
        rootLogger.debug({ error }, 'Skipping unknown messenger log');
        return undefined;
      }
    })
    .find((parsed) => parsed?.name === 'SendCrossChainMessage');
  if (!event) {
    throw new MessageDeliveryError(
      `No SendCrossChainMessage event in transaction ${receipt.transactionHash}`,
    );
  }

  const emittedDestination = String(event.args.destinationBlockchainID);
  if (emittedDestination !== destinationBlockchainID) {
    throw new MessageDeliveryError(
      `Invalid destination blockchain id at source event, expected ${destinationBlockchainID}, got ${emittedDestination}`,
    );
  }
  const emittedMessage = String(event.args.message.message);
  if (emittedMessage !== message) {
    throw new MessageDeliveryError(
      `Invalid message content at source event, expected ${message}, got ${emittedMessage}`,
    );
  }
  return {
    messageId: String(event.args.messageID),
    txHash: receipt.transactionHash,
  };
}

export async function isMessageReceived(
  provider: providers.Provider,
  messengerAddress: string,
  messageId: string,
): Promise<boolean> {
  let result: string;
  try {
    result = await provider.call({
      to: messengerAddress,
      data: MESSENGER_INTERFACE.encodeFunctionData('messageReceived', [
        messageId,
      ]),
    });
  } catch (error) {
    throw new MessageDeliveryError(
      `Failed to check delivery of message ${messageId}`,
      error,
    );
  }
  const [received] = MESSENGER_INTERFACE.decodeFunctionResult(
    'messageReceived',
    result,
  );
  return received === true;
}

export async function waitForMessageDelivery({
  provider,
  messengerAddress,
  messageId,
  pollIntervalMs = MESSAGE_DELIVERY_POLL_MS,
  timeoutMs = MESSAGE_DELIVERY_TIMEOUT_MS,
}: {
  provider: providers.Provider;
  messengerAddress: string;
  messageId: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
}): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await isMessageReceived(provider, messengerAddress, messageId))) {
    if (Date.now() >= deadline) {
      throw new MessageDeliveryError(
        `Timed out after ${timeoutMs}ms waiting for message ${messageId} to be delivered`,
      );
    }
    await sleep(pollIntervalMs);
  }
}
