import { z } from 'zod';

import { readYamlOrJson } from '@icmctl/utils';

import { RelayerConfigError } from '../errors.js';

export enum RelayerChainRole {
  Source = 'source',
  Destination = 'destination',
  Both = 'both',
}

const ZAddress = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid address');

export const RelayerChainSpecSchema = z
  .object({
    name: z.string().optional(),
    subnetId: z.string().min(1),
    blockchainId: z.string().min(1),
    rpcUrl: z.string().url(),
    wsUrl: z.string().url().optional(),
    role: z.nativeEnum(RelayerChainRole).default(RelayerChainRole.Both),
    messengerAddress: ZAddress.optional(),
    registryAddress: ZAddress.optional(),
  })
  .superRefine((spec, ctx) => {
    if (spec.role === RelayerChainRole.Destination) return;
    for (const key of ['messengerAddress', 'registryAddress'] as const) {
      if (!spec[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required for source chains`,
        });
      }
    }
  });

export const RelayerChainSpecsSchema = z.object({
  chains: z.array(RelayerChainSpecSchema).min(1),
});

export type RelayerChainSpec = z.infer<typeof RelayerChainSpecSchema>;

export function isSourceChain(spec: RelayerChainSpec): boolean {
  return spec.role !== RelayerChainRole.Destination;
}

export function isDestinationChain(spec: RelayerChainSpec): boolean {
  return spec.role !== RelayerChainRole.Source;
}

/**
 * Reads the list of chains to onboard onto the relayer from a YAML or JSON
 * file.
 */
export function readRelayerChainSpecs(filepath: string): RelayerChainSpec[] {
  let raw: unknown;
  try {
    raw = readYamlOrJson(filepath);
  } catch (error) {
    throw new RelayerConfigError(
      `Failed to read chain specs at ${filepath}`,
      error,
    );
  }
  const result = RelayerChainSpecsSchema.safeParse(raw);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new RelayerConfigError(
      `Invalid chain specs at ${filepath}: ${firstIssue.path.join('.')} => ${firstIssue.message}`,
      result.error,
    );
  }
  return result.data.chains;
}
