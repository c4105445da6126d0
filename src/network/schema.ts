/**
 * TypeBox schema for network split parameters received as untyped data
 * (configuration files, tool payloads).
 */

import { Type, type Static } from '@sinclair/typebox';
import { Check } from '@sinclair/typebox/value';
import { Errors } from '@sinclair/typebox/errors';

import { isPowerOfTwo } from './split.js';

export const SplitNetworkParamsSchema = Type.Object({
  network: Type.String({ minLength: 1, description: 'Network in CIDR notation, e.g. 10.0.0.0/16' }),
  region: Type.String({ minLength: 1, description: 'AWS region' }),
  subnetCount: Type.Optional(Type.Integer({ minimum: 1, description: 'Number of subnets, a power of 2' })),
});

export type SplitNetworkParamsSchemaType = Static<typeof SplitNetworkParamsSchema>;

export function validateSplitNetworkParams(params: unknown): {
  valid: boolean;
  errors?: string[];
  params?: SplitNetworkParamsSchemaType;
} {
  if (!params || typeof params !== 'object') {
    return { valid: false, errors: ['Parameters must be an object'] };
  }

  if (Check(SplitNetworkParamsSchema, params)) {
    if (params.subnetCount !== undefined && !isPowerOfTwo(params.subnetCount)) {
      return { valid: false, errors: ['/subnetCount: Expected a power of 2'] };
    }
    return { valid: true, params };
  }

  const errors: string[] = [];
  for (const error of Errors(SplitNetworkParamsSchema, params)) {
    const path = error.path || '(root)';
    errors.push(`${path}: ${error.message}`);
  }

  return { valid: false, errors: errors.length > 0 ? errors : ['Parameters do not match schema'] };
}
