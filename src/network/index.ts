/**
 * Network helpers: CIDR arithmetic, zone lookup and subnet partitioning
 */

export { CidrBlock, bitLength, type IPVersion } from './cidr.js';
export {
  DEFAULT_SUBNET_COUNT,
  isPowerOfTwo,
  assertSubnetCount,
  partitionNetwork,
  splitNetworkAcrossZones,
} from './split.js';
export {
  EC2AvailabilityZoneDirectory,
  StaticAvailabilityZoneDirectory,
  createZoneDirectory,
} from './zones.js';
export {
  SplitNetworkParamsSchema,
  validateSplitNetworkParams,
  type SplitNetworkParamsSchemaType,
} from './schema.js';

export type {
  SubnetAssignment,
  AvailabilityZoneDirectory,
  SplitNetworkOptions,
  EC2ZoneDirectoryConfig,
} from './types.js';
