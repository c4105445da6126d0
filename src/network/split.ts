/**
 * Subnet partitioning across availability zones
 */

import { CidrBlock, bitLength } from './cidr.js';
import { InvalidSubnetCountError, NoZonesAvailableError } from '../errors.js';
import type { SplitNetworkOptions, SubnetAssignment } from './types.js';

export const DEFAULT_SUBNET_COUNT = 4;

export function isPowerOfTwo(value: number): boolean {
  if (!Number.isSafeInteger(value) || value <= 0) return false;
  // Bitwise operators truncate to 32 bits, so test on the bigint value
  const n = BigInt(value);
  return (n & (n - 1n)) === 0n;
}

/**
 * Returns the count unchanged when it is a positive power of 2, throws otherwise
 */
export function assertSubnetCount(value: unknown): number {
  if (typeof value !== 'number' || !isPowerOfTwo(value)) {
    throw new InvalidSubnetCountError(value);
  }
  return value;
}

function assign(block: CidrBlock, subnetCount: number, zones: readonly string[], region?: string): SubnetAssignment[] {
  if (zones.length === 0) {
    throw new NoZonesAvailableError(region ?? 'unknown');
  }

  return block.subnets(bitLength(subnetCount) - 1).map((subnet, index) => ({
    cidr: subnet.toString(),
    az: zones[index % zones.length],
  }));
}

function prepare(network: string, subnetCount: unknown): { block: CidrBlock; count: number } {
  const count = assertSubnetCount(subnetCount);
  const block = CidrBlock.parse(network);

  const diff = bitLength(count) - 1;
  if (block.prefixLength + diff > block.width) {
    throw new InvalidSubnetCountError(
      count,
      `${block.toString()} can't be split into ${count} subnets`,
    );
  }
  return { block, count };
}

/**
 * Split a network into `subnetCount` equal blocks and assign zones in order,
 * cycling back to the first zone when there are more blocks than zones.
 *
 * @example
 * ```typescript
 * partitionNetwork("192.168.1.0/24", 4, ["a", "b", "c"]);
 * // [{ cidr: "192.168.1.0/26", az: "a" }, { cidr: "192.168.1.64/26", az: "b" },
 * //  { cidr: "192.168.1.128/26", az: "c" }, { cidr: "192.168.1.192/26", az: "a" }]
 * ```
 */
export function partitionNetwork(
  network: string,
  subnetCount: number,
  zones: readonly string[],
): SubnetAssignment[] {
  const { block, count } = prepare(network, subnetCount);
  return assign(block, count, zones);
}

/**
 * Split a network into subnets across the availability zones of a region.
 *
 * Arguments are validated before the zone lookup. Errors from the directory
 * are rethrown as is.
 */
export async function splitNetworkAcrossZones(
  network: string,
  region: string,
  options: SplitNetworkOptions,
): Promise<SubnetAssignment[]> {
  const { block, count } = prepare(network, options.subnetCount ?? DEFAULT_SUBNET_COUNT);
  const zones = await options.directory.listAvailabilityZones(region);
  return assign(block, count, zones, region);
}
