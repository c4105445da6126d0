/**
 * Network helper types
 */

import type { AwsCredentialIdentity } from '@smithy/types';
import type { EC2Client } from '@aws-sdk/client-ec2';

/**
 * A sub-block of the split network and the zone it is placed in
 */
export interface SubnetAssignment {
  cidr: string;
  az: string;
}

/**
 * Read-only lookup of the availability zones of a region, in the order the
 * provider lists them
 */
export interface AvailabilityZoneDirectory {
  listAvailabilityZones(region: string): Promise<string[]>;
}

export interface SplitNetworkOptions {
  /** Zone lookup used for the region */
  directory: AvailabilityZoneDirectory;
  /** Number of subnets, a power of 2. Defaults to 4 */
  subnetCount?: number;
}

export interface EC2ZoneDirectoryConfig {
  /** AWS credentials; the SDK default chain is used when omitted */
  credentials?: AwsCredentialIdentity;
  /** Only return zones in these states (e.g. `available`). No filter by default */
  states?: string[];
  /** Builds the client for a region */
  clientFactory?: (region: string) => EC2Client;
}
