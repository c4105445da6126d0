/**
 * Availability zone directories
 */

import {
  EC2Client,
  DescribeAvailabilityZonesCommand,
  type Filter,
} from '@aws-sdk/client-ec2';

import type { AvailabilityZoneDirectory, EC2ZoneDirectoryConfig } from './types.js';

/**
 * Lists zones with EC2 DescribeAvailabilityZones. The call is not paginated,
 * so one request returns every zone of the region.
 */
export class EC2AvailabilityZoneDirectory implements AvailabilityZoneDirectory {
  private config: EC2ZoneDirectoryConfig;

  constructor(config: EC2ZoneDirectoryConfig = {}) {
    this.config = config;
  }

  private createClient(region: string): EC2Client {
    if (this.config.clientFactory) {
      return this.config.clientFactory(region);
    }
    return new EC2Client({
      region,
      credentials: this.config.credentials,
    });
  }

  async listAvailabilityZones(region: string): Promise<string[]> {
    const client = this.createClient(region);

    const filters: Filter[] = [];
    if (this.config.states && this.config.states.length > 0) {
      filters.push({ Name: 'state', Values: this.config.states });
    }

    const response = await client.send(new DescribeAvailabilityZonesCommand({
      Filters: filters.length > 0 ? filters : undefined,
    }));

    const zones: string[] = [];
    for (const az of response.AvailabilityZones ?? []) {
      if (az.ZoneName) zones.push(az.ZoneName);
    }
    return zones;
  }
}

/**
 * Fixed region to zones mapping. Unknown regions have no zones.
 */
export class StaticAvailabilityZoneDirectory implements AvailabilityZoneDirectory {
  constructor(private zonesByRegion: Record<string, readonly string[]>) {}

  async listAvailabilityZones(region: string): Promise<string[]> {
    if (!Object.hasOwn(this.zonesByRegion, region)) return [];
    return [...this.zonesByRegion[region]];
  }
}

/**
 * Creates the EC2-backed zone directory
 */
export function createZoneDirectory(config: EC2ZoneDirectoryConfig = {}): EC2AvailabilityZoneDirectory {
  return new EC2AvailabilityZoneDirectory(config);
}
