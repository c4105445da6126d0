/**
 * AWS EC2 Management
 *
 * Launches instances from a new AMI in the likeness of an existing instance:
 * - instance type, key pair, subnet and security groups
 * - detailed monitoring, EBS optimization and instance profile
 * - optionally the model's tags
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  RunInstancesCommand,
  type Instance,
  type Tag,
} from '@aws-sdk/client-ec2';

import { resolveHelperConfig, type ResolvedHelperConfig } from '../config.js';
import {
  InstanceNotFoundError,
  InvalidLaunchOptionsError,
  ReservedLaunchParameterError,
} from '../errors.js';
import { checkLaunchOptions } from './schema.js';
import {
  RESERVED_LAUNCH_PARAMETERS,
  type CopyTagsOptions,
  type EC2InstanceInfo,
  type EC2ManagerConfig,
  type LaunchAmiLikeOptions,
  type LaunchResult,
} from './types.js';

// Tags under this prefix belong to AWS and can't be set by callers
const AWS_TAG_PREFIX = 'aws:';

function fromAWSTags(tags?: Tag[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) {
      result[tag.Key] = tag.Value ?? '';
    }
  }
  return result;
}

/**
 * Tags for the new instances: copied tags first (minus the ones being set),
 * then the tags to set.
 */
export function buildLaunchTags(modelTags: Record<string, string>, copyTags?: CopyTagsOptions): Tag[] {
  const setTags = copyTags?.setTags ?? {};
  const tags: Tag[] = [];

  if (copyTags?.copyTags) {
    for (const [Key, Value] of Object.entries(modelTags)) {
      if (Key.startsWith(AWS_TAG_PREFIX) || Object.hasOwn(setTags, Key)) continue;
      tags.push({ Key, Value });
    }
  }

  for (const [Key, Value] of Object.entries(setTags)) {
    tags.push({ Key, Value });
  }

  return tags;
}

export class EC2Manager {
  private config: ResolvedHelperConfig;
  private clientFactory?: (region: string) => EC2Client;

  constructor(config: EC2ManagerConfig = {}) {
    this.config = resolveHelperConfig(config);
    this.clientFactory = config.clientFactory;
  }

  private createClient(region?: string): EC2Client {
    const targetRegion = region ?? this.config.defaultRegion;
    if (this.clientFactory) {
      return this.clientFactory(targetRegion);
    }
    return new EC2Client({
      region: targetRegion,
      credentials: this.config.credentials,
    });
  }

  private log(message: string): void {
    if (this.config.verbose) {
      this.config.logger.info(message);
    }
  }

  private mapInstance(instance: Instance): EC2InstanceInfo {
    return {
      instanceId: instance.InstanceId ?? '',
      instanceType: instance.InstanceType,
      imageId: instance.ImageId,
      state: instance.State?.Name,
      keyName: instance.KeyName,
      vpcId: instance.VpcId,
      subnetId: instance.SubnetId,
      availabilityZone: instance.Placement?.AvailabilityZone,
      securityGroupIds: (instance.SecurityGroups ?? [])
        .map((sg) => sg.GroupId)
        .filter((id): id is string => typeof id === 'string'),
      monitoringEnabled: instance.Monitoring?.State === 'enabled',
      ebsOptimized: instance.EbsOptimized ?? false,
      iamInstanceProfileArn: instance.IamInstanceProfile?.Arn,
      tags: fromAWSTags(instance.Tags),
    };
  }

  /**
   * Describe a single instance
   */
  async describeInstance(instanceId: string, region?: string): Promise<EC2InstanceInfo> {
    const client = this.createClient(region);

    const response = await client.send(new DescribeInstancesCommand({
      InstanceIds: [instanceId],
    }));

    const instance = response.Reservations?.flatMap((r) => r.Instances ?? [])[0];
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return this.mapInstance(instance);
  }

  /**
   * Start new instances from an AMI, copying the settings of another instance.
   *
   * @example
   * ```typescript
   * const { instanceIds } = await manager.launchAmiLikeInstance({
   *   amiId: "ami-0abc1234",
   *   modelInstanceId: "i-0123abcd",
   *   copyTags: { copyTags: true, setTags: { Release: "2" } },
   *   overrides: { ClientToken: "release-2" },
   * });
   * ```
   */
  async launchAmiLikeInstance(options: LaunchAmiLikeOptions): Promise<LaunchResult> {
    const errors = checkLaunchOptions(options);
    if (errors.length > 0) {
      throw new InvalidLaunchOptionsError('Invalid launch options', errors);
    }

    const overrides = options.overrides ?? {};
    const reserved = RESERVED_LAUNCH_PARAMETERS.filter((key) => Object.hasOwn(overrides, key));
    if (reserved.length > 0) {
      throw new ReservedLaunchParameterError(reserved);
    }

    const model = await this.describeInstance(options.modelInstanceId, options.region);
    const count = options.count ?? 1;
    const tags = buildLaunchTags(model.tags, options.copyTags);

    if (options.copyTags?.copyTags) {
      const skipped = Object.keys(model.tags).filter((key) => key.startsWith(AWS_TAG_PREFIX));
      if (skipped.length > 0) {
        this.config.logger.warn(`not copying reserved tags of ${model.instanceId}: ${skipped.join(', ')}`);
      }
    }

    this.log(`launching ${count} instance(s) of ${options.amiId} like ${model.instanceId}`);

    const client = this.createClient(options.region);
    const response = await client.send(new RunInstancesCommand({
      ...overrides,
      ImageId: options.amiId,
      InstanceType: model.instanceType,
      KeyName: model.keyName,
      MinCount: count,
      MaxCount: count,
      Monitoring: { Enabled: model.monitoringEnabled },
      SecurityGroupIds: model.securityGroupIds,
      SubnetId: model.subnetId,
      EbsOptimized: model.ebsOptimized,
      IamInstanceProfile: model.iamInstanceProfileArn ? { Arn: model.iamInstanceProfileArn } : undefined,
      TagSpecifications: tags.length > 0 ? [{ ResourceType: 'instance', Tags: tags }] : undefined,
    }));

    const instances = (response.Instances ?? []).map((i) => this.mapInstance(i));
    const instanceIds = instances.map((i) => i.instanceId);

    this.log(`started ${instanceIds.join(', ') || 'no instances'}`);

    return { instanceIds, instances };
  }
}

export function createEC2Manager(config: EC2ManagerConfig = {}): EC2Manager {
  return new EC2Manager(config);
}
