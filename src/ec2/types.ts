/**
 * EC2 helper types
 */

import type { EC2Client, RunInstancesCommandInput, _InstanceType } from '@aws-sdk/client-ec2';

import type { HelperConfig } from '../config.js';

export interface EC2ManagerConfig extends HelperConfig {
  /** Builds the client for a region */
  clientFactory?: (region: string) => EC2Client;
}

/**
 * The parts of an instance that a clone copies
 */
export type EC2InstanceInfo = {
  instanceId: string;
  instanceType?: _InstanceType;
  imageId?: string;
  state?: string;
  keyName?: string;
  vpcId?: string;
  subnetId?: string;
  availabilityZone?: string;
  securityGroupIds: string[];
  monitoringEnabled: boolean;
  ebsOptimized: boolean;
  iamInstanceProfileArn?: string;
  tags: Record<string, string>;
};

/**
 * RunInstances parameters filled in from the model instance
 */
export const RESERVED_LAUNCH_PARAMETERS = [
  'ImageId',
  'InstanceType',
  'KeyName',
  'MaxCount',
  'MinCount',
  'Monitoring',
  'SecurityGroupIds',
  'SubnetId',
  'EbsOptimized',
  'IamInstanceProfile',
  'TagSpecifications',
] as const;

export type ReservedLaunchParameter = (typeof RESERVED_LAUNCH_PARAMETERS)[number];

/**
 * Extra RunInstances parameters, e.g. ClientToken or PrivateIpAddress
 */
export type LaunchOverrides = Omit<RunInstancesCommandInput, ReservedLaunchParameter>;

export type CopyTagsOptions = {
  /** Copy the model instance's tags (except `aws:` ones) */
  copyTags: boolean;
  /** Tags to set; these win over copied tags with the same key */
  setTags?: Record<string, string>;
};

export type LaunchAmiLikeOptions = {
  /** AMI for the new instances */
  amiId: string;
  /** Instance whose settings are copied */
  modelInstanceId: string;
  /** Number of instances to start. Defaults to 1 */
  count?: number;
  copyTags?: CopyTagsOptions;
  overrides?: LaunchOverrides;
  region?: string;
};

export type LaunchResult = {
  instanceIds: string[];
  instances: EC2InstanceInfo[];
};
