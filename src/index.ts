/**
 * AWS Infrastructure Helpers
 *
 * Small building blocks for AWS automation scripts:
 * - Splitting a network into subnets across availability zones
 * - Launching instances from a new AMI like an existing instance
 * - Normalizing names into CloudFormation logical IDs
 */

// =============================================================================
// Configuration & Errors
// =============================================================================

export {
  DEFAULT_REGION,
  resolveHelperConfig,
  type HelperConfig,
  type HelperLogger,
  type ResolvedHelperConfig,
} from "./config.js";

export {
  InvalidSubnetCountError,
  InvalidNetworkFormatError,
  NoZonesAvailableError,
  InstanceNotFoundError,
  ReservedLaunchParameterError,
  InvalidLaunchOptionsError,
} from "./errors.js";

// =============================================================================
// Network Module
// =============================================================================

export {
  CidrBlock,
  bitLength,
  DEFAULT_SUBNET_COUNT,
  isPowerOfTwo,
  assertSubnetCount,
  partitionNetwork,
  splitNetworkAcrossZones,
  EC2AvailabilityZoneDirectory,
  StaticAvailabilityZoneDirectory,
  createZoneDirectory,
  SplitNetworkParamsSchema,
  validateSplitNetworkParams,
} from "./network/index.js";

export type {
  IPVersion,
  SubnetAssignment,
  AvailabilityZoneDirectory,
  SplitNetworkOptions,
  EC2ZoneDirectoryConfig,
  SplitNetworkParamsSchemaType,
} from "./network/index.js";

// =============================================================================
// EC2 Module
// =============================================================================

export {
  EC2Manager,
  createEC2Manager,
  buildLaunchTags,
  LaunchAmiLikeOptionsSchema,
  checkLaunchOptions,
  RESERVED_LAUNCH_PARAMETERS,
} from "./ec2/index.js";

export type {
  EC2ManagerConfig,
  EC2InstanceInfo,
  ReservedLaunchParameter,
  LaunchOverrides,
  CopyTagsOptions,
  LaunchAmiLikeOptions,
  LaunchResult,
} from "./ec2/index.js";

// =============================================================================
// Utilities
// =============================================================================

export { toLogicalId } from "./utils/index.js";
