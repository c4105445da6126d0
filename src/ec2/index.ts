/**
 * AWS EC2 Module
 */

export { EC2Manager, createEC2Manager, buildLaunchTags } from "./manager.js";
export { LaunchAmiLikeOptionsSchema, checkLaunchOptions } from "./schema.js";
export { RESERVED_LAUNCH_PARAMETERS } from "./types.js";

export type {
  EC2ManagerConfig,
  EC2InstanceInfo,
  ReservedLaunchParameter,
  LaunchOverrides,
  CopyTagsOptions,
  LaunchAmiLikeOptions,
  LaunchResult,
} from "./types.js";
