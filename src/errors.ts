/**
 * Error types raised by the helpers.
 *
 * Errors coming from the AWS SDK are never wrapped: callers receive them as
 * the SDK throws them.
 */

export class InvalidSubnetCountError extends Error {
  constructor(public subnetCount: unknown, reason?: string) {
    super(reason ?? `Number of subnets must be a positive power of 2, got ${String(subnetCount)}`);
    this.name = 'InvalidSubnetCountError';
  }
}

export class InvalidNetworkFormatError extends Error {
  constructor(public network: string, reason: string) {
    super(`Invalid network "${network}": ${reason}`);
    this.name = 'InvalidNetworkFormatError';
  }
}

export class NoZonesAvailableError extends Error {
  constructor(public region: string) {
    super(`No availability zones returned for region ${region}`);
    this.name = 'NoZonesAvailableError';
  }
}

export class InstanceNotFoundError extends Error {
  constructor(public instanceId: string) {
    super(`Instance ${instanceId} not found`);
    this.name = 'InstanceNotFoundError';
  }
}

export class ReservedLaunchParameterError extends Error {
  constructor(public parameters: string[]) {
    super(`Launch parameters copied from the model instance can't be overridden: ${parameters.join(', ')}`);
    this.name = 'ReservedLaunchParameterError';
  }
}

export class InvalidLaunchOptionsError extends Error {
  constructor(message: string, public errors: string[]) {
    super(message);
    this.name = 'InvalidLaunchOptionsError';
  }
}
