/**
 * CIDR block arithmetic for IPv4 and IPv6.
 *
 * Addresses are held as bigints so both families share the same math.
 */

import { isIPv6 } from 'node:net';
import { InvalidNetworkFormatError } from '../errors.js';

export type IPVersion = 4 | 6;

const IPV4_OCTET = /^(0|[1-9]\d{0,2})$/;
const PREFIX = /^\d{1,3}$/;
const HEXTET = /^[0-9a-f]{1,4}$/i;

/**
 * Number of bits needed to represent a non-negative integer (0 has length 0).
 */
export function bitLength(value: number): number {
  return value <= 0 ? 0 : value.toString(2).length;
}

function parseIPv4(address: string): bigint | undefined {
  const octets = address.split('.');
  if (octets.length !== 4) return undefined;

  let result = 0n;
  for (const octet of octets) {
    if (!IPV4_OCTET.test(octet)) return undefined;
    const value = Number(octet);
    if (value > 255) return undefined;
    result = (result << 8n) | BigInt(value);
  }
  return result;
}

/**
 * Prefix length of an IPv4 netmask (`255.255.0.0`) or hostmask (`0.0.255.255`),
 * netmask first. Masks whose one bits aren't contiguous have none.
 */
function prefixFromIPv4Mask(mask: bigint): number | undefined {
  for (const hostBits of [~mask & 0xffffffffn, mask]) {
    if ((hostBits & (hostBits + 1n)) === 0n) {
      return hostBits === 0n ? 32 : 32 - hostBits.toString(2).length;
    }
  }
  return undefined;
}

function parseIPv6(address: string): bigint | undefined {
  if (address.includes('%') || !isIPv6(address)) return undefined;

  // Embedded IPv4 tail (e.g. ::ffff:10.0.0.1) becomes two hextets
  let normalized = address;
  const lastColon = normalized.lastIndexOf(':');
  const tail = normalized.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = parseIPv4(tail);
    if (v4 === undefined) return undefined;
    const high = (v4 >> 16n).toString(16);
    const low = (v4 & 0xffffn).toString(16);
    normalized = `${normalized.slice(0, lastColon + 1)}${high}:${low}`;
  }

  const halves = normalized.split('::');
  if (halves.length > 2) return undefined;

  const head = halves[0] ? halves[0].split(':') : [];
  const rest = halves.length === 2 && halves[1] ? halves[1].split(':') : [];
  const missing = 8 - head.length - rest.length;
  if (halves.length === 2 ? missing < 1 : missing !== 0) return undefined;

  const hextets = [...head, ...Array<string>(halves.length === 2 ? missing : 0).fill('0'), ...rest];

  let result = 0n;
  for (const hextet of hextets) {
    if (!HEXTET.test(hextet)) return undefined;
    result = (result << 16n) | BigInt(parseInt(hextet, 16));
  }
  return result;
}

function formatIPv4(value: bigint): string {
  const octets: string[] = [];
  for (let shift = 24n; shift >= 0n; shift -= 8n) {
    octets.push(((value >> shift) & 0xffn).toString());
  }
  return octets.join('.');
}

function formatIPv6(value: bigint): string {
  const hextets: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    hextets.push(Number((value >> shift) & 0xffffn));
  }

  // Longest run of zero hextets (at least two), first one wins a tie
  let bestStart = -1;
  let bestLength = 1;
  let runStart = -1;
  for (let i = 0; i <= hextets.length; i++) {
    if (i < hextets.length && hextets[i] === 0) {
      if (runStart === -1) runStart = i;
      continue;
    }
    if (runStart !== -1) {
      const runLength = i - runStart;
      if (runLength > bestLength) {
        bestStart = runStart;
        bestLength = runLength;
      }
      runStart = -1;
    }
  }

  const groups = hextets.map((h) => h.toString(16));
  if (bestStart === -1) return groups.join(':');

  const left = groups.slice(0, bestStart).join(':');
  const right = groups.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

/**
 * An immutable network block: a network address plus a prefix length.
 */
export class CidrBlock {
  private constructor(
    public readonly version: IPVersion,
    public readonly network: bigint,
    public readonly prefixLength: number,
  ) {}

  /**
   * Parse `address/prefix`. A bare address is a single-host block, and an IPv4
   * prefix may also be written as a netmask or hostmask.
   * Host bits set below the prefix are rejected.
   */
  static parse(cidr: string): CidrBlock {
    if (typeof cidr !== 'string' || cidr.length === 0) {
      throw new InvalidNetworkFormatError(String(cidr), 'expected a string in CIDR notation');
    }

    const parts = cidr.split('/');
    if (parts.length > 2) {
      throw new InvalidNetworkFormatError(cidr, 'expected a string in CIDR notation');
    }
    const [address, prefix] = parts;

    let version: IPVersion;
    let value = parseIPv4(address);
    if (value !== undefined) {
      version = 4;
    } else {
      value = parseIPv6(address);
      if (value === undefined) {
        throw new InvalidNetworkFormatError(cidr, `${address} is not a valid IP address`);
      }
      version = 6;
    }

    const width = version === 4 ? 32 : 128;
    let prefixLength = width;
    if (prefix !== undefined) {
      if (PREFIX.test(prefix) && Number(prefix) <= width) {
        prefixLength = Number(prefix);
      } else {
        const mask = version === 4 ? parseIPv4(prefix) : undefined;
        const maskLength = mask === undefined ? undefined : prefixFromIPv4Mask(mask);
        if (maskLength === undefined) {
          throw new InvalidNetworkFormatError(cidr, `/${prefix} is not a valid prefix length`);
        }
        prefixLength = maskLength;
      }
    }

    const hostMask = (1n << BigInt(width - prefixLength)) - 1n;
    if ((value & hostMask) !== 0n) {
      throw new InvalidNetworkFormatError(cidr, 'host bits are set');
    }

    return new CidrBlock(version, value, prefixLength);
  }

  get width(): number {
    return this.version === 4 ? 32 : 128;
  }

  /** Number of addresses in the block */
  get size(): bigint {
    return 1n << BigInt(this.width - this.prefixLength);
  }

  get firstAddress(): string {
    return this.format(this.network);
  }

  get lastAddress(): string {
    return this.format(this.network + this.size - 1n);
  }

  /**
   * Split into `2^prefixDiff` equal blocks, in ascending address order.
   */
  subnets(prefixDiff: number): CidrBlock[] {
    if (!Number.isInteger(prefixDiff) || prefixDiff < 0) {
      throw new RangeError(`Prefix length diff must be a non-negative integer, got ${prefixDiff}`);
    }
    const newPrefix = this.prefixLength + prefixDiff;
    if (newPrefix > this.width) {
      throw new RangeError(`Prefix length diff ${prefixDiff} is invalid for netblock ${this.toString()}`);
    }

    const step = 1n << BigInt(this.width - newPrefix);
    const count = 2 ** prefixDiff;
    const blocks: CidrBlock[] = [];
    for (let i = 0; i < count; i++) {
      blocks.push(new CidrBlock(this.version, this.network + BigInt(i) * step, newPrefix));
    }
    return blocks;
  }

  contains(other: CidrBlock): boolean {
    if (other.version !== this.version || other.prefixLength < this.prefixLength) return false;
    const shift = BigInt(this.width - this.prefixLength);
    return other.network >> shift === this.network >> shift;
  }

  toString(): string {
    return `${this.format(this.network)}/${this.prefixLength}`;
  }

  private format(value: bigint): string {
    return this.version === 4 ? formatIPv4(value) : formatIPv6(value);
  }
}
