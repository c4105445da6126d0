/**
 * CidrBlock Tests
 */

import { describe, it, expect } from 'vitest';
import { CidrBlock, bitLength } from './cidr.js';
import { InvalidNetworkFormatError } from '../errors.js';

describe('CidrBlock', () => {
  describe('parse', () => {
    it('should parse an IPv4 network', () => {
      const block = CidrBlock.parse('192.168.1.0/24');

      expect(block.version).toBe(4);
      expect(block.prefixLength).toBe(24);
      expect(block.size).toBe(256n);
      expect(block.firstAddress).toBe('192.168.1.0');
      expect(block.lastAddress).toBe('192.168.1.255');
      expect(block.toString()).toBe('192.168.1.0/24');
    });

    it('should treat a bare address as a single host', () => {
      expect(CidrBlock.parse('10.0.0.5').toString()).toBe('10.0.0.5/32');
    });

    it('should parse and compress IPv6 networks', () => {
      expect(CidrBlock.parse('2001:DB8::/32').toString()).toBe('2001:db8::/32');
      expect(CidrBlock.parse('::/0').toString()).toBe('::/0');
      expect(CidrBlock.parse('::1/128').toString()).toBe('::1/128');
      expect(CidrBlock.parse('2001:db8:0:1:0:0:0:0/64').toString()).toBe('2001:db8:0:1::/64');
    });

    it('should accept an embedded IPv4 tail', () => {
      expect(CidrBlock.parse('::ffff:10.0.0.0/120').toString()).toBe('::ffff:a00:0/120');
    });

    it('should accept an IPv4 netmask or hostmask', () => {
      expect(CidrBlock.parse('10.0.0.0/255.255.0.0').toString()).toBe('10.0.0.0/16');
      expect(CidrBlock.parse('10.0.0.0/0.0.255.255').toString()).toBe('10.0.0.0/16');
      expect(CidrBlock.parse('192.168.1.0/255.255.255.192').toString()).toBe('192.168.1.0/26');
      expect(CidrBlock.parse('0.0.0.0/0.0.0.0').toString()).toBe('0.0.0.0/0');
      expect(CidrBlock.parse('10.0.0.1/255.255.255.255').toString()).toBe('10.0.0.1/32');
    });

    it('should reject host bits set under a netmask', () => {
      expect(() => CidrBlock.parse('10.0.1.0/255.255.0.0')).toThrow('Invalid network "10.0.1.0/255.255.0.0": host bits are set');
    });

    it.each([
      '10.0.0.0/255.0.255.0',
      '10.0.0.0/255.255.0',
      '2001:db8::/255.255.0.0',
      'not-a-cidr',
      '',
      '192.168.1.5/24',
      '256.0.0.0/8',
      '010.0.0.0/8',
      '10.0.0.0/33',
      '10.0.0.0/',
      '10.0.0.0/8/1',
      '10.0.0/8',
      ' 10.0.0.0/8',
      '2001:db8::1/64',
      'fe80::/10%eth0',
      '2001:db8:::/48',
    ])('should reject %j', (input) => {
      expect(() => CidrBlock.parse(input)).toThrow(InvalidNetworkFormatError);
    });

    it('should report the offending network', () => {
      expect(() => CidrBlock.parse('192.168.1.5/24')).toThrow('Invalid network "192.168.1.5/24": host bits are set');
    });
  });

  describe('subnets', () => {
    it('should split an IPv4 block in ascending order', () => {
      const subnets = CidrBlock.parse('10.0.0.0/16').subnets(2).map((s) => s.toString());

      expect(subnets).toEqual([
        '10.0.0.0/18',
        '10.0.64.0/18',
        '10.0.128.0/18',
        '10.0.192.0/18',
      ]);
    });

    it('should split an IPv6 block', () => {
      const subnets = CidrBlock.parse('2001:db8::/32').subnets(2).map((s) => s.toString());

      expect(subnets).toEqual([
        '2001:db8::/34',
        '2001:db8:4000::/34',
        '2001:db8:8000::/34',
        '2001:db8:c000::/34',
      ]);
    });

    it('should return the block itself for a zero diff', () => {
      expect(CidrBlock.parse('10.0.0.0/8').subnets(0).map((s) => s.toString())).toEqual(['10.0.0.0/8']);
    });

    it('should reject a diff past the address width', () => {
      expect(() => CidrBlock.parse('10.0.0.0/31').subnets(2)).toThrow(RangeError);
    });
  });

  describe('contains', () => {
    const block = CidrBlock.parse('10.0.0.0/16');

    it('should contain its sub-blocks', () => {
      expect(block.contains(CidrBlock.parse('10.0.4.0/24'))).toBe(true);
      expect(block.contains(block)).toBe(true);
    });

    it('should not contain other or larger blocks', () => {
      expect(block.contains(CidrBlock.parse('10.1.0.0/24'))).toBe(false);
      expect(block.contains(CidrBlock.parse('10.0.0.0/8'))).toBe(false);
      expect(block.contains(CidrBlock.parse('::/0'))).toBe(false);
    });
  });
});

describe('bitLength', () => {
  it('should count binary digits', () => {
    expect(bitLength(0)).toBe(0);
    expect(bitLength(1)).toBe(1);
    expect(bitLength(4)).toBe(3);
    expect(bitLength(2 ** 40)).toBe(41);
  });
});
