import { describe, it, expect } from 'vitest';
import { normalizeMac, isValidMac } from '../../src/utils/mac.js';

describe('normalizeMac', () => {
  it('should regroup colon notation with a dot separator', () => {
    expect(normalizeMac('AA:BB:CC:DD:EE:FF', '.')).toBe('AABB.CCDD.EEFF');
  });

  it('should default to the dot separator', () => {
    expect(normalizeMac('00-50-56-99-12-34')).toBe('0050.5699.1234');
  });

  it('should honour a custom separator and keep case', () => {
    expect(normalizeMac('aa-bb-cc-dd-ee-ff', ':')).toBe('aabb:ccdd:eeff');
  });

  it('should accept undelimited and device notation', () => {
    expect(normalizeMac('aabbccddeeff')).toBe('aabb.ccdd.eeff');
    expect(normalizeMac('aabb.ccdd.eeff')).toBe('aabb.ccdd.eeff');
  });

  it('should signal invalid input for an 11-digit MAC', () => {
    expect(normalizeMac('AA:BB:CC:DD:EE:F')).toBeNull();
  });

  it('should reject non-hex characters', () => {
    expect(normalizeMac('GG:HH:II:JJ:KK:LL')).toBeNull();
    expect(normalizeMac('not-a-mac')).toBeNull();
  });
});

describe('isValidMac', () => {
  it('should validate correct MACs', () => {
    expect(isValidMac('AA:BB:CC:DD:EE:FF')).toBe(true);
    expect(isValidMac('AABB.CCDD.EEFF')).toBe(true);
  });

  it('should reject invalid MACs', () => {
    expect(isValidMac('AA:BB:CC:DD:EE')).toBe(false);
  });
});
