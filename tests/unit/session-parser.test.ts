import { describe, it, expect } from 'vitest';
import {
  DETAIL_FIELDS,
  extractField,
  extractMacs,
  hasFailureMarker,
  parseDetail,
  parseInventory,
} from '../../src/core/session-parser.js';
import { loadFixture } from '../fixtures/load.js';

describe('parseInventory', () => {
  it('should read the count and every MAC in order', () => {
    const inventory = parseInventory(loadFixture('show-access-session.txt'));

    expect(inventory.sessionCount).toBe('3');
    expect(inventory.macAddresses).toEqual(['0050.5699.1234', 'aabb.ccdd.eeff', 'F0DE.F1AA.0001']);
  });

  it('should leave the count undefined when the count line is missing', () => {
    const inventory = parseInventory('Gi1/0/1  0050.5699.1234 mab DATA Auth\n');

    expect(inventory.sessionCount).toBeUndefined();
    expect(inventory.macAddresses).toEqual(['0050.5699.1234']);
  });

  it('should accept a count on the last line without a newline and CRLF line ends', () => {
    expect(parseInventory('Session count = 0').sessionCount).toBe('0');
    expect(parseInventory('Session count = 12\r\n').sessionCount).toBe('12');
  });

  it('should keep repeated MACs', () => {
    const inventory = parseInventory('0050.5699.1234 mab\n0050.5699.1234 dot1x\nSession count = 2\n');
    expect(inventory.macAddresses).toEqual(['0050.5699.1234', '0050.5699.1234']);
  });

  it('should ignore colon notation and session IDs', () => {
    expect(extractMacs('00:50:56:99:12:34 0A0A0A0B0000001A2B3C4D5E')).toEqual([]);
  });

  it('should return the same result for the same text', () => {
    const text = loadFixture('show-access-session.txt');
    expect(parseInventory(text)).toEqual(parseInventory(text));
  });
});

describe('hasFailureMarker', () => {
  it('should match the exact markers only', () => {
    expect(hasFailureMarker('mab  Authc FAILED')).toBe(true);
    expect(hasFailureMarker('Status:  Unauthorized')).toBe(true);
    expect(hasFailureMarker('Status:  Authz Failed')).toBe(false);
    expect(hasFailureMarker('status: unauthorized, fail')).toBe(false);
  });
});

describe('parseDetail', () => {
  it('should build the record for a failed MAB session', () => {
    const session = parseDetail(loadFixture('detail-mab-failed.txt'), '0050.5699.1234');

    expect(session).toEqual({
      status: 'Authz Failed',
      interface: 'Gi1/0/1',
      mac_address: '0050.5699.1234',
      ip_address: 'unknown',
      user_name: 'Unknown',
      method: 'mab',
    });
  });

  it('should build the record for an unauthorized 802.1X session', () => {
    const session = parseDetail(loadFixture('detail-dot1x-unauthorized.txt'), 'aabb.ccdd.eeff');

    expect(session).toEqual({
      status: 'Unauthorized',
      interface: 'GigabitEthernet1/0/2',
      mac_address: 'aabb.ccdd.eeff',
      ip_address: '10.20.30.40',
      user_name: 'host/lab-pc-07',
      method: 'dot1x',
    });
  });

  it('should return null for an authorized session every time', () => {
    const text = loadFixture('detail-authorized.txt');
    expect(parseDetail(text, 'f0de.f1aa.0001')).toBeNull();
    expect(parseDetail(text, 'f0de.f1aa.0001')).toBeNull();
  });

  it('should fall back to sentinels when only the marker is present', () => {
    expect(parseDetail('Unauthorized', '1111.2222.3333')).toEqual({
      status: 'Unknown',
      interface: 'Unknown',
      mac_address: '1111.2222.3333',
      ip_address: 'unknown',
      user_name: 'Unknown',
      method: 'Unknown',
    });
  });

  it('should strip carriage returns from captured values', () => {
    const session = parseDetail('Interface:  Gi1/0/9\r\nStatus:  Unauthorized\r\n', '1111.2222.3333');
    expect(session?.interface).toBe('Gi1/0/9');
    expect(session?.status).toBe('Unauthorized');
  });
});

describe('field contracts', () => {
  it('should read each field independently', () => {
    expect(extractField('User-Name:  00-50-56-99-12-34\n', DETAIL_FIELDS.user_name)).toBe('00-50-56-99-12-34');
    expect(extractField('  webauth   Authc Failed\n', DETAIL_FIELDS.method)).toBe('webauth');
    expect(extractField('no address here', DETAIL_FIELDS.ip_address)).toBe('unknown');
  });

  it('should treat an empty value as missing', () => {
    expect(extractField('Interface:   \n', DETAIL_FIELDS.interface)).toBe('Unknown');
  });
});
