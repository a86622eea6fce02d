import { DEVICE_MAC_SOURCE } from '../utils/mac.js';
import {
  UNKNOWN,
  UNKNOWN_IP,
  type ClassifiedSession,
  type RawSessionInventory,
} from '../types/session.js';

// Case-sensitive
export const FAILURE_MARKERS = ['FAIL', 'Unauthorized'] as const;

const SESSION_COUNT_PATTERN = /Session count = (\d+)(?:\r?\n|$)/;

export interface FieldContract {
  readonly pattern: RegExp;
  readonly fallback: string;
}

export const DETAIL_FIELDS = {
  ip_address: { pattern: /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})/, fallback: UNKNOWN_IP },
  interface: { pattern: /Interface:[ \t]+(.*)/, fallback: UNKNOWN },
  user_name: { pattern: /User-Name:[ \t]+(.*)/, fallback: UNKNOWN },
  status: { pattern: /Status:[ \t]+(.*)/, fallback: UNKNOWN },
  // e.g. "mab           Authc Failed" in the method status list
  method: { pattern: /(\w+)[ \t]+Authc\b/, fallback: UNKNOWN },
} satisfies Record<string, FieldContract>;

function macPattern(): RegExp {
  return new RegExp(DEVICE_MAC_SOURCE, 'g');
}

export function extractMacs(text: string): string[] {
  return text.match(macPattern()) ?? [];
}

export function extractField(text: string, contract: FieldContract): string {
  const value = contract.pattern.exec(text)?.[1]?.trim();
  return value ? value : contract.fallback;
}

export function parseInventory(text: string): RawSessionInventory {
  return {
    sessionCount: SESSION_COUNT_PATTERN.exec(text)?.[1],
    macAddresses: extractMacs(text),
  };
}

export function hasFailureMarker(text: string): boolean {
  return FAILURE_MARKERS.some(marker => text.includes(marker));
}

/**
 * Null unless the text carries a failure marker. `fallbackMac` stands in when
 * the detail shows no MAC of its own.
 */
export function parseDetail(text: string, fallbackMac: string): ClassifiedSession | null {
  if (!hasFailureMarker(text)) {
    return null;
  }

  return {
    status: extractField(text, DETAIL_FIELDS.status),
    interface: extractField(text, DETAIL_FIELDS.interface),
    mac_address: extractMacs(text)[0] ?? fallbackMac,
    ip_address: extractField(text, DETAIL_FIELDS.ip_address),
    user_name: extractField(text, DETAIL_FIELDS.user_name),
    method: extractField(text, DETAIL_FIELDS.method),
  };
}
