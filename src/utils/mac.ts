// aabb.ccdd.eeff
export const DEVICE_MAC_SOURCE = '[0-9a-fA-F]{4}\\.[0-9a-fA-F]{4}\\.[0-9a-fA-F]{4}';

/**
 * Reformats a MAC written with any common delimiters (`:`, `-`, `.`, spaces or
 * none) into three groups of four characters joined by `separator`. Case is
 * kept as given. Returns null unless exactly twelve hex digits remain.
 */
export function normalizeMac(mac: string, separator: string = '.'): string | null {
  const stripped = mac.replace(/\W+/g, '');
  if (!/^[0-9a-fA-F]{12}$/.test(stripped)) {
    return null;
  }
  return [stripped.slice(0, 4), stripped.slice(4, 8), stripped.slice(8, 12)].join(separator);
}

export function isValidMac(mac: string): boolean {
  return normalizeMac(mac) !== null;
}
