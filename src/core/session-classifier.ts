import { createChildLogger } from '../utils/logger.js';
import type { VendorLookup } from '../infra/mac-vendor-client.js';
import type { ClassifiedSession } from '../types/session.js';
import { parseDetail } from './session-parser.js';

const logger = createChildLogger('session-classifier');

// MAC Authentication Bypass: the MAC is the identity, so the vendor is worth knowing
const MAB_METHOD = 'mab';

export function isMabSession(session: ClassifiedSession): boolean {
  return session.method.toLowerCase() === MAB_METHOD;
}

export class SessionClassifier {
  constructor(private readonly vendors: VendorLookup) {}

  async classify(detailText: string, queriedMac: string): Promise<ClassifiedSession | null> {
    const session = parseDetail(detailText, queriedMac);
    if (!session) {
      return null;
    }

    if (isMabSession(session)) {
      session.vendor = await this.vendors.lookup(session.mac_address);
    }

    logger.debug({ mac: queriedMac, status: session.status, method: session.method }, 'Failed session classified');
    return session;
  }
}
