import { describe, it, expect, vi } from 'vitest';
import { SessionClassifier, isMabSession } from '../../src/core/session-classifier.js';
import { loadFixture } from '../fixtures/load.js';

function createClassifier(lookup: (mac: string) => Promise<string> = async () => 'VMware, Inc.') {
  const vendors = { lookup: vi.fn(lookup) };
  return { classifier: new SessionClassifier(vendors), vendors };
}

describe('SessionClassifier', () => {
  it('should add the vendor to a failed MAB session', async () => {
    const { classifier, vendors } = createClassifier();

    const session = await classifier.classify(loadFixture('detail-mab-failed.txt'), '0050.5699.1234');

    expect(session?.vendor).toBe('VMware, Inc.');
    expect(vendors.lookup).toHaveBeenCalledTimes(1);
    expect(vendors.lookup).toHaveBeenCalledWith('0050.5699.1234');
  });

  it('should not look up vendors for 802.1X sessions', async () => {
    const { classifier, vendors } = createClassifier();

    const session = await classifier.classify(loadFixture('detail-dot1x-unauthorized.txt'), 'aabb.ccdd.eeff');

    expect(session).not.toBeNull();
    expect(session && 'vendor' in session).toBe(false);
    expect(vendors.lookup).not.toHaveBeenCalled();
  });

  it('should skip authorized sessions without a lookup', async () => {
    const { classifier, vendors } = createClassifier();

    await expect(classifier.classify(loadFixture('detail-authorized.txt'), 'f0de.f1aa.0001')).resolves.toBeNull();
    expect(vendors.lookup).not.toHaveBeenCalled();
  });

  it('should keep the record when the vendor is unknown', async () => {
    const { classifier } = createClassifier(async () => 'Unknown');

    const session = await classifier.classify(loadFixture('detail-mab-failed.txt'), '0050.5699.1234');

    expect(session?.status).toBe('Authz Failed');
    expect(session?.vendor).toBe('Unknown');
  });
});

describe('isMabSession', () => {
  const base = {
    status: 'Unauthorized',
    interface: 'Gi1/0/1',
    mac_address: '0050.5699.1234',
    ip_address: 'unknown',
    user_name: 'Unknown',
  };

  it('should compare the method without regard to case', () => {
    expect(isMabSession({ ...base, method: 'mab' })).toBe(true);
    expect(isMabSession({ ...base, method: 'MAB' })).toBe(true);
    expect(isMabSession({ ...base, method: 'dot1x' })).toBe(false);
    expect(isMabSession({ ...base, method: 'Unknown' })).toBe(false);
  });
});
