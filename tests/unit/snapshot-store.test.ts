import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SnapshotStore } from '../../src/infra/snapshot-store.js';
import type { CollectionResult } from '../../src/types/session.js';

const first: CollectionResult = {
  '0050.5699.1234': {
    status: 'Authz Failed',
    interface: 'Gi1/0/1',
    mac_address: '0050.5699.1234',
    ip_address: 'unknown',
    user_name: 'Unknown',
    method: 'mab',
    vendor: 'VMware, Inc.',
  },
};

const second: CollectionResult = {
  'aabb.ccdd.eeff': {
    status: 'Unauthorized',
    interface: 'GigabitEthernet1/0/2',
    mac_address: 'aabb.ccdd.eeff',
    ip_address: '10.20.30.40',
    user_name: 'host/lab-pc-07',
    method: 'dot1x',
  },
};

describe('SnapshotStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return null before anything was saved', () => {
    expect(new SnapshotStore(path.join(dir, 'result.json')).load()).toBeNull();
  });

  it('should create the directory and write indented JSON', () => {
    const file = path.join(dir, 'static', 'result.json');
    const store = new SnapshotStore(file);

    store.save(first);

    expect(fs.readFileSync(file, 'utf-8')).toBe(`${JSON.stringify(first, null, 2)}\n`);
    expect(store.load()).toEqual(first);
  });

  it('should keep only the latest result', () => {
    const store = new SnapshotStore(path.join(dir, 'result.json'));

    store.save(first);
    store.save(second);

    expect(store.load()).toEqual(second);
  });

  it('should store an empty result as an empty object', () => {
    const file = path.join(dir, 'result.json');
    new SnapshotStore(file).save({});

    expect(fs.readFileSync(file, 'utf-8')).toBe('{}\n');
  });

  it('should ignore a file that is not a snapshot', () => {
    const file = path.join(dir, 'result.json');
    fs.writeFileSync(file, '{"0050.5699.1234": {"status": 1}}');
    expect(new SnapshotStore(file).load()).toBeNull();

    fs.writeFileSync(file, 'not json');
    expect(new SnapshotStore(file).load()).toBeNull();
  });

  it('should resolve relative paths', () => {
    expect(new SnapshotStore('static/result.json').getPath()).toBe(path.resolve('static/result.json'));
  });
});
