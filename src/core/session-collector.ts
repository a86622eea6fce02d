import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { CollectionError, CommandError, ConnectError, errorMessage } from '../utils/errors.js';
import type {
  CollectionResult,
  CollectionState,
  DeviceCredentials,
  DeviceSession,
  SessionOpener,
  Target,
} from '../types/session.js';
import { parseInventory } from './session-parser.js';
import type { SessionClassifier } from './session-classifier.js';

const logger = createChildLogger('session-collector');

export const INVENTORY_COMMAND = 'show access-session';

export function detailCommand(mac: string): string {
  return `show access-session mac ${mac} details`;
}

export interface SessionCollectorEvents {
  stateChanged: (state: CollectionState, target: Target) => void;
  sessionClassified: (mac: string, target: Target) => void;
}

export interface SessionCollectorOptions {
  openSession: SessionOpener;
  credentials: DeviceCredentials;
  classifier: SessionClassifier;
}

/**
 * Runs one collection against one switch: connect, list sessions, query each
 * MAC's detail in order, keep the failed ones, disconnect. The device handle
 * lives only inside `collect` and is never shared.
 */
export class SessionCollector extends EventEmitter<SessionCollectorEvents> {
  private readonly openSession: SessionOpener;
  private readonly credentials: DeviceCredentials;
  private readonly classifier: SessionClassifier;

  constructor(options: SessionCollectorOptions) {
    super();
    this.openSession = options.openSession;
    this.credentials = options.credentials;
    this.classifier = options.classifier;
  }

  async collect(target: Target): Promise<CollectionResult> {
    const startTime = Date.now();
    this.transition('init', target);

    let session: DeviceSession | null = null;
    let failed = false;
    try {
      session = await this.openSession(target, this.credentials);
      this.transition('connected', target);

      const result = await this.gather(session, target);
      this.transition('aggregated', target);

      logger.info({
        target,
        failedSessions: Object.keys(result).length,
        elapsedMs: Date.now() - startTime,
      }, 'Collection completed');
      return result;
    } catch (err) {
      failed = true;
      this.transition('failed', target);
      if (err instanceof ConnectError || err instanceof CommandError) {
        logger.error({ target, kind: err.kind, err: err.message }, 'Collection aborted');
        throw new CollectionError(target, err);
      }
      throw err;
    } finally {
      await this.closeQuietly(session, target);
      if (!failed) this.transition('closed', target);
    }
  }

  private async gather(session: DeviceSession, target: Target): Promise<CollectionResult> {
    const inventory = parseInventory(await session.execute(INVENTORY_COMMAND));
    this.transition('inventoried', target);
    logger.info({
      target,
      sessionCount: inventory.sessionCount,
      macs: inventory.macAddresses.length,
    }, 'Access sessions listed');

    const result: CollectionResult = {};
    for (const mac of inventory.macAddresses) {
      const detail = await session.execute(detailCommand(mac));
      const classified = await this.classifier.classify(detail, mac);
      this.transition('detailed', target);
      if (classified) {
        result[mac] = classified;
        this.emit('sessionClassified', mac, target);
      }
    }
    return result;
  }

  private async closeQuietly(session: DeviceSession | null, target: Target): Promise<void> {
    if (!session) return;
    try {
      await session.close();
    } catch (err) {
      logger.warn({ target, err: errorMessage(err) }, 'Failed to close device session');
    }
  }

  private transition(state: CollectionState, target: Target): void {
    logger.debug({ target, state }, 'Collection state');
    this.emit('stateChanged', state, target);
  }
}
