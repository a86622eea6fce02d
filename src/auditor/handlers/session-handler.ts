import type { AuditResponse } from '../actions.js';
import type { SessionCollector } from '../../core/session-collector.js';
import type { SnapshotStore } from '../../infra/snapshot-store.js';
import type { CollectionResult } from '../../types/session.js';
import { CollectionError, errorMessage } from '../../utils/errors.js';
import { BaseHandler } from './base-handler.js';

export interface CollectSessionsData {
  switchHost: string;
  failedSessionCount: number;
  sessions: CollectionResult;
  snapshotPath: string | null;
}

export class SessionHandler extends BaseHandler {
  constructor(
    private readonly collector: SessionCollector,
    private readonly snapshots: SnapshotStore
  ) {
    super('sessions');
  }

  // An unreachable switch yields no result at all; {} means nothing failed
  async collectSessions(switchHost: string): Promise<AuditResponse> {
    const action = 'collect_sessions';
    let sessions: CollectionResult;
    try {
      sessions = await this.collector.collect(switchHost);
    } catch (err) {
      if (err instanceof CollectionError) {
        return this.errorResponse(action, `No result available from ${switchHost}`, {
          stage: err.stage,
          kind: err.kind,
          reason: err.cause?.message ?? err.message,
        });
      }
      return this.failureResponse(action, err);
    }

    let snapshotPath: string | null = this.snapshots.getPath();
    try {
      this.snapshots.save(sessions);
    } catch (err) {
      this.logger.error({ path: snapshotPath, err: errorMessage(err) }, 'Failed to write snapshot');
      snapshotPath = null;
    }

    const data: CollectSessionsData = {
      switchHost,
      failedSessionCount: Object.keys(sessions).length,
      sessions,
      snapshotPath,
    };
    return this.successResponse(action, data);
  }

  getLastSnapshot(): AuditResponse {
    return this.successResponse('get_last_snapshot', { sessions: this.snapshots.load() });
  }
}
