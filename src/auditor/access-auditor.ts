import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { validateDeviceCredentials, validateIseCredentials, type Config } from '../config/index.js';
import { CiscoSshSession } from '../infra/cisco-ssh-session.js';
import { MacVendorClient } from '../infra/mac-vendor-client.js';
import { IseClient } from '../infra/ise-client.js';
import { SnapshotStore } from '../infra/snapshot-store.js';
import { SessionClassifier } from '../core/session-classifier.js';
import { SessionCollector } from '../core/session-collector.js';
import type { SessionOpener } from '../types/session.js';
import type { AuditAction, AuditResponse } from './actions.js';
import { SessionHandler } from './handlers/session-handler.js';
import { EndpointHandler } from './handlers/endpoint-handler.js';

const logger = createChildLogger('access-auditor');

export interface AuditorDependencies {
  openSession: SessionOpener;
  collector: SessionCollector;
  ise: IseClient;
  snapshots: SnapshotStore;
}

const DEVICE_ACTIONS = new Set<AuditAction['action']>(['collect_sessions']);
const ISE_ACTIONS = new Set<AuditAction['action']>([
  'list_endpoint_groups',
  'get_endpoint_group',
  'search_endpoint',
  'update_endpoint_group',
]);

export class AccessAuditor {
  private readonly config: Config;
  private readonly sessions: SessionHandler;
  private readonly endpoints: EndpointHandler;
  private actionCount = 0;
  private errorCount = 0;

  constructor(config: Config, deps: Partial<AuditorDependencies> = {}) {
    this.config = config;

    const openSession: SessionOpener = deps.openSession ?? ((target, credentials) =>
      CiscoSshSession.open(target, credentials, {
        connectTimeoutMs: config.device.connectTimeoutMs,
        commandTimeoutMs: config.device.commandTimeoutMs,
      }));

    const collector = deps.collector ?? new SessionCollector({
      openSession,
      credentials: {
        username: config.device.username,
        password: config.device.password,
        secret: config.device.secret,
        port: config.device.port,
      },
      classifier: new SessionClassifier(new MacVendorClient({
        baseUrl: config.vendorLookup.baseUrl,
        timeoutMs: config.vendorLookup.timeoutMs,
        minIntervalMs: config.vendorLookup.minIntervalMs,
      })),
    });

    this.sessions = new SessionHandler(collector, deps.snapshots ?? new SnapshotStore(config.snapshot.path));
    this.endpoints = new EndpointHandler(deps.ise ?? new IseClient(config.ise));
  }

  async execute(action: AuditAction): Promise<AuditResponse> {
    const startTime = Date.now();
    this.actionCount++;
    logger.info({ action: action.action }, 'Executing action');

    try {
      this.checkCredentials(action.action);
      const result = await this.executeAction(action);
      if (!result.success) this.errorCount++;
      logger.info({ action: action.action, success: result.success, durationMs: Date.now() - startTime }, 'Action finished');
      return result;
    } catch (err) {
      this.errorCount++;
      logger.error({ action: action.action, err: errorMessage(err) }, 'Action failed');
      return {
        success: false,
        action: action.action,
        error: errorMessage(err),
        timestamp: new Date().toISOString(),
      };
    }
  }

  getStats(): { actionCount: number; errorCount: number } {
    return { actionCount: this.actionCount, errorCount: this.errorCount };
  }

  private checkCredentials(action: AuditAction['action']): void {
    if (DEVICE_ACTIONS.has(action)) validateDeviceCredentials(this.config);
    if (ISE_ACTIONS.has(action)) validateIseCredentials(this.config);
  }

  private async executeAction(action: AuditAction): Promise<AuditResponse> {
    switch (action.action) {
      case 'collect_sessions':
        return this.sessions.collectSessions(action.params.switchHost);

      case 'get_last_snapshot':
        return this.sessions.getLastSnapshot();

      case 'list_endpoint_groups':
        return this.endpoints.listEndpointGroups();

      case 'get_endpoint_group':
        return this.endpoints.getEndpointGroup(action.params.macAddress);

      case 'search_endpoint':
        return this.endpoints.searchEndpoint(action.params.macAddress);

      case 'update_endpoint_group':
        return this.endpoints.updateEndpointGroup(action.params.macAddress, action.params.groupId);
    }
  }
}
