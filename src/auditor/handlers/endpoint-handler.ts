import type { AuditResponse } from '../actions.js';
import type { EndpointGroups, IseClient } from '../../infra/ise-client.js';
import { normalizeMac } from '../../utils/mac.js';
import { UNKNOWN } from '../../types/session.js';
import { BaseHandler } from './base-handler.js';

export interface EndpointGroupData {
  macAddress: string;
  groupId: string | null;
  groupName: string;
  groups: EndpointGroups;
}

export class EndpointHandler extends BaseHandler {
  constructor(private readonly ise: IseClient) {
    super('endpoints');
  }

  async listEndpointGroups(): Promise<AuditResponse> {
    try {
      const groups = await this.ise.listEndpointGroups();
      return this.successResponse('list_endpoint_groups', { groups });
    } catch (err) {
      return this.failureResponse('list_endpoint_groups', err);
    }
  }

  getEndpointGroup(macAddress: string): Promise<AuditResponse> {
    return this.lookup('get_endpoint_group', macAddress);
  }

  searchEndpoint(macAddress: string): Promise<AuditResponse> {
    return this.lookup('search_endpoint', macAddress);
  }

  async updateEndpointGroup(macAddress: string, groupId: string): Promise<AuditResponse> {
    const action = 'update_endpoint_group';
    const normalized = normalizeMac(macAddress, '.');
    if (normalized === null) {
      return this.errorResponse(action, 'Invalid MAC address', { macAddress });
    }
    try {
      const updated = await this.ise.updateEndpointGroup(normalized, groupId);
      return this.successResponse(action, { macAddress: normalized, groupId, updated });
    } catch (err) {
      return this.failureResponse(action, err);
    }
  }

  // Garbage never reaches the engine; everything else is asked for in dotted form
  private async lookup(action: string, macAddress: string): Promise<AuditResponse> {
    const normalized = normalizeMac(macAddress, '.');
    if (normalized === null) {
      return this.errorResponse(action, 'Invalid MAC address', { macAddress });
    }
    try {
      return this.successResponse(action, await this.describe(normalized));
    } catch (err) {
      return this.failureResponse(action, err);
    }
  }

  private async describe(macAddress: string): Promise<EndpointGroupData> {
    const groups = await this.ise.listEndpointGroups();
    const groupId = await this.ise.getEndpointGroupId(macAddress);
    return {
      macAddress,
      groupId,
      groupName: (groupId !== null ? groups[groupId] : undefined) ?? UNKNOWN,
      groups,
    };
  }
}
