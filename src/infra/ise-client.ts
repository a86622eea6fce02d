import axios from 'axios';
import * as https from 'https';
import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, PolicyEngineError, errorMessage } from '../utils/errors.js';
import type { Config } from '../config/index.js';

const logger = createChildLogger('ise-client');

// Guards against a server that keeps handing out the same nextPage link
const MAX_PAGES = 1000;

const EndpointGroupPageSchema = z.object({
  SearchResult: z.object({
    total: z.number().optional(),
    resources: z.array(z.object({
      id: z.string(),
      name: z.string(),
    })).default([]),
    nextPage: z.object({
      href: z.string().nullish(),
    }).optional(),
  }),
});

const EndpointSchema = z.object({
  ERSEndPoint: z.object({
    id: z.string(),
    name: z.string().optional(),
    mac: z.string().optional(),
    groupId: z.string().nullish(),
  }),
});

export interface HttpResponse {
  status: number;
  data: unknown;
}

// axios instances satisfy this
export interface IseHttp {
  get(url: string): Promise<HttpResponse>;
  put(url: string, body: unknown): Promise<HttpResponse>;
}

export interface IseEndpoint {
  id: string;
  groupId: string | null;
}

export type EndpointGroups = Record<string, string>;

function createHttp(config: Config['ise']): IseHttp {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    auth: { username: config.username, password: config.password },
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    // ISE appliances usually present self-signed certificates
    httpsAgent: new https.Agent({ rejectUnauthorized: config.verifyTls }),
    validateStatus: () => true,
  });
}

export class IseClient {
  private readonly http: IseHttp;

  constructor(config: Config['ise'], http?: IseHttp) {
    this.http = http ?? createHttp(config);
  }

  async listEndpointGroups(): Promise<EndpointGroups> {
    const groups: EndpointGroups = {};
    let url: string | null = 'endpointgroup';
    let pages = 0;

    while (url) {
      if (++pages > MAX_PAGES) {
        throw new PolicyEngineError(ErrorCode.ISE_RESPONSE_INVALID, `Endpoint group listing exceeded ${MAX_PAGES} pages`);
      }
      const pageUrl: string = url;
      const response = await this.request('GET', pageUrl, () => this.http.get(pageUrl));
      this.expectStatus(response, 200, 'list endpoint groups');
      const page = this.parse(EndpointGroupPageSchema, response.data, 'endpoint group page');

      for (const group of page.SearchResult.resources) {
        groups[group.id] = group.name;
      }
      url = page.SearchResult.nextPage?.href || null;
    }

    logger.debug({ groups: Object.keys(groups).length, pages }, 'Endpoint groups listed');
    return groups;
  }

  async getEndpoint(mac: string): Promise<IseEndpoint | null> {
    const url = `endpoint/name/${encodeURIComponent(mac)}`;
    const response = await this.request('GET', url, () => this.http.get(url));
    if (response.status === 404) {
      return null;
    }
    this.expectStatus(response, 200, 'look up endpoint');
    const endpoint = this.parse(EndpointSchema, response.data, 'endpoint').ERSEndPoint;
    return { id: endpoint.id, groupId: endpoint.groupId ?? null };
  }

  async getEndpointGroupId(mac: string): Promise<string | null> {
    const endpoint = await this.getEndpoint(mac);
    return endpoint?.groupId ?? null;
  }

  // Static assignment, so profiling does not move the endpoint back
  async updateEndpointGroup(mac: string, groupId: string): Promise<boolean> {
    const endpoint = await this.getEndpoint(mac);
    if (!endpoint) {
      throw new PolicyEngineError(ErrorCode.ISE_ENDPOINT_NOT_FOUND, `Endpoint ${mac} not found`, {
        context: { mac },
        status: 404,
      });
    }

    const url = `endpoint/${encodeURIComponent(endpoint.id)}`;
    const body = {
      ERSEndPoint: {
        groupId,
        staticGroupAssignment: 'true',
      },
    };
    const response = await this.request('PUT', url, () => this.http.put(url, body));
    const updated = response.status === 200;

    if (updated) {
      logger.info({ mac, endpointId: endpoint.id, groupId }, 'Endpoint group updated');
    } else {
      logger.warn({ mac, endpointId: endpoint.id, groupId, status: response.status }, 'Endpoint group update rejected');
    }
    return updated;
  }

  private async request(method: string, url: string, send: () => Promise<HttpResponse>): Promise<HttpResponse> {
    try {
      return await send();
    } catch (err) {
      logger.error({ method, url, err: errorMessage(err) }, 'ISE request failed');
      throw new PolicyEngineError(ErrorCode.ISE_REQUEST_FAILED, `ISE ${method} ${url} failed: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
        context: { method, url },
      });
    }
  }

  private expectStatus(response: HttpResponse, expected: number, operation: string): void {
    if (response.status !== expected) {
      throw new PolicyEngineError(ErrorCode.ISE_REQUEST_FAILED, `Could not ${operation}: HTTP ${response.status}`, {
        status: response.status,
      });
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new PolicyEngineError(ErrorCode.ISE_RESPONSE_INVALID, `Unexpected ${what} response`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
