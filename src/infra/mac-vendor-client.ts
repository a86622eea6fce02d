import axios from 'axios';
import { createChildLogger } from '../utils/logger.js';
import { PacedQueue, sleep } from '../utils/async-helpers.js';
import { errorMessage } from '../utils/errors.js';
import { UNKNOWN } from '../types/session.js';

const logger = createChildLogger('mac-vendor');

const DEFAULT_VENDOR_API = 'https://api.macvendors.com';
const LOOKUP_TIMEOUT = 5000;
// The public API allows one request per second
const MIN_INTERVAL_MS = 1000;

export interface VendorHttp {
  get(url: string): Promise<{ status: number; data: unknown }>;
}

export interface MacVendorClientOptions {
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  minIntervalMs?: number | undefined;
  http?: VendorHttp | undefined;
  pause?: ((ms: number) => Promise<void>) | undefined;
}

export interface VendorLookup {
  lookup(mac: string): Promise<string>;
}

// Never throws; any miss is "Unknown"
export class MacVendorClient implements VendorLookup {
  private readonly http: VendorHttp;
  private readonly queue: PacedQueue;

  constructor(options: MacVendorClientOptions = {}) {
    const timeout = options.timeoutMs ?? LOOKUP_TIMEOUT;
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? DEFAULT_VENDOR_API,
      timeout,
      responseType: 'text',
      validateStatus: () => true,
    });
    this.queue = new PacedQueue(options.minIntervalMs ?? MIN_INTERVAL_MS, options.pause ?? sleep);
  }

  lookup(mac: string): Promise<string> {
    return this.queue.run(() => this.request(mac));
  }

  private async request(mac: string): Promise<string> {
    try {
      const response = await this.http.get(`/${encodeURIComponent(mac)}`);
      if (response.status !== 200) {
        logger.debug({ mac, status: response.status }, 'Vendor lookup returned no match');
        return UNKNOWN;
      }
      const vendor = typeof response.data === 'string' ? response.data.trim() : '';
      return vendor === '' ? UNKNOWN : vendor;
    } catch (err) {
      logger.warn({ mac, err: errorMessage(err) }, 'Vendor lookup failed');
      return UNKNOWN;
    }
  }
}
