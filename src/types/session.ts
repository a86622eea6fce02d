export type Target = string;

export interface DeviceCredentials {
  username: string;
  password: string;
  // enable secret
  secret: string;
  port: number;
}

export interface RawSessionInventory {
  sessionCount: string | undefined;
  macAddresses: string[];
}

export const UNKNOWN = 'Unknown';
export const UNKNOWN_IP = 'unknown';

export interface ClassifiedSession {
  status: string;
  interface: string;
  mac_address: string;
  ip_address: string;
  user_name: string;
  method: string;
  vendor?: string | undefined;
}

// Keyed by the MAC used in the detail query
export type CollectionResult = Record<string, ClassifiedSession>;

export type CollectionState =
  | 'init'
  | 'connected'
  | 'inventoried'
  | 'detailed'
  | 'aggregated'
  | 'closed'
  | 'failed';

export interface DeviceSession {
  execute(command: string): Promise<string>;
  close(): Promise<void>;
}

export type SessionOpener = (target: Target, credentials: DeviceCredentials) => Promise<DeviceSession>;
