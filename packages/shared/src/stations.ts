// ============================================================================
// CasterMon Station Types
// ============================================================================

export interface StationConfig {
  id: string;
  name: string;
  host: string;
  port: number;
  mountpoint: string;
  username: string;
  password: string;
  latitude?: number;
  longitude?: number;
  altitude?: number;
}

export type StationInput = Omit<StationConfig, 'id'> & { id?: string };

export interface CasterEndpoint {
  host: string;
  port: number;
  username: string;
  password: string;
}

// One STR record of a caster sourcetable
export interface MountpointDescriptor {
  mountpoint: string;
  identifier: string;
  format: string;
  formatDetails: string;
  carrier: number;        // 0 = none, 1 = L1, 2 = L1+L2
  navSystems: string[];
  network: string;
  country: string;
  latitude?: number;
  longitude?: number;
  nmea: boolean;
  authentication: string; // N, B or D
  fee: boolean;
  bitrate?: number;
}
