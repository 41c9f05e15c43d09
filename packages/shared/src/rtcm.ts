// ============================================================================
// CasterMon RTCM 3 Types
// ============================================================================

export type Constellation = 'GPS' | 'GLONASS' | 'Galileo' | 'SBAS' | 'QZSS' | 'BeiDou';

export const CONSTELLATIONS: readonly Constellation[] = ['GPS', 'GLONASS', 'Galileo', 'SBAS', 'QZSS', 'BeiDou'];

// A CRC-checked RTCM 3 transport frame (preamble + length + payload + CRC)
export interface RawFrame {
  bytes: Uint8Array;
  payload: Uint8Array;
}

export interface EcefPosition {
  x: number;
  y: number;
  z: number;
}

export interface GeodeticPosition {
  latitude: number;
  longitude: number;
  height: number;
}

export interface DecodedMessage {
  messageType: number;
  stationId: number;
  satellites?: Partial<Record<Constellation, number[]>>;
  signals?: Partial<Record<Constellation, string[]>>;
  antennaPosition?: EcefPosition;
  antennaHeight?: number;
}

export interface DecodeError {
  error: string;
  messageType?: number;
}
