import type { EcefPosition, GeodeticPosition } from '@castermon/shared';

// WGS-84
const SEMI_MAJOR_AXIS = 6378137.0;
const FLATTENING = 1 / 298.257223563;
const E2 = FLATTENING * (2 - FLATTENING);

/** ECEF (metres) to geodetic latitude/longitude (degrees) and ellipsoidal height (metres) */
export function ecefToGeodetic({ x, y, z }: EcefPosition): GeodeticPosition {
  const p = Math.sqrt(x * x + y * y);
  let latitude = Math.atan2(z, p * (1 - E2));

  for (let i = 0; i < 10; i++) {
    const sinLat = Math.sin(latitude);
    const n = SEMI_MAJOR_AXIS / Math.sqrt(1 - E2 * sinLat * sinLat);
    const next = Math.atan2(z + E2 * n * sinLat, p);
    if (Math.abs(next - latitude) < 1e-12) {
      latitude = next;
      break;
    }
    latitude = next;
  }

  // Valid at the poles too, where p / cos(latitude) is not
  const sinLat = Math.sin(latitude);
  const height = p * Math.cos(latitude) + z * sinLat - SEMI_MAJOR_AXIS * Math.sqrt(1 - E2 * sinLat * sinLat);

  return {
    latitude: (latitude * 180) / Math.PI,
    longitude: (Math.atan2(y, x) * 180) / Math.PI,
    height,
  };
}
