import type { Address, GeoPoint } from '../../entities/shipment.js';

export interface GeocodingPort {
  reverseGeocode(point: GeoPoint): Promise<Address | null>;
}
