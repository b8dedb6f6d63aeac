import { fetch } from 'undici';
import { z } from 'zod';
import type { Address, GeoPoint, GeocodingPort } from '@cargotrace/domain';

const DEFAULT_BASE_URL = 'https://nominatim.openstreetmap.org';

const ReverseResponseSchema = z.object({
  lat: z.coerce.number().optional(),
  lon: z.coerce.number().optional(),
  address: z
    .object({
      house_number: z.string().optional(),
      road: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      state: z.string().optional(),
      postcode: z.string().optional(),
      country: z.string().optional(),
      country_code: z.string().optional(),
    })
    .optional(),
  error: z.string().optional(),
});

export interface NominatimGeocoderOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
}

/** Reverse geocoding over the Nominatim `/reverse` endpoint. */
export class NominatimGeocoder implements GeocodingPort {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(opts: NominatimGeocoderOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.userAgent = opts.userAgent ?? 'cargotrace-geocoder/0.1';
    this.timeoutMs = opts.timeoutMs ?? 5_000;
  }

  async reverseGeocode(point: GeoPoint): Promise<Address | null> {
    const url = `${this.baseUrl}/reverse?format=jsonv2&lat=${point.lat}&lon=${point.lng}`;
    const resp = await fetch(url, {
      headers: { 'user-agent': this.userAgent, accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!resp.ok) {
      throw new Error(`[geocoder] reverse lookup failed with HTTP ${resp.status}`);
    }

    const body = ReverseResponseSchema.parse(await resp.json());
    if (body.error || !body.address) return null;

    const a = body.address;
    const city = a.city ?? a.town ?? a.village;
    const country = a.country_code?.toUpperCase() ?? a.country;
    if (!city || !country) return null;

    return {
      line1: [a.house_number, a.road].filter(Boolean).join(' ') || city,
      city,
      state: a.state,
      postalCode: a.postcode,
      country,
      lat: body.lat ?? point.lat,
      lng: body.lon ?? point.lng,
    };
  }
}
