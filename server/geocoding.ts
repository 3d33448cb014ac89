import { z } from 'zod';
import type { Coordinates, ResolvedAddress } from '@shared/conversation';
import { AppError, ErrorCode } from './error-handling';
import { callWithRetry, COLLABORATOR_RETRY, withTimeout } from './retry-strategy';
import { trackApiCall } from './monitoring';
import { CacheService, cacheKeys } from './cache-service';
import type { Geocoder } from './ports';

const reverseResponseSchema = z.object({
  display_name: z.string().optional(),
  address: z
    .object({
      postcode: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
});

const searchResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
  })
);

export type GeocodeLookup = Coordinates | ResolvedAddress | null;

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  cache?: CacheService<GeocodeLookup>;
}

/**
 * Postal code and coordinate lookups against a Nominatim server.
 * A postal code Nominatim does not know resolves to null; transport or
 * HTTP failures raise COLLABORATOR_* errors.
 */
export class NominatimGeocoder implements Geocoder {
  private readonly cache: CacheService<GeocodeLookup>;

  constructor(private readonly options: NominatimOptions) {
    this.cache = options.cache ?? new CacheService<GeocodeLookup>('Geocoding');
  }

  async forward(postalCode: string): Promise<Coordinates | null> {
    const { data } = await this.cache.getOrFetch(cacheKeys.forwardGeocode(postalCode), async () => {
      const body = await this.request('/search', {
        postalcode: postalCode,
        format: 'json',
        limit: '1',
      });

      const parsed = searchResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('Unexpected search response from geocoder'));
      }

      const first = parsed.data[0];
      if (!first) {
        console.warn(`[Geocoding] Postal code ${postalCode} not found`);
        return null;
      }

      console.log(`[Geocoding] ${postalCode} -> ${first.lat}, ${first.lon}`);
      return { latitude: first.lat, longitude: first.lon };
    });

    return data !== null && 'latitude' in data ? data : null;
  }

  async reverse(coordinates: Coordinates): Promise<ResolvedAddress | null> {
    const key = cacheKeys.reverseGeocode(coordinates.latitude, coordinates.longitude);
    const { data } = await this.cache.getOrFetch(key, async () => {
      const body = await this.request('/reverse', {
        lat: String(coordinates.latitude),
        lon: String(coordinates.longitude),
        format: 'json',
        addressdetails: '1',
      });

      const parsed = reverseResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('Unexpected reverse response from geocoder'));
      }

      const address = parsed.data.address ?? {};
      const resolved: ResolvedAddress = {
        postalCode: address.postcode ?? null,
        city: address.city ?? address.town ?? address.village ?? null,
        country: address.country ?? null,
        displayName: parsed.data.display_name ?? null,
      };
      return resolved;
    });

    return data !== null && 'displayName' in data ? data : null;
  }

  private async request(path: string, params: Record<string, string>): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}?${new URLSearchParams(params).toString()}`;

    return trackApiCall('geocoding', () =>
      callWithRetry(
        'Nominatim',
        async () => {
          const response = await withTimeout(
            fetch(url, { headers: { 'User-Agent': this.options.userAgent } }),
            this.options.timeoutMs
          );

          // Unknown postal codes come back as 200 with no results, so any error status is the service's
          if (!response.ok) {
            throw new AppError(
              ErrorCode.COLLABORATOR_UNAVAILABLE,
              new Error(`Nominatim error: ${response.status} ${response.statusText}`),
              { httpStatus: response.status }
            );
          }

          const body: unknown = await response.json();
          return body;
        },
        COLLABORATOR_RETRY.geocoding
      )
    );
  }
}
