/**
 * PlaceGeocoder - Resolve saved place addresses to coordinates
 *
 * Addresses are looked up in batches through node-geocoder, one request at a
 * time and at most one request per `rateLimitDelay`. Answers are cached per
 * normalized address for `cacheTTL`, so a place list with repeated addresses
 * costs one request per distinct address.
 */

import NodeGeocoder, { type Entry, type Geocoder } from 'node-geocoder';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'PlaceGeocoder' });

export interface GeocodedAddress {
  latitude: number;
  longitude: number;
  formattedAddress?: string;
}

/**
 * Anything that can turn a batch of addresses into coordinates.
 * The result is keyed by the address as given; unresolved addresses are absent.
 */
export interface AddressGeocoder {
  geocodeAll(addresses: readonly string[]): Promise<Map<string, GeocodedAddress>>;
}

export type GeocoderProvider = 'openstreetmap' | 'mapbox' | 'google';

export interface GeocoderSettings {
  provider: GeocoderProvider;
  /** Required by every provider except openstreetmap */
  apiKey: string;
  /** Minimum gap between two requests, in ms (Nominatim allows 1 req/sec) */
  rateLimitDelay: number;
  /** How long an answer, including "not found", is reused, in ms */
  cacheTTL: number;
}

interface CachedAnswer {
  result: GeocodedAddress | null;
  expiresAt: number;
}

function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createClient(settings: GeocoderSettings): Geocoder {
  if (settings.provider === 'openstreetmap') {
    return NodeGeocoder({ provider: 'openstreetmap' });
  }
  if (!settings.apiKey) {
    logger.warn({ provider: settings.provider }, 'No API key for provider, using openstreetmap');
    return NodeGeocoder({ provider: 'openstreetmap' });
  }
  return NodeGeocoder({ provider: settings.provider, apiKey: settings.apiKey });
}

export class PlaceGeocoder implements AddressGeocoder {
  private readonly client: Geocoder;
  private readonly answers = new Map<string, CachedAnswer>();
  private nextRequestAt = 0;
  // Batches run one after another so the rate limit spans all of them
  private previousBatch: Promise<unknown> = Promise.resolve();

  constructor(private readonly settings: GeocoderSettings) {
    this.client = createClient(settings);
  }

  geocodeAll(addresses: readonly string[]): Promise<Map<string, GeocodedAddress>> {
    const batch = this.previousBatch.then(() => this.runBatch(addresses));
    this.previousBatch = batch.catch((error: unknown) => {
      logger.error({ error }, 'Geocoding batch failed');
    });
    return batch;
  }

  private async runBatch(addresses: readonly string[]): Promise<Map<string, GeocodedAddress>> {
    const resolved = new Map<string, GeocodedAddress>();
    let requests = 0;

    for (const address of new Set(addresses)) {
      const key = normalizeAddress(address);
      if (key.length === 0) continue;

      let answer = this.cachedAnswer(key);
      if (answer === undefined) {
        requests++;
        answer = await this.request(address, key);
      }
      if (answer) {
        resolved.set(address, answer);
      }
    }

    logger.debug({ addresses: addresses.length, requests, resolved: resolved.size }, 'Geocoding batch done');
    return resolved;
  }

  /** undefined on a miss, null for a cached "not found" */
  private cachedAnswer(key: string): GeocodedAddress | null | undefined {
    const cached = this.answers.get(key);
    if (!cached) return undefined;
    if (cached.expiresAt <= Date.now()) {
      this.answers.delete(key);
      return undefined;
    }
    return cached.result;
  }

  private async request(address: string, key: string): Promise<GeocodedAddress | null> {
    const wait = this.nextRequestAt - Date.now();
    if (wait > 0) {
      await sleep(wait);
    }
    this.nextRequestAt = Date.now() + this.settings.rateLimitDelay;

    let entries: Entry[];
    try {
      entries = await this.client.geocode(address);
    } catch (error) {
      // Not cached, a later batch retries
      logger.warn({ address, error }, 'Geocoding failed');
      return null;
    }

    const best = entries.find(hasCoordinates);
    const result: GeocodedAddress | null = best
      ? { latitude: best.latitude, longitude: best.longitude, formattedAddress: best.formattedAddress }
      : null;

    this.answers.set(key, { result, expiresAt: Date.now() + this.settings.cacheTTL });
    return result;
  }
}

function hasCoordinates(entry: Entry): entry is Entry & { latitude: number; longitude: number } {
  return typeof entry.latitude === 'number' && typeof entry.longitude === 'number';
}
