import dotenv from 'dotenv';
import type { GeocoderProvider, GeocoderSettings } from './services/PlaceGeocoder';

dotenv.config();

export interface AppConfig {
  port: number;
  dataPath: string;
  geocodeMissing: boolean;
  geocoder: GeocoderSettings;
}

const PROVIDERS: readonly GeocoderProvider[] = ['openstreetmap', 'mapbox', 'google'];

function toProvider(value: string | undefined): GeocoderProvider {
  return PROVIDERS.find((provider) => provider === value) ?? 'openstreetmap';
}

function toNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Build the configuration from environment variables.
 * A data path passed on the command line wins over PLACES_DATA_PATH.
 */
export function readConfig(env: NodeJS.ProcessEnv, argv: readonly string[] = []): AppConfig {
  return {
    port: toNumber(env.PORT, 3000),
    dataPath: argv[0] ?? env.PLACES_DATA_PATH ?? '.',
    geocodeMissing: env.GEOCODE_MISSING === 'true', // Default: disabled
    geocoder: {
      provider: toProvider(env.GEOCODER_PROVIDER),
      apiKey: env.GEOCODER_API_KEY ?? '',
      rateLimitDelay: toNumber(env.GEOCODER_RATE_LIMIT_MS, 1100),
      cacheTTL: toNumber(env.GEOCODER_CACHE_TTL_MS, 3600000),
    },
  };
}

export const config = readConfig(process.env, process.argv.slice(2));
