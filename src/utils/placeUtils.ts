import { PLACEHOLDER_NAME, type Coordinates, type SavedPlace } from '../types/Place';

/** Fixed-point exports store degrees multiplied by 10^7 */
export const E7_DIVISOR = 10_000_000;

/** Rough length of one degree, used by the planar distance approximation */
export const KM_PER_DEGREE = 111;

type Maybe<T> = T | null | undefined;

/**
 * Decode an E7 fixed-point coordinate.
 * Zero and missing values both count as absent.
 */
export function decodeE7(value: Maybe<number>): number | undefined {
  if (!value) return undefined;
  return value / E7_DIVISOR;
}

/**
 * Combine two optional values into a coordinate pair.
 * Returns null unless both are present.
 */
export function toCoordinates(latitude: Maybe<number>, longitude: Maybe<number>): Coordinates | null {
  if (latitude === undefined || latitude === null || longitude === undefined || longitude === null) {
    return null;
  }
  return { latitude, longitude };
}

/**
 * Planar distance in km: euclidean distance in degrees times 111.
 * Not a great-circle distance. Error grows towards the poles and over
 * large longitude spans; fine for the small radii the API allows.
 */
export function planarDistanceKm(a: Coordinates, b: Coordinates): number {
  const latDiff = a.latitude - b.latitude;
  const lngDiff = a.longitude - b.longitude;
  return Math.sqrt(latDiff ** 2 + lngDiff ** 2) * KM_PER_DEGREE;
}

export function placeCoordinates(place: SavedPlace): Coordinates | null {
  return toCoordinates(place.latitude, place.longitude);
}

export interface SavedPlaceInput {
  name?: Maybe<string>;
  address?: Maybe<string>;
  coordinates?: Coordinates | null;
  place_id?: Maybe<string>;
  notes?: Maybe<string>;
  date_saved?: Maybe<string>;
  url?: Maybe<string>;
  list_id: string;
  categories?: Maybe<string[]>;
  rating?: Maybe<number>;
}

/**
 * Create a SavedPlace, dropping unset fields so the serialized record only
 * carries what the export provided
 */
export function createSavedPlace(input: SavedPlaceInput): SavedPlace {
  const place: SavedPlace = {
    name: input.name || PLACEHOLDER_NAME,
    list_id: input.list_id,
  };

  if (input.address != null) place.address = input.address;
  if (input.coordinates) {
    place.latitude = input.coordinates.latitude;
    place.longitude = input.coordinates.longitude;
  }
  if (input.place_id != null) place.place_id = input.place_id;
  if (input.notes != null) place.notes = input.notes;
  if (input.date_saved != null) place.date_saved = input.date_saved;
  if (input.url != null) place.url = input.url;
  if (input.categories != null) place.categories = [...input.categories];
  if (input.rating != null) place.rating = input.rating;

  return place;
}

/**
 * Pick the first value that is neither null, undefined nor an empty string
 */
export function firstPresent<T>(...values: Array<Maybe<T>>): T | undefined {
  for (const value of values) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'string' && value.length === 0) continue;
    return value;
  }
  return undefined;
}
