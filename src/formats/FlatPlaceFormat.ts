import { z } from 'zod';
import type { SavedPlace } from '../types/Place';
import { createSavedPlace, decodeE7, firstPresent, toCoordinates } from '../utils/placeUtils';

/**
 * Flat place export: one place object, or an array of them.
 *
 * Fields follow the takeout layout (`name`/`title`, nested `location` with E7
 * coordinates, `comment`/`note`). The serialized SavedPlace field names are
 * accepted as the last fallback so that exported records load back in.
 */

// =============================================================================
// Schema
// =============================================================================

const FlatLocationSchema = z.object({
  address: z.string().nullish(),
  latitudeE7: z.number().int().nullish(),
  longitudeE7: z.number().int().nullish(),
});

const FlatPlaceSchema = z.object({
  name: z.string().nullish(),
  title: z.string().nullish(),
  location: FlatLocationSchema.nullish(),
  placeId: z.string().nullish(),
  place_id: z.string().nullish(),
  comment: z.string().nullish(),
  note: z.string().nullish(),
  notes: z.string().nullish(),
  date: z.string().nullish(),
  date_saved: z.string().nullish(),
  url: z.string().nullish(),
  address: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  categories: z.array(z.string()).nullish(),
  rating: z.number().nullish(),
});

export const FlatPlaceDocumentSchema = z.union([z.array(FlatPlaceSchema), FlatPlaceSchema]);

export type FlatPlace = z.infer<typeof FlatPlaceSchema>;
export type FlatPlaceDocument = z.infer<typeof FlatPlaceDocumentSchema>;

// =============================================================================
// Detection & conversion
// =============================================================================

export function detectFlatPlaces(value: unknown): FlatPlaceDocument | null {
  const parsed = FlatPlaceDocumentSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Describe why a value is not a flat place document
 */
export function explainFlatPlaceMismatch(value: unknown): string {
  const parsed = FlatPlaceDocumentSchema.safeParse(value);
  if (parsed.success) return 'document is a valid flat place export';
  const issue = parsed.error.issues[0];
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

export function convertFlatPlaces(document: FlatPlaceDocument, listId: string): SavedPlace[] {
  const places = Array.isArray(document) ? document : [document];
  return places.map((place) => transformPlace(place, listId));
}

function transformPlace(place: FlatPlace, listId: string): SavedPlace {
  const { location } = place;
  const encoded = toCoordinates(decodeE7(location?.latitudeE7), decodeE7(location?.longitudeE7));

  return createSavedPlace({
    name: firstPresent(place.name, place.title),
    address: firstPresent(location?.address, place.address),
    coordinates: encoded ?? toCoordinates(place.latitude, place.longitude),
    place_id: firstPresent(place.placeId, place.place_id),
    notes: firstPresent(place.comment, place.note, place.notes),
    date_saved: firstPresent(place.date, place.date_saved),
    url: place.url,
    list_id: listId,
    categories: place.categories,
    rating: place.rating,
  });
}
