import { z } from 'zod';
import type { SavedPlace } from '../types/Place';
import { createSavedPlace, firstPresent, toCoordinates } from '../utils/placeUtils';

/**
 * GeoJSON feature collection export
 * Coordinates come as [longitude, latitude] floats; the saved place details
 * sit in `properties`, sometimes with a nested `location` object
 */

// =============================================================================
// Schema
// =============================================================================

const FeatureLocationSchema = z.object({
  name: z.string().nullish(),
  address: z.string().nullish(),
  country_code: z.string().nullish(),
});

const FeaturePropertiesSchema = z.object({
  name: z.string().nullish(),
  address: z.string().nullish(),
  place_id: z.string().nullish(),
  comment: z.string().nullish(),
  date: z.string().nullish(),
  url: z.string().nullish(),
  google_maps_url: z.string().nullish(),
  categories: z.array(z.string()).nullish(),
  rating: z.number().nullish(),
  location: FeatureLocationSchema.nullish(),
});

const FeatureSchema = z.object({
  type: z.string().optional(),
  geometry: z.object({
    type: z.string().optional(),
    coordinates: z.array(z.number()).default([]),
  }),
  properties: FeaturePropertiesSchema,
});

export const FeatureCollectionSchema = z.object({
  type: z.string().optional(),
  features: z.array(FeatureSchema),
});

export type Feature = z.infer<typeof FeatureSchema>;
export type FeatureCollectionDocument = z.infer<typeof FeatureCollectionSchema>;

// =============================================================================
// Detection & conversion
// =============================================================================

export function detectFeatureCollection(value: unknown): FeatureCollectionDocument | null {
  if (typeof value !== 'object' || value === null || !('features' in value)) {
    return null;
  }
  const parsed = FeatureCollectionSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function convertFeatureCollection(document: FeatureCollectionDocument, listId: string): SavedPlace[] {
  return document.features.map((feature) => transformFeature(feature, listId));
}

function transformFeature(feature: Feature, listId: string): SavedPlace {
  const { properties, geometry } = feature;
  const [longitude, latitude] = geometry.coordinates;

  return createSavedPlace({
    name: firstPresent(properties.location?.name, properties.name),
    address: firstPresent(properties.location?.address, properties.address),
    // Zeroed coordinates come from partial exports, not from places on the equator
    coordinates: toCoordinates(nonZero(latitude), nonZero(longitude)),
    place_id: properties.place_id,
    notes: properties.comment,
    date_saved: properties.date,
    url: firstPresent(properties.google_maps_url, properties.url),
    list_id: listId,
    categories: properties.categories,
    rating: properties.rating,
  });
}

function nonZero(value: number | undefined): number | undefined {
  return value ? value : undefined;
}
