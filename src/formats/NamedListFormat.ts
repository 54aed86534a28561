import { z } from 'zod';
import type { SavedPlace } from '../types/Place';
import { createSavedPlace, decodeE7, toCoordinates } from '../utils/placeUtils';

/**
 * Named list export
 * A single `list` object whose items wrap an optional `place` (E7
 * coordinates, one-line address, opaque id) and an optional `viewer` link.
 * This shape never carries notes.
 */

// =============================================================================
// Schema
// =============================================================================

const ListPlaceSchema = z.object({
  featureId: z.object({
    cellId: z.string().nullish(),
    fprint: z.string().nullish(),
  }).nullish(),
  latLng: z.object({
    latE7: z.number().int().nullish(),
    lngE7: z.number().int().nullish(),
  }).nullish(),
  query: z.string().nullish(),
  singleLineAddress: z.string().nullish(),
  mid: z.string().nullish(),
});

const ListItemSchema = z.object({
  place: ListPlaceSchema.nullish(),
  title: z.string().nullish(),
  createTime: z.string().nullish(),
  updateTime: z.string().nullish(),
  viewer: z.object({
    url: z.string().nullish(),
  }).nullish(),
});

export const NamedListSchema = z.object({
  list: z.object({
    displayName: z.string().nullish(),
    listItems: z.array(ListItemSchema).default([]),
  }),
});

export type ListItem = z.infer<typeof ListItemSchema>;
export type NamedListDocument = z.infer<typeof NamedListSchema>;

// =============================================================================
// Detection & conversion
// =============================================================================

export function detectNamedList(value: unknown): NamedListDocument | null {
  if (typeof value !== 'object' || value === null || !('list' in value)) {
    return null;
  }
  const parsed = NamedListSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function convertNamedList(document: NamedListDocument, listId: string): SavedPlace[] {
  return document.list.listItems.map((item) => transformItem(item, listId));
}

function transformItem(item: ListItem, listId: string): SavedPlace {
  const { place, viewer } = item;

  return createSavedPlace({
    name: item.title,
    address: place?.singleLineAddress,
    coordinates: toCoordinates(decodeE7(place?.latLng?.latE7), decodeE7(place?.latLng?.lngE7)),
    place_id: place?.mid,
    date_saved: item.createTime,
    url: viewer?.url,
    list_id: listId,
  });
}
