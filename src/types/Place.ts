/**
 * Core types for saved places
 * These are export-format agnostic: every supported input shape is
 * normalized into a SavedPlace before anything else sees it
 */

/** Name used when an export entry carries no usable name */
export const PLACEHOLDER_NAME = 'Unknown';

/** The only list kind produced today */
export const DEFAULT_LIST_KIND = 'custom';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface SavedPlace {
  name: string;
  address?: string;
  /** Set together with longitude, never alone */
  latitude?: number;
  longitude?: number;
  /** External identifier, may repeat within a collection */
  place_id?: string;
  notes?: string;
  /** Timestamp as the export wrote it */
  date_saved?: string;
  url?: string;
  list_id: string;
  categories?: string[];
  rating?: number;
}

export interface PlaceList {
  /** Base name of the source file, without extension */
  name: string;
  kind: string;
}

export type LoadWarningKind = 'io' | 'parse' | 'schema';

export interface LoadWarning {
  file: string;
  listId: string;
  kind: LoadWarningKind;
  message: string;
}

export interface LoadResult {
  places: SavedPlace[];
  lists: PlaceList[];
  warnings: LoadWarning[];
}

/**
 * One immutable build of the collection.
 * Replaced wholesale on reload, never mutated.
 */
export interface PlaceSnapshot {
  version: number;
  loadedAt: Date;
  places: readonly SavedPlace[];
  lists: readonly PlaceList[];
  warnings: readonly LoadWarning[];
}

export interface PlaceStats {
  totalPins: number;
  totalLists: number;
  totalCategories: number;
  pinsWithCoordinates: number;
  pinsWithNotes: number;
  pinsWithRatings: number;
}
