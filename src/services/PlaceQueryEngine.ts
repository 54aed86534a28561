import type { Coordinates, PlaceList, PlaceSnapshot, PlaceStats, SavedPlace } from '../types/Place';
import { placeCoordinates, planarDistanceKm } from '../utils/placeUtils';
import { levenshteinRatio, type SimilarityMeasure } from '../utils/similarity';

/** Fuzzy name matches must score above this to be kept */
export const FUZZY_THRESHOLD = 0.5;

/**
 * Score given to a name that only shares a literal word with the query.
 * Equal to the threshold, so real fuzzy matches always rank above it.
 */
export const WORD_MATCH_SCORE = 0.5;

/** Minimum ratio for findPin to accept a fuzzy name match */
export const LOOKUP_THRESHOLD = 0.6;

const MAX_SUGGESTIONS = 3;

export interface PinLookup {
  pin?: SavedPlace;
  /** Names sharing a word with the query, filled only when nothing matched */
  suggestions: string[];
}

interface ScoredPlace {
  place: SavedPlace;
  score: number;
}

/**
 * Read-only queries over one snapshot.
 * Every method is a linear scan; nothing here mutates the snapshot.
 */
export class PlaceQueryEngine {
  constructor(
    private readonly snapshot: PlaceSnapshot,
    private readonly similarity: SimilarityMeasure = levenshteinRatio,
  ) {}

  get version(): number {
    return this.snapshot.version;
  }

  getAllPins(): readonly SavedPlace[] {
    return this.snapshot.places;
  }

  getAllLists(): readonly PlaceList[] {
    return this.snapshot.lists;
  }

  getListNames(): string[] {
    return this.snapshot.lists.map((list) => list.name);
  }

  getPinsByList(name: string): SavedPlace[] {
    return this.snapshot.places.filter((place) => place.list_id === name);
  }

  getPinByPlaceId(placeId: string): SavedPlace | undefined {
    return this.snapshot.places.find((place) => place.place_id === placeId);
  }

  getPinByExactName(name: string): SavedPlace | undefined {
    return this.snapshot.places.find((place) => place.name === name);
  }

  /**
   * Substring matches first, in source order, then fuzzy name matches by
   * descending score. Fuzzy scoring only runs when the substring pass came
   * up short of `limit`.
   */
  searchPlaces(query: string, limit: number): SavedPlace[] {
    const needle = query.toLowerCase();
    const exact: SavedPlace[] = [];
    const matched = new Set<SavedPlace>();

    for (const place of this.snapshot.places) {
      if (searchableText(place).includes(needle)) {
        exact.push(place);
        matched.add(place);
        if (exact.length >= limit) {
          return exact;
        }
      }
    }

    const words = needle.split(/\s+/).filter((word) => word.length > 0);
    const fuzzy: ScoredPlace[] = [];

    for (const place of this.snapshot.places) {
      if (matched.has(place)) continue;

      const name = place.name.toLowerCase();
      const ratio = this.similarity(needle, name);
      if (ratio > FUZZY_THRESHOLD) {
        fuzzy.push({ place, score: ratio });
      } else if (words.some((word) => name.includes(word))) {
        fuzzy.push({ place, score: WORD_MATCH_SCORE });
      }
    }

    fuzzy.sort((a, b) => b.score - a.score);

    return [...exact, ...fuzzy.map((entry) => entry.place)].slice(0, limit);
  }

  /**
   * Places within `radiusKm` of a point, boundary included.
   * Uses the planar approximation from planarDistanceKm.
   */
  getPlacesNear(latitude: number, longitude: number, radiusKm: number): SavedPlace[] {
    const center: Coordinates = { latitude, longitude };
    return this.snapshot.places.filter((place) => {
      const coordinates = placeCoordinates(place);
      return coordinates !== null && planarDistanceKm(coordinates, center) <= radiusKm;
    });
  }

  getPlacesByCategory(category: string): SavedPlace[] {
    const wanted = category.toLowerCase();
    return this.snapshot.places.filter((place) =>
      (place.categories ?? []).some((tag) => tag.toLowerCase() === wanted)
    );
  }

  getAllCategories(): string[] {
    const categories = new Set<string>();
    for (const place of this.snapshot.places) {
      for (const tag of place.categories ?? []) {
        categories.add(tag);
      }
    }
    return [...categories].sort();
  }

  /**
   * Resolve a name typed by a person: substring on the name first, then the
   * closest fuzzy name, then suggestions sharing a word with the query
   */
  findPin(name: string): PinLookup {
    const needle = name.trim().toLowerCase();
    const places = this.snapshot.places;

    const contained = places.find((place) => place.name.toLowerCase().includes(needle));
    if (contained) {
      return { pin: contained, suggestions: [] };
    }

    let best: ScoredPlace | undefined;
    for (const place of places) {
      const score = this.similarity(needle, place.name.toLowerCase());
      if (score > LOOKUP_THRESHOLD && (!best || score > best.score)) {
        best = { place, score };
      }
    }
    if (best) {
      return { pin: best.place, suggestions: [] };
    }

    const words = needle.split(/\s+/).filter((word) => word.length > 0);
    const suggestions = places
      .filter((place) => words.some((word) => place.name.toLowerCase().includes(word)))
      .slice(0, MAX_SUGGESTIONS)
      .map((place) => place.name);

    return { suggestions };
  }

  getStats(): PlaceStats {
    const places = this.snapshot.places;
    return {
      totalPins: places.length,
      totalLists: this.snapshot.lists.length,
      totalCategories: this.getAllCategories().length,
      pinsWithCoordinates: places.filter((place) => placeCoordinates(place) !== null).length,
      pinsWithNotes: places.filter((place) => Boolean(place.notes)).length,
      pinsWithRatings: places.filter((place) => place.rating !== undefined).length,
    };
  }
}

function searchableText(place: SavedPlace): string {
  return [place.name, place.address, place.notes]
    .filter((part): part is string => Boolean(part))
    .join(' ')
    .toLowerCase();
}
