import type { SavedPlace } from '../types/Place';
import {
  convertFeatureCollection,
  detectFeatureCollection,
  type FeatureCollectionDocument,
} from '../formats/FeatureCollectionFormat';
import { convertNamedList, detectNamedList, type NamedListDocument } from '../formats/NamedListFormat';
import {
  convertFlatPlaces,
  detectFlatPlaces,
  explainFlatPlaceMismatch,
  type FlatPlaceDocument,
} from '../formats/FlatPlaceFormat';
import { UnrecognizedFormatError } from '../utils/errors';

/**
 * Export format detection
 *
 * Formats are tried in a fixed order and the first structural match wins.
 * Each detector validates the whole document before any conversion happens,
 * so a shape that only partly matches falls through to the next one.
 */

export type PlaceFormatName = 'feature-collection' | 'named-list' | 'flat-place';

export type DetectedDocument =
  | { format: 'feature-collection'; document: FeatureCollectionDocument }
  | { format: 'named-list'; document: NamedListDocument }
  | { format: 'flat-place'; document: FlatPlaceDocument };

type Detector = (value: unknown) => DetectedDocument | null;

const DETECTORS: readonly Detector[] = [
  (value) => {
    const document = detectFeatureCollection(value);
    return document ? { format: 'feature-collection', document } : null;
  },
  (value) => {
    const document = detectNamedList(value);
    return document ? { format: 'named-list', document } : null;
  },
  (value) => {
    const document = detectFlatPlaces(value);
    return document ? { format: 'flat-place', document } : null;
  },
];

export function detectFormat(value: unknown): DetectedDocument | null {
  for (const detect of DETECTORS) {
    const detected = detect(value);
    if (detected) return detected;
  }
  return null;
}

export function convertDocument(detected: DetectedDocument, listId: string): SavedPlace[] {
  switch (detected.format) {
    case 'feature-collection':
      return convertFeatureCollection(detected.document, listId);
    case 'named-list':
      return convertNamedList(detected.document, listId);
    case 'flat-place':
      return convertFlatPlaces(detected.document, listId);
  }
}

export interface ParsedPlaces {
  format: PlaceFormatName;
  places: SavedPlace[];
}

/**
 * Detect the format of a parsed JSON value and convert it.
 * @throws UnrecognizedFormatError when no format accepts the value
 */
export function parsePlaces(value: unknown, listId: string): ParsedPlaces {
  const detected = detectFormat(value);
  if (!detected) {
    throw new UnrecognizedFormatError(
      `Document matches no supported export format (${explainFlatPlaceMismatch(value)})`
    );
  }
  return {
    format: detected.format,
    places: convertDocument(detected, listId),
  };
}
