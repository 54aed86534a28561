import type { LoadWarningKind } from '../types/Place';

/**
 * Raised for a single export file that could not be turned into places.
 * The loader records it as a warning and moves on to the next file.
 */
export class PlaceImportError extends Error {
  readonly kind: LoadWarningKind;
  readonly file: string;

  constructor(kind: LoadWarningKind, file: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlaceImportError';
    this.kind = kind;
    this.file = file;
  }
}

/**
 * Raised when a document matches none of the supported export shapes
 */
export class UnrecognizedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnrecognizedFormatError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
