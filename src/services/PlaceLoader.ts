import fs from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_LIST_KIND,
  type LoadResult,
  type LoadWarning,
  type PlaceList,
  type SavedPlace,
} from '../types/Place';
import { parsePlaces } from './FormatDetector';
import { PlaceImportError, UnrecognizedFormatError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * Reads a file synchronously and returns its text
 */
export type FileReader = (filePath: string) => string;

export interface PlaceLoaderOptions {
  /** Defaults to a UTF-8 fs.readFileSync */
  readFile?: FileReader;
}

const readUtf8: FileReader = (filePath) => fs.readFileSync(filePath, 'utf-8');

/**
 * Derive a list id from a file path: its base name without extension
 */
export function listIdFromPath(filePath: string): string {
  return path.parse(filePath).name;
}

/**
 * Loads export files into places and lists.
 * One bad file never aborts the load: its failure becomes a warning and its
 * list is still created, empty.
 */
export class PlaceLoader {
  private readonly readFile: FileReader;
  private readonly logger = createLogger({ component: 'PlaceLoader' });

  constructor(options: PlaceLoaderOptions = {}) {
    this.readFile = options.readFile ?? readUtf8;
  }

  load(filePaths: readonly string[]): LoadResult {
    const places: SavedPlace[] = [];
    const lists: PlaceList[] = [];
    const warnings: LoadWarning[] = [];

    this.logger.info({ fileCount: filePaths.length }, `Loading ${filePaths.length} export files`);

    for (const filePath of filePaths) {
      const listId = listIdFromPath(filePath);
      lists.push({ name: listId, kind: DEFAULT_LIST_KIND });

      try {
        const loaded = this.loadFile(filePath, listId);
        places.push(...loaded);
      } catch (error) {
        const warning = toWarning(error, filePath, listId);
        warnings.push(warning);
        this.logger.warn({ file: filePath, kind: warning.kind, error: warning.message }, 'Skipping export file');
      }
    }

    if (places.length === 0) {
      this.logger.warn({ fileCount: filePaths.length }, 'No places loaded');
    } else {
      this.logger.info({
        places: places.length,
        lists: lists.length,
        warnings: warnings.length,
      }, `Loaded ${places.length} places from ${lists.length} files`);
    }

    return { places, lists, warnings };
  }

  /**
   * @throws PlaceImportError describing which stage failed
   */
  private loadFile(filePath: string, listId: string): SavedPlace[] {
    let text: string;
    try {
      text = this.readFile(filePath);
    } catch (error) {
      throw new PlaceImportError('io', filePath, `Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new PlaceImportError('parse', filePath, `Invalid JSON in ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const { format, places } = parsePlaces(value, listId);
      this.logger.debug({ file: filePath, format, count: places.length }, 'Parsed export file');
      return places;
    } catch (error) {
      if (error instanceof UnrecognizedFormatError) {
        throw new PlaceImportError('schema', filePath, `${filePath}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}

function toWarning(error: unknown, filePath: string, listId: string): LoadWarning {
  if (error instanceof PlaceImportError) {
    return { file: filePath, listId, kind: error.kind, message: error.message };
  }
  return { file: filePath, listId, kind: 'schema', message: errorMessage(error) };
}
