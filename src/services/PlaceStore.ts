import { EventEmitter } from 'node:events';
import type { LoadResult, PlaceSnapshot, SavedPlace } from '../types/Place';
import { PlaceLoader } from './PlaceLoader';
import { PlaceQueryEngine } from './PlaceQueryEngine';
import type { AddressGeocoder } from './PlaceGeocoder';
import { discoverExportFiles } from '../utils/fileDiscovery';
import { placeCoordinates } from '../utils/placeUtils';
import type { SimilarityMeasure } from '../utils/similarity';
import { createLogger } from '../utils/logger';

export interface SnapshotUpdate {
  version: number;
  placeCount: number;
  listCount: number;
  warningCount: number;
}

export interface PlaceStoreOptions {
  /** Directory or file that reload() rediscovers export files from */
  dataPath?: string;
  loader?: PlaceLoader;
  /** Resolves a data path into export files (default: discoverExportFiles) */
  discover?: (dataPath: string) => string[];
  similarity?: SimilarityMeasure;
}

export interface EnrichmentSummary {
  attempted: number;
  enriched: number;
}

/**
 * Holds the current snapshot of saved places.
 * Every load builds a complete new snapshot and swaps the reference, so a
 * query engine handed out earlier keeps reading its own snapshot.
 * Emits 'snapshot-updated' after each swap.
 */
export class PlaceStore extends EventEmitter {
  private snapshot: PlaceSnapshot = freezeSnapshot(0, { places: [], lists: [], warnings: [] });
  private readonly dataPath?: string;
  private readonly loader: PlaceLoader;
  private readonly discover: (dataPath: string) => string[];
  private readonly similarity?: SimilarityMeasure;
  private readonly logger = createLogger({ component: 'PlaceStore' });

  constructor(options: PlaceStoreOptions = {}) {
    super();
    this.dataPath = options.dataPath;
    this.loader = options.loader ?? new PlaceLoader();
    this.discover = options.discover ?? discoverExportFiles;
    this.similarity = options.similarity;
  }

  /**
   * Load the given export files into a new snapshot
   */
  load(filePaths: readonly string[]): PlaceSnapshot {
    const result = this.loader.load(filePaths);
    return this.swap(result);
  }

  /**
   * Rediscover export files under the configured data path and load them
   */
  reload(): PlaceSnapshot {
    if (!this.dataPath) {
      throw new Error('PlaceStore has no data path to reload from');
    }
    return this.load(this.discover(this.dataPath));
  }

  /**
   * Query engine bound to the snapshot current at call time
   */
  query(): PlaceQueryEngine {
    return new PlaceQueryEngine(this.snapshot, this.similarity);
  }

  getSnapshot(): PlaceSnapshot {
    return this.snapshot;
  }

  /**
   * Geocode the address of every place that has one but no coordinates,
   * then swap in a snapshot carrying the results. Places the geocoder cannot
   * resolve stay as they were.
   */
  async enrich(geocoder: AddressGeocoder): Promise<EnrichmentSummary> {
    const base = this.snapshot;
    const candidates = base.places.filter((place) => place.address && placeCoordinates(place) === null);

    if (candidates.length === 0) {
      this.logger.debug('No places need geocoding');
      return { attempted: 0, enriched: 0 };
    }

    this.logger.info({ count: candidates.length }, `Geocoding ${candidates.length} places without coordinates`);

    const byAddress = await geocoder.geocodeAll(candidates.flatMap((place) => (place.address ? [place.address] : [])));

    const resolved = new Map<SavedPlace, SavedPlace>();
    for (const place of candidates) {
      const result = place.address ? byAddress.get(place.address) : undefined;
      if (result) {
        resolved.set(place, { ...place, latitude: result.latitude, longitude: result.longitude });
      }
    }

    if (this.snapshot !== base) {
      this.logger.warn('Snapshot replaced while geocoding, discarding enrichment');
      return { attempted: candidates.length, enriched: 0 };
    }

    if (resolved.size > 0) {
      this.swap({
        places: base.places.map((place) => resolved.get(place) ?? place),
        lists: [...base.lists],
        warnings: [...base.warnings],
      });
    }

    this.logger.info({ attempted: candidates.length, enriched: resolved.size }, 'Geocoding finished');
    return { attempted: candidates.length, enriched: resolved.size };
  }

  private swap(result: LoadResult): PlaceSnapshot {
    const next = freezeSnapshot(this.snapshot.version + 1, result);
    this.snapshot = next;

    const update: SnapshotUpdate = {
      version: next.version,
      placeCount: next.places.length,
      listCount: next.lists.length,
      warningCount: next.warnings.length,
    };
    this.emit('snapshot-updated', update);
    this.logger.info(update, `Snapshot v${next.version} ready`);

    return next;
  }
}

function freezeSnapshot(version: number, result: LoadResult): PlaceSnapshot {
  return Object.freeze({
    version,
    loadedAt: new Date(),
    places: Object.freeze(result.places.map((place) => Object.freeze(place))),
    lists: Object.freeze(result.lists.map((list) => Object.freeze(list))),
    warnings: Object.freeze([...result.warnings]),
  });
}
