import { describe, it, expect, vi } from 'vitest';
import { PlaceStore, type SnapshotUpdate } from '../PlaceStore';
import { PlaceLoader } from '../PlaceLoader';
import type { AddressGeocoder, GeocodedAddress } from '../PlaceGeocoder';

const files: Record<string, string> = {
  '/data/favs.json': JSON.stringify([
    { name: 'Corner Cafe', address: '1 Main St' },
    { name: 'Book Nook', address: '2 Side St', latitude: 40.73, longitude: -73.99 },
    { name: 'Mystery Spot' },
  ]),
  '/data/travel.json': JSON.stringify({ list: { listItems: [{ title: 'Harbor View' }] } }),
};

function createStore(dataPath?: string, discover?: (dataPath: string) => string[]): PlaceStore {
  const loader = new PlaceLoader({
    readFile: (filePath) => {
      const content = files[filePath];
      if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
      return content;
    },
  });
  return new PlaceStore({ dataPath, loader, discover });
}

class FakeGeocoder implements AddressGeocoder {
  readonly batches: string[][] = [];

  constructor(private readonly results: Record<string, GeocodedAddress>) {}

  async geocodeAll(addresses: readonly string[]): Promise<Map<string, GeocodedAddress>> {
    this.batches.push([...addresses]);
    const resolved = new Map<string, GeocodedAddress>();
    for (const address of addresses) {
      const result = this.results[address];
      if (result) resolved.set(address, result);
    }
    return resolved;
  }
}

describe('PlaceStore', () => {
  it('should start with an empty snapshot at version 0', () => {
    const store = createStore();
    expect(store.getSnapshot().version).toBe(0);
    expect(store.query().getAllPins()).toEqual([]);
  });

  it('should swap in a new frozen snapshot on load', () => {
    const store = createStore();

    const snapshot = store.load(['/data/favs.json']);

    expect(snapshot.version).toBe(1);
    expect(snapshot.places).toHaveLength(3);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.places)).toBe(true);
    expect(store.getSnapshot()).toBe(snapshot);
  });

  it('should keep earlier query engines on their own snapshot', () => {
    const store = createStore();
    store.load(['/data/favs.json']);
    const before = store.query();

    store.load(['/data/travel.json']);
    const after = store.query();

    expect(before.version).toBe(1);
    expect(before.getAllPins().map((p) => p.name)).toEqual(['Corner Cafe', 'Book Nook', 'Mystery Spot']);
    expect(after.version).toBe(2);
    expect(after.getAllPins().map((p) => p.name)).toEqual(['Harbor View']);
  });

  it('should emit snapshot-updated after each swap', () => {
    const store = createStore();
    const listener = vi.fn<(update: SnapshotUpdate) => void>();
    store.on('snapshot-updated', listener);

    store.load(['/data/favs.json', '/data/missing.json']);

    expect(listener).toHaveBeenCalledWith({ version: 1, placeCount: 3, listCount: 2, warningCount: 1 });
  });

  describe('reload', () => {
    it('should rediscover files from the data path', () => {
      const discover = vi.fn(() => ['/data/travel.json', '/data/favs.json']);
      const store = createStore('/data', discover);

      const snapshot = store.reload();

      expect(discover).toHaveBeenCalledWith('/data');
      expect(snapshot.lists.map((l) => l.name)).toEqual(['travel', 'favs']);
    });

    it('should throw without a data path', () => {
      expect(() => createStore().reload()).toThrow('PlaceStore has no data path to reload from');
    });
  });

  describe('enrich', () => {
    it('should geocode only places with an address and no coordinates', async () => {
      const store = createStore();
      store.load(['/data/favs.json']);
      const geocoder = new FakeGeocoder({ '1 Main St': { latitude: 40.7128, longitude: -74.006 } });

      const summary = await store.enrich(geocoder);

      expect(summary).toEqual({ attempted: 1, enriched: 1 });
      expect(geocoder.batches).toEqual([['1 Main St']]);
      expect(store.getSnapshot().version).toBe(2);
      expect(store.query().getPinByExactName('Corner Cafe')).toEqual({
        name: 'Corner Cafe',
        address: '1 Main St',
        latitude: 40.7128,
        longitude: -74.006,
        list_id: 'favs',
      });
      expect(store.query().getPinByExactName('Book Nook')?.latitude).toBe(40.73);
    });

    it('should leave the snapshot alone when nothing resolves', async () => {
      const store = createStore();
      store.load(['/data/favs.json']);

      const summary = await store.enrich(new FakeGeocoder({}));

      expect(summary).toEqual({ attempted: 1, enriched: 0 });
      expect(store.getSnapshot().version).toBe(1);
      expect(store.query().getPinByExactName('Corner Cafe')?.latitude).toBeUndefined();
    });
  });
});
