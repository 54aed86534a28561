import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { PlaceLoader, listIdFromPath, type FileReader } from '../PlaceLoader';
import { discoverExportFiles } from '../../utils/fileDiscovery';

const featureCollection = JSON.stringify({
  type: 'FeatureCollection',
  features: [
    { geometry: { coordinates: [-74.006, 40.7128] }, properties: { name: 'Corner Cafe' } },
    { geometry: { coordinates: [-73.99, 40.73] }, properties: { name: 'Book Nook' } },
  ],
});

const namedList = JSON.stringify({
  list: { listItems: [{ title: 'Harbor View' }] },
});

function readerFor(files: Record<string, string>): FileReader {
  return (filePath) => {
    const content = files[filePath];
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return content;
  };
}

describe('PlaceLoader', () => {
  describe('listIdFromPath', () => {
    it('should use the base name without extension', () => {
      expect(listIdFromPath('/exports/Saved/Want to go.json')).toBe('Want to go');
      expect(listIdFromPath('favs.json')).toBe('favs');
    });
  });

  describe('load', () => {
    it('should concatenate places in file order then entry order', () => {
      const loader = new PlaceLoader({
        readFile: readerFor({ '/data/favs.json': featureCollection, '/data/travel.json': namedList }),
      });

      const result = loader.load(['/data/travel.json', '/data/favs.json']);

      expect(result.places.map((p) => [p.list_id, p.name])).toEqual([
        ['travel', 'Harbor View'],
        ['favs', 'Corner Cafe'],
        ['favs', 'Book Nook'],
      ]);
      expect(result.lists).toEqual([
        { name: 'travel', kind: 'custom' },
        { name: 'favs', kind: 'custom' },
      ]);
      expect(result.warnings).toEqual([]);
    });

    it('should skip bad files and still create their lists', () => {
      const loader = new PlaceLoader({
        readFile: readerFor({
          '/data/favs.json': featureCollection,
          '/data/broken.json': '{ not json',
          '/data/number.json': '42',
        }),
      });

      const result = loader.load([
        '/data/broken.json',
        '/data/missing.json',
        '/data/number.json',
        '/data/favs.json',
      ]);

      expect(result.places).toHaveLength(2);
      expect(result.lists.map((l) => l.name)).toEqual(['broken', 'missing', 'number', 'favs']);
      expect(result.warnings.map((w) => [w.listId, w.kind])).toEqual([
        ['broken', 'parse'],
        ['missing', 'io'],
        ['number', 'schema'],
      ]);
      expect(result.warnings[1].file).toBe('/data/missing.json');
      expect(result.warnings[1].message).toContain('ENOENT');
    });

    it('should keep a list for a file with zero entries', () => {
      const loader = new PlaceLoader({ readFile: readerFor({ '/data/empty.json': '[]' }) });

      const result = loader.load(['/data/empty.json']);

      expect(result.places).toEqual([]);
      expect(result.lists).toEqual([{ name: 'empty', kind: 'custom' }]);
      expect(result.warnings).toEqual([]);
    });

    it('should return empty results for no files', () => {
      expect(new PlaceLoader().load([])).toEqual({ places: [], lists: [], warnings: [] });
    });
  });

  describe('loading from disk', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('should load the well-formed file and list both files', () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'places-loader-'));
      fs.writeFileSync(path.join(dir, 'good.json'), featureCollection);
      fs.writeFileSync(path.join(dir, 'bad.json'), 'this is not json');

      const result = new PlaceLoader().load(discoverExportFiles(dir));

      expect(result.places.map((p) => p.name)).toEqual(['Corner Cafe', 'Book Nook']);
      expect(result.lists.map((l) => l.name)).toEqual(['bad', 'good']);
      expect(result.places.filter((p) => p.list_id === 'bad')).toEqual([]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].kind).toBe('parse');
    });
  });
});
