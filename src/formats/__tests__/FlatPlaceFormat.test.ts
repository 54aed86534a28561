import { describe, it, expect } from 'vitest';
import { convertFlatPlaces, detectFlatPlaces, explainFlatPlaceMismatch } from '../FlatPlaceFormat';
import { convertFeatureCollection, detectFeatureCollection } from '../FeatureCollectionFormat';

function convert(value: unknown, listId = 'saved') {
  const document = detectFlatPlaces(value);
  if (!document) throw new Error('expected flat places');
  return convertFlatPlaces(document, listId);
}

describe('FlatPlaceFormat', () => {
  describe('detectFlatPlaces', () => {
    it('should accept a single place object', () => {
      expect(detectFlatPlaces({ name: 'Solo' })).not.toBeNull();
    });

    it('should accept an array of places', () => {
      expect(detectFlatPlaces([{ name: 'A' }, { title: 'B' }])).not.toBeNull();
    });

    it('should reject scalars and arrays of scalars', () => {
      expect(detectFlatPlaces(42)).toBeNull();
      expect(detectFlatPlaces('place')).toBeNull();
      expect(detectFlatPlaces(null)).toBeNull();
      expect(detectFlatPlaces([1, 2])).toBeNull();
    });

    it('should reject fields of the wrong type', () => {
      expect(detectFlatPlaces({ name: 5 })).toBeNull();
    });
  });

  describe('explainFlatPlaceMismatch', () => {
    it('should name the first failing field', () => {
      expect(explainFlatPlaceMismatch({ location: { latitudeE7: 'north' } })).toMatch(/^\(root\): /);
    });
  });

  describe('convertFlatPlaces', () => {
    it('should decode the nested location', () => {
      const [place] = convert({
        name: 'Blue Bottle',
        location: { address: '1 Ferry Building', latitudeE7: 377955000, longitudeE7: -1223937000 },
        placeId: 'place-7',
        comment: 'Try the pour-over',
        date: '2023-05-01T08:00:00Z',
        url: 'https://maps.example.com/bb',
      });

      expect(place.name).toBe('Blue Bottle');
      expect(place.address).toBe('1 Ferry Building');
      expect(place.latitude).toBeCloseTo(37.7955, 7);
      expect(place.longitude).toBeCloseTo(-122.3937, 7);
      expect(place.place_id).toBe('place-7');
      expect(place.notes).toBe('Try the pour-over');
      expect(place.date_saved).toBe('2023-05-01T08:00:00Z');
      expect(place.url).toBe('https://maps.example.com/bb');
      expect(place.list_id).toBe('saved');
    });

    it('should fall back from name to title to the placeholder', () => {
      const places = convert([{ name: 'Named', title: 'Titled' }, { title: 'Titled' }, {}]);
      expect(places.map((p) => p.name)).toEqual(['Named', 'Titled', 'Unknown']);
    });

    it('should fall back to the top-level address', () => {
      const [place] = convert({ name: 'A', address: '2 Side St' });
      expect(place.address).toBe('2 Side St');
    });

    it('should fall back from comment to note', () => {
      const places = convert([{ comment: 'c', note: 'n' }, { note: 'n' }]);
      expect(places.map((p) => p.notes)).toEqual(['c', 'n']);
    });

    it('should leave coordinates unset for a zero fixed-point value', () => {
      const [place] = convert({ name: 'A', location: { latitudeE7: 0, longitudeE7: 1000000 } });
      expect(place).toEqual({ name: 'A', list_id: 'saved' });
    });

    it('should load a serialized place back with the same fields', () => {
      const collection = detectFeatureCollection({
        features: [
          {
            geometry: { coordinates: [-0.1278, 51.5074] },
            properties: {
              name: 'Borough Market',
              address: '8 Southwark St, London',
              url: 'https://maps.example.com/borough',
              comment: 'Saturday mornings',
              categories: ['Market'],
            },
          },
        ],
      });
      if (!collection) throw new Error('expected a feature collection');
      const [original] = convertFeatureCollection(collection, 'london');

      const serialized: unknown = JSON.parse(JSON.stringify(original));
      const [restored] = convert(serialized, 'london');

      expect(restored).toEqual(original);
    });
  });
});
