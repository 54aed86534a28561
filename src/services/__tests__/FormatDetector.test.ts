import { describe, it, expect } from 'vitest';
import { detectFormat, parsePlaces } from '../FormatDetector';
import { UnrecognizedFormatError } from '../../utils/errors';

describe('FormatDetector', () => {
  describe('detectFormat', () => {
    it('should detect a feature collection', () => {
      const value = { features: [{ geometry: { coordinates: [1, 2] }, properties: { name: 'A' } }] };
      expect(detectFormat(value)?.format).toBe('feature-collection');
    });

    it('should detect a named list', () => {
      expect(detectFormat({ list: { listItems: [{ title: 'A' }] } })?.format).toBe('named-list');
    });

    it('should detect flat places for objects and arrays', () => {
      expect(detectFormat({ name: 'A' })?.format).toBe('flat-place');
      expect(detectFormat([{ name: 'A' }])?.format).toBe('flat-place');
    });

    it('should prefer the feature collection when several keys are present', () => {
      const value = {
        features: [{ geometry: { coordinates: [1, 2] }, properties: {} }],
        list: { listItems: [] },
      };
      expect(detectFormat(value)?.format).toBe('feature-collection');
    });

    it('should fall through to the next format when validation fails', () => {
      expect(detectFormat({ features: 'broken', list: { listItems: [] } })?.format).toBe('named-list');
      expect(detectFormat({ list: 'broken', title: 'Fallback' })?.format).toBe('flat-place');
    });

    it('should return null when nothing matches', () => {
      expect(detectFormat(42)).toBeNull();
    });
  });

  describe('parsePlaces', () => {
    it('should convert with the detected format', () => {
      const result = parsePlaces({ features: 'broken', name: 'Fallback' }, 'misc');
      expect(result).toEqual({
        format: 'flat-place',
        places: [{ name: 'Fallback', list_id: 'misc' }],
      });
    });

    it('should throw when no format matches', () => {
      expect(() => parsePlaces(42, 'numbers')).toThrow(UnrecognizedFormatError);
      expect(() => parsePlaces([1, 2], 'numbers')).toThrow(UnrecognizedFormatError);
      expect(() => parsePlaces({ name: 5 }, 'numbers')).toThrow(/matches no supported export format/);
    });
  });
});
