/**
 * COD-01: Document Serialization and Collation
 */

import { describe, it, expect } from 'vitest';
import { InvalidDocumentError, storage } from '@user-store/shared';
import type { DocumentMap } from '@user-store/shared-types';

describe('COD-01: Document Serialization and Collation', () => {
  describe('toStoredDocument', () => {
    it('should keep JSON values as they are', () => {
      const value = { id: 'u1', n: 1.5, ok: false, none: null, list: [1, 'a', { b: true }], map: { c: [] } };

      expect(storage.toStoredDocument(value)).toEqual(value);
    });

    it('should drop undefined fields and null undefined array elements', () => {
      expect(storage.toStoredDocument({ a: undefined, b: [undefined, 1] })).toEqual({ b: [null, 1] });
    });

    it('should store dates as ISO strings', () => {
      expect(storage.toStoredDocument({ at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) })).toEqual({
        at: '2024-01-02T03:04:05.000Z',
      });
    });

    it('should reject values that cannot be stored', () => {
      expect(() => storage.toStoredDocument({ n: Number.NaN })).toThrow('Document cannot be stored: n is not a finite number');
      expect(() => storage.toStoredDocument({ big: 1n })).toThrow('Document cannot be stored: big has unsupported type bigint');
      expect(() => storage.toStoredDocument({ when: new Date('not a date') })).toThrow(InvalidDocumentError);
      expect(() => storage.toStoredDocument(['a'])).toThrow('Document cannot be stored: <root> must be an object');
    });

    it('should reject field names the filter syntax reserves', () => {
      expect(() => storage.toStoredDocument({ profile: { $set: 1 } })).toThrow(
        'Document cannot be stored: profile.$set field names must not start with "$"'
      );
      expect(() => storage.toStoredDocument({ 'a.b': 1 })).toThrow(
        'Document cannot be stored: a.b field names must not contain "."'
      );
    });
  });

  describe('path access', () => {
    const document: DocumentMap = { a: { b: { c: 1 } }, list: [{ x: 1 }, { x: 2 }, { y: 3 }] };

    it('should resolve paths through maps only', () => {
      expect(storage.resolvePath(document, 'a.b.c')).toBe(1);
      expect(storage.resolvePath(document, 'a.z')).toBeUndefined();
      expect(storage.resolvePath(document, 'list.x')).toBeUndefined();
    });

    it('should collect values through arrays of maps', () => {
      expect(storage.collectPathValues(document, ['list', 'x'])).toEqual([1, 2]);
      expect(storage.collectPathValues(document, ['missing'])).toEqual([]);
    });
  });

  describe('collation', () => {
    it('should leave strings untouched without a collation', () => {
      expect(storage.collationKey('Ärger')).toBe('Ärger');
    });

    it('should compare base letters only at strength 1', () => {
      expect(storage.collationKey('Ärger', { locale: 'de', strength: 1 })).toBe('arger');
    });

    it('should ignore case but not accents at strength 2', () => {
      expect(storage.collationKey('Ärger', { locale: 'de', strength: 2 })).toBe('ärger');
    });

    it('should compare exactly from strength 3 and by default', () => {
      expect(storage.collationKey('Ärger', { locale: 'de', strength: 3 })).toBe('Ärger');
      expect(storage.collationKey('Ärger', { locale: 'de' })).toBe('Ärger');
    });

    it('should compose decomposed accents at strength 2', () => {
      expect(storage.valuesEqual('e\u0301', '\u00e9', { locale: 'fr', strength: 2 })).toBe(true);
      expect(storage.valuesEqual('e\u0301', '\u00e9')).toBe(false);
    });

    it('should compare maps regardless of field order', () => {
      expect(storage.valuesEqual({ a: 1, b: [1, { c: 'X' }] }, { b: [1, { c: 'x' }], a: 1 }, { locale: 'en', strength: 2 })).toBe(true);
      expect(storage.valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
      expect(storage.valuesEqual([1, 2], [2, 1])).toBe(false);
    });

    it('should treat an omitted strength as strength 3', () => {
      expect(storage.collationsEqual({ locale: 'en' }, { locale: 'en', strength: 3 })).toBe(true);
      expect(storage.collationsEqual({ locale: 'en', strength: 2 }, { locale: 'fr', strength: 2 })).toBe(false);
      expect(storage.collationsEqual(undefined, { locale: 'en' })).toBe(false);
      expect(storage.collationsEqual(undefined, undefined)).toBe(true);
    });
  });
});
