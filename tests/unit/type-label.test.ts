import { describe, it, expect } from 'vitest';
import { Decimal128, Int32, Long, ObjectId } from 'mongodb';
import {
  labelOf,
  resolveTypeLabel,
  resolveObservation,
} from '../../src/lib/type-label/index.js';
import { defaultIntrospector } from '../../src/lib/enumerator/introspector.js';
import { NULL_TYPE_LABEL } from '../../src/types/data-model.js';
import { TypeResolutionError } from '../../src/utils/errors.js';

class Widget {
  size = 3;
}

describe('Type Labels', () => {
  describe('labelOf', () => {
    it('should label primitives', () => {
      expect(labelOf('har')).toBe('String');
      expect(labelOf(true)).toBe('Boolean');
      expect(labelOf(10n)).toBe('BigInt');
      expect(labelOf(Symbol('s'))).toBe('Symbol');
      expect(labelOf(() => 1)).toBe('Function');
    });

    it('should split integers from floating-point numbers', () => {
      expect(labelOf(2)).toBe('Integer');
      expect(labelOf(-40)).toBe('Integer');
      expect(labelOf(2.5)).toBe('Double');
      expect(labelOf(Number.NaN)).toBe('Double');
      expect(labelOf(Number.POSITIVE_INFINITY)).toBe('Double');
    });

    it('should use the sentinel for null and undefined', () => {
      expect(labelOf(null)).toBe(NULL_TYPE_LABEL);
      expect(labelOf(undefined)).toBe('Null');
    });

    it('should label built-in objects', () => {
      expect(labelOf(new Date('2024-01-01T00:00:00Z'))).toBe('Date');
      expect(labelOf([1, 2])).toBe('Array');
      expect(labelOf({ a: 1 })).toBe('Object');
      expect(labelOf(Object.create(null))).toBe('Object');
      expect(labelOf(new Map())).toBe('Map');
      expect(labelOf(/x/)).toBe('RegExp');
      expect(labelOf(new Uint8Array(2))).toBe('Uint8Array');
    });

    it('should label class instances by constructor name', () => {
      expect(labelOf(new Widget())).toBe('Widget');
    });

    it('should fall back to the string tag for anonymous classes', () => {
      const Anonymous = (() => class {})();

      expect(labelOf(new Anonymous())).toBe('Object');
    });

    it('should label BSON values by their BSON type', () => {
      expect(labelOf(new ObjectId('507f1f77bcf86cd799439011'))).toBe('ObjectId');
      expect(labelOf(Decimal128.fromString('1.50'))).toBe('Decimal128');
      expect(labelOf(Long.fromNumber(5))).toBe('Long');
      expect(labelOf(new Int32(5))).toBe('Int32');
    });

    it('should accept BSON tags on wrapper class instances', () => {
      class LegacyObjectId {
        readonly _bsontype = 'ObjectID';
      }
      class LegacyTimestamp {
        readonly _bsontype = 'Timestamp';
      }

      expect(labelOf(new LegacyObjectId())).toBe('ObjectId');
      expect(labelOf(new LegacyTimestamp())).toBe('Timestamp');
    });

    it('should ignore a _bsontype key on plain data', () => {
      expect(labelOf({ _bsontype: 'ObjectId', note: 'user data' })).toBe('Object');

      const bare: Record<string, unknown> = Object.create(null);
      bare._bsontype = 'Decimal128';
      expect(labelOf(bare)).toBe('Object');
    });
  });

  describe('resolveTypeLabel', () => {
    it('should return a successful resolution for ordinary values', () => {
      expect(resolveTypeLabel('x')).toEqual({ ok: true, label: 'String' });
    });

    it('should map uninspectable values to the sentinel', () => {
      const { proxy, revoke } = Proxy.revocable({}, {});
      revoke();

      const resolution = resolveTypeLabel(proxy);

      expect(resolution.ok).toBe(false);
      expect(resolution.label).toBe(NULL_TYPE_LABEL);
      if (!resolution.ok) {
        expect(resolution.error).toBeInstanceOf(TypeResolutionError);
        expect(resolution.error.cause).toBeInstanceOf(TypeError);
      }
    });
  });

  describe('resolveObservation', () => {
    it('should read the property and label its value', () => {
      const resolution = resolveObservation(defaultIntrospector, { when: new Date(0) }, 'when');

      expect(resolution).toEqual({ ok: true, label: 'Date' });
    });

    it('should label a missing property with the sentinel', () => {
      const resolution = resolveObservation(defaultIntrospector, { a: 1 }, 'b');

      expect(resolution).toEqual({ ok: true, label: 'Null' });
    });

    it('should turn a throwing getter into a failed resolution', () => {
      const record = {
        get boom(): string {
          throw new Error('invalid state');
        },
      };

      const resolution = resolveObservation(defaultIntrospector, record, 'boom');

      expect(resolution.ok).toBe(false);
      expect(resolution.label).toBe('Null');
      if (!resolution.ok) {
        expect(resolution.error.message).toBe('Failed to read property "boom"');
        expect(resolution.error.details).toEqual({ property: 'boom' });
      }
    });

    it('should report the property when the value cannot be labelled', () => {
      const { proxy, revoke } = Proxy.revocable({}, {});
      revoke();

      const resolution = resolveObservation(defaultIntrospector, { inner: proxy }, 'inner');

      expect(resolution.ok).toBe(false);
      if (!resolution.ok) {
        expect(resolution.error.message).toBe('Failed to determine type of property "inner"');
        expect(resolution.error.cause).toBeInstanceOf(TypeError);
      }
    });
  });
});
