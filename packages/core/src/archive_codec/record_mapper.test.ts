import { fromArchiveObject, toArchiveObject, validateArchiveObject } from './record_mapper';
import type { ArchiveRecord } from '../record_types';

describe('record_mapper', () => {
  describe('toArchiveObject', () => {
    it('should flatten attributes and extras to the top level', () => {
      const record: ArchiveRecord = {
        key: 'alice',
        credentialHash: '$hash$',
        attributes: { email: 'alice@example.test', extra: { locale: 'en_GB' } },
        metadata: { nickname: 'al' },
      };

      expect(toArchiveObject(record)).toEqual({
        metadata: { nickname: 'al' },
        key: 'alice',
        credentialHash: '$hash$',
        email: 'alice@example.test',
        locale: 'en_GB',
      });
    });

    it('should let known fields win over extras with the same name', () => {
      const record: ArchiveRecord = {
        key: 'alice',
        attributes: { email: 'alice@example.test', extra: { email: 'shadow@example.test', key: 'mallory' } },
        metadata: {},
      };

      const object = toArchiveObject(record);

      expect(object.email).toBe('alice@example.test');
      expect(object.key).toBe('alice');
    });
  });

  describe('fromArchiveObject', () => {
    it('should map known fields and keep unknown ones in extra', () => {
      const { record, issues } = fromArchiveObject(
        { key: 'alice', firstName: 'Alice', metadata: { capabilities: { editor: true } }, theme: 'dark' },
        0
      );

      expect(issues).toEqual([]);
      expect(record).toEqual({
        key: 'alice',
        attributes: { firstName: 'Alice', extra: { theme: 'dark' } },
        metadata: { capabilities: { editor: true } },
      });
    });

    it('should stringify numbers and booleans in string fields and report them', () => {
      const { record, issues } = fromArchiveObject({ key: 12345, displayName: true, metadata: {} }, 3);

      expect(record.key).toBe('12345');
      expect(record.attributes.displayName).toBe('true');
      expect(issues).toEqual([
        { index: 3, field: 'key', message: 'must be string' },
        { index: 3, field: 'displayName', message: 'must be string' },
      ]);
    });

    it('should drop other wrong-typed fields', () => {
      const { record } = fromArchiveObject({ key: 'alice', lastName: ['Smith'], credentialHash: null }, 0);

      expect(record.attributes.lastName).toBeUndefined();
      expect(record.credentialHash).toBeUndefined();
    });

    it('should replace a non-object metadata with an empty map', () => {
      const { record, issues } = fromArchiveObject({ key: 'alice', metadata: ['admin'] }, 1);

      expect(record.metadata).toEqual({});
      expect(issues).toEqual([{ index: 1, field: 'metadata', message: 'must be object' }]);
    });

    it('should default metadata to an empty map when absent', () => {
      expect(fromArchiveObject({ key: 'alice' }, 0).record.metadata).toEqual({});
    });

    it('should turn a non-object element into a keyless record', () => {
      expect(fromArchiveObject('alice', 4)).toEqual({
        record: { attributes: { extra: {} }, metadata: {} },
        issues: [{ index: 4, field: 'root', message: 'entry is not an object' }],
      });
    });

    it('should keep an unknown __proto__ field as data and write it back', () => {
      const element: unknown = JSON.parse('{"key":"alice","metadata":{},"__proto__":{"x":1}}');

      const { record } = fromArchiveObject(element, 0);

      expect(Object.keys(record.attributes.extra)).toEqual(['__proto__']);
      expect(Object.getPrototypeOf(record.attributes.extra)).toBe(Object.prototype);
      expect(JSON.stringify(toArchiveObject(record))).toBe('{"metadata":{},"key":"alice","__proto__":{"x":1}}');
    });
  });

  describe('validateArchiveObject', () => {
    it('should not report empty email and url values', () => {
      expect(validateArchiveObject({ key: 'bob', email: '', url: '', metadata: {} }, 0)).toEqual([]);
    });

    it('should report a malformed registration date', () => {
      expect(validateArchiveObject({ key: 'bob', registeredAt: 'last tuesday' }, 2)).toEqual([
        { index: 2, field: 'registeredAt', message: 'must match pattern "^\\d{4}-\\d{2}-\\d{2}[ T]\\d{2}:\\d{2}:\\d{2}"' },
      ]);
    });
  });
});
