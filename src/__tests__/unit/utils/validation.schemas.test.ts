import {
  importOptionsSchema,
  notesExportQuerySchema,
  notesQuerySchema,
  personListQuerySchema,
  purgeSchema,
  submitVerificationSchema,
} from '../../../utils/validation.schemas';

describe('Validation Schemas', () => {
  describe('importOptionsSchema', () => {
    it('defaults to auto-detection without confirmation', () => {
      expect(importOptionsSchema.parse({})).toEqual({ encoding: 'auto', confirmDuplicates: false });
    });

    it.each([
      ['true', true],
      ['1', true],
      ['yes', true],
      ['off', false],
      ['0', false],
    ])('reads confirmDuplicates=%p as %p', (raw, expected) => {
      expect(importOptionsSchema.parse({ confirmDuplicates: raw }).confirmDuplicates).toBe(expected);
    });

    it('rejects unknown encodings', () => {
      expect(importOptionsSchema.safeParse({ encoding: 'ebcdic' }).success).toBe(false);
      expect(importOptionsSchema.parse({ encoding: 'utf-16be' }).encoding).toBe('utf-16be');
    });
  });

  describe('personListQuerySchema', () => {
    it('coerces paging and applies defaults', () => {
      expect(personListQuerySchema.parse({})).toEqual({ page: 1, limit: 50 });
      expect(personListQuerySchema.parse({ page: '3', limit: '10', search: '  lee ', audited: 'true' })).toEqual({
        page: 3,
        limit: 10,
        search: 'lee',
        audited: true,
      });
    });

    it('bounds the page size', () => {
      expect(personListQuerySchema.safeParse({ limit: '201' }).success).toBe(false);
      expect(personListQuerySchema.safeParse({ page: '0' }).success).toBe(false);
    });
  });

  describe('submitVerificationSchema', () => {
    it('accepts an empty device list', () => {
      expect(submitVerificationSchema.parse({ fetchedDevices: [] })).toEqual({
        fetchedDevices: [],
        confirmedDeviceIds: [],
      });
    });

    it('accepts a null note', () => {
      expect(submitVerificationSchema.parse({ fetchedDevices: [], note: null }).note).toBeNull();
    });

    it('requires complete device descriptors', () => {
      const result = submitVerificationSchema.safeParse({ fetchedDevices: [{ assetId: 'D1', assetTag: 'T' }] });
      expect(result.success).toBe(false);
    });
  });

  describe('notes queries', () => {
    it('pages the list but not the export', () => {
      expect(notesQuerySchema.parse({})).toEqual({ page: 1, limit: 100 });
      expect(notesExportQuerySchema.parse({ page: '4', dateFrom: '2025-03-01' })).toEqual({ dateFrom: '2025-03-01' });
    });

    it('requires a uuid session filter', () => {
      expect(notesQuerySchema.safeParse({ sessionId: 'abc' }).success).toBe(false);
    });
  });

  describe('purgeSchema', () => {
    it('takes an optional positive whole number of days', () => {
      expect(purgeSchema.parse({})).toEqual({});
      expect(purgeSchema.parse({ days: 30 })).toEqual({ days: 30 });
      expect(purgeSchema.safeParse({ days: 1.5 }).success).toBe(false);
      expect(purgeSchema.safeParse({ days: '30' }).success).toBe(false);
    });
  });
});
