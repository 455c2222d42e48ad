import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { historyQuerySchema, accountSpecSchema, formatIssues } from '../src/utils/validation';

describe('Validation Schemas', () => {
  describe('historyQuerySchema', () => {
    it('should accept an owner verbatim', () => {
      const result = historyQuerySchema.safeParse({ owner: '  Alice ' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.owner).toBe('  Alice ');
      }
    });

    it('should reject a missing owner', () => {
      const result = historyQuerySchema.safeParse({});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Missing 'owner' query parameter");
      }
    });

    it('should reject an empty owner', () => {
      const result = historyQuerySchema.safeParse({ owner: '' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Missing 'owner' query parameter");
      }
    });

    it('should reject a repeated owner parameter', () => {
      const result = historyQuerySchema.safeParse({ owner: ['Alice', 'Bob'] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("'owner' must be a single value");
      }
    });
  });

  describe('accountSpecSchema', () => {
    it('should split and trim both parts', () => {
      expect(accountSpecSchema.parse(' Alice , 12345 ')).toEqual({ displayName: 'Alice', remoteId: '12345' });
    });

    it('should reject input without exactly one comma', () => {
      for (const input of ['Alice', 'Alice,1,2', '']) {
        const result = accountSpecSchema.safeParse(input);

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.issues[0].message).toBe("Invalid format. Use 'DisplayName,ProfileID'");
        }
      }
    });

    it('should reject empty parts', () => {
      const result = accountSpecSchema.safeParse('Alice, ');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe('Display name and profile id must both be non-empty');
      }
    });
  });

  describe('formatIssues', () => {
    it('should flatten issue paths', () => {
      const result = z.object({ a: z.object({ b: z.number() }) }).safeParse({ a: { b: 'x' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toEqual([{ field: 'a.b', message: 'Expected number, received string' }]);
      }
    });
  });
});
