import { describe, it, expect } from 'vitest';
import { parseFragments } from '../fragment-loader';

describe('fragment-loader', () => {
  describe('parseFragments', () => {
    it('should keep valid fragments and report invalid entries', () => {
      const result = parseFragments([
        { url: 'https://jobs.example.com/job/1111', titleText: 'Chef', externalId: 1111 },
        'not a fragment',
        { url: 'https://jobs.example.com/job/2222', titleText: ['Chef'] },
        { titleText: 'No URL', salaryText: null },
      ]);

      expect(result.fragments).toEqual([
        { url: 'https://jobs.example.com/job/1111', titleText: 'Chef', externalId: '1111' },
        { url: '', titleText: 'No URL' },
      ]);
      expect(result.rejected).toEqual([
        { index: 1, reason: 'entry is not an object' },
        { index: 2, reason: 'titleText must be a string' },
      ]);
    });

    it('should reject a non-array document', () => {
      expect(() => parseFragments({ url: 'https://jobs.example.com/job/1111' })).toThrow(
        'Fragment file must contain a JSON array'
      );
    });

    it('should reject a URL that is not a string', () => {
      expect(parseFragments([{ url: 42 }]).rejected).toEqual([{ index: 0, reason: 'url must be a string' }]);
    });
  });
});
