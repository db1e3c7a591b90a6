import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigurationError, DEFAULT_FIELD_LIMITS, loadPipelineConfig, parseBoolean } from '../config';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('loadPipelineConfig', () => {
    it('should load the lookup tables and defaults', () => {
      vi.stubEnv('HOME_COUNTRY', '');
      vi.stubEnv('DEFAULT_CURRENCY', '');
      vi.stubEnv('SKILL_FALLBACK', '');

      const config = loadPipelineConfig();

      expect(config.homeCountry).toBe('Australia');
      expect(config.defaultCurrency).toBe('AUD');
      expect(config.skillFallback).toBe(false);
      expect(config.abbreviationTable.NSW).toBe('New South Wales');
      expect(config.countryAliases.UK).toBe('United Kingdom');
      expect(config.skillVocabulary.technical).toContain('Python');
      expect(config.boilerplateDenylist).toContain('apply now');
      expect(config.categoryKeywords.technology).toContain('developer');
      expect(config.fieldLimits).toEqual(DEFAULT_FIELD_LIMITS);
      expect(config.referenceHour).toBe(9);
    });

    it('should read scalar defaults from the environment', () => {
      vi.stubEnv('HOME_COUNTRY', 'New Zealand');
      vi.stubEnv('DEFAULT_CURRENCY', 'nzd');
      vi.stubEnv('SKILL_FALLBACK', 'true');

      const config = loadPipelineConfig();

      expect(config.homeCountry).toBe('New Zealand');
      expect(config.defaultCurrency).toBe('NZD');
      expect(config.skillFallback).toBe(true);
    });

    it('should let overrides win over the environment', () => {
      vi.stubEnv('HOME_COUNTRY', 'New Zealand');

      const config = loadPipelineConfig({ homeCountry: 'United Kingdom', fieldLimits: { title: 80 } });

      expect(config.homeCountry).toBe('United Kingdom');
      expect(config.fieldLimits.title).toBe(80);
      expect(config.fieldLimits.companyName).toBe(DEFAULT_FIELD_LIMITS.companyName);
    });

    it('should reuse the loaded tables', () => {
      expect(loadPipelineConfig().skillVocabulary).toBe(loadPipelineConfig().skillVocabulary);
    });

    it('should reject unusable settings', () => {
      expect(() => loadPipelineConfig({ defaultCurrency: 'A$' })).toThrow(ConfigurationError);
      expect(() => loadPipelineConfig({ homeCountry: ' ' })).toThrow('homeCountry must not be empty');
      expect(() => loadPipelineConfig({ fieldLimits: { title: 0 } })).toThrow(
        'fieldLimits.title must be a positive integer, got 0'
      );
      expect(() => loadPipelineConfig({ referenceHour: 24 })).toThrow(ConfigurationError);
      expect(() => loadPipelineConfig({ salaryPlausibleRange: { min: 5000, max: 100 } })).toThrow(
        ConfigurationError
      );
      expect(() => loadPipelineConfig({ skillVocabulary: { technical: [], soft: [], domain: [] } })).toThrow(
        'skillVocabulary is empty'
      );
    });
  });

  describe('parseBoolean', () => {
    it('should accept common truthy spellings', () => {
      expect(parseBoolean('TRUE', false)).toBe(true);
      expect(parseBoolean('1', false)).toBe(true);
      expect(parseBoolean('yes', false)).toBe(true);
      expect(parseBoolean('no', true)).toBe(false);
    });

    it('should fall back to the default when unset', () => {
      expect(parseBoolean(undefined, true)).toBe(true);
      expect(parseBoolean('', false)).toBe(false);
    });
  });
});
