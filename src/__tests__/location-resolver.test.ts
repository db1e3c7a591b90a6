import { describe, it, expect } from 'vitest';
import { expandState, formatLocationName, resolveLocation, type LocationOptions } from '../location-resolver';

const OPTIONS: LocationOptions = {
  homeCountry: 'Australia',
  abbreviations: {
    NSW: 'New South Wales',
    VIC: 'Victoria',
    SA: 'South Australia',
    QLD: 'Queensland',
  },
  countries: {
    Australia: 'Australia',
    'New Zealand': 'New Zealand',
    'United Kingdom': 'United Kingdom',
    UK: 'United Kingdom',
    'United States': 'United States',
    'United States of America': 'United States',
    USA: 'United States',
  },
};

describe('location-resolver', () => {
  describe('resolveLocation', () => {
    it('should expand a state code after the city', () => {
      expect(resolveLocation('Parramatta, NSW', OPTIONS)).toEqual({
        city: 'Parramatta',
        state: 'New South Wales',
        country: 'Australia',
      });
    });

    it('should split a state code from the city inside one segment and drop the postcode', () => {
      expect(resolveLocation('Sydney NSW 2000', OPTIONS)).toEqual({
        city: 'Sydney',
        state: 'New South Wales',
        country: 'Australia',
      });
    });

    it('should peel a trailing country', () => {
      expect(resolveLocation('Melbourne, VIC, Australia', OPTIONS)).toEqual({
        city: 'Melbourne',
        state: 'Victoria',
        country: 'Australia',
      });
    });

    it('should recognise a foreign country after a dash', () => {
      expect(resolveLocation('London - United Kingdom', OPTIONS)).toEqual({
        city: 'London',
        state: '',
        country: 'United Kingdom',
      });
    });

    it('should prefer the longest country alias', () => {
      expect(resolveLocation('Austin, United States of America', OPTIONS)).toEqual({
        city: 'Austin',
        state: '',
        country: 'United States',
      });
    });

    it('should not read a state code inside a country code', () => {
      expect(resolveLocation('Denver, USA', OPTIONS)).toEqual({
        city: 'Denver',
        state: '',
        country: 'United States',
      });
    });

    it('should not mistake a state name ending in a country name for a country', () => {
      expect(resolveLocation('Adelaide, South Australia', OPTIONS)).toEqual({
        city: 'Adelaide',
        state: 'South Australia',
        country: 'Australia',
      });
    });

    it('should find a country mentioned inside the text', () => {
      expect(resolveLocation('Remote (New Zealand)', OPTIONS)).toEqual({
        city: 'Remote',
        state: '',
        country: 'New Zealand',
      });
    });

    it('should only match upper-case country codes inside the text', () => {
      expect(resolveLocation('Work with us', OPTIONS).country).toBe('Australia');
      expect(resolveLocation('Remote (UK based)', OPTIONS).country).toBe('United Kingdom');
    });

    it('should split a state code joined to the city by a dash', () => {
      expect(resolveLocation('Sydney-NSW', OPTIONS)).toEqual({
        city: 'Sydney',
        state: 'New South Wales',
        country: 'Australia',
      });
    });

    it('should treat a lone state as the state', () => {
      expect(resolveLocation('Queensland', OPTIONS)).toEqual({
        city: '',
        state: 'Queensland',
        country: 'Australia',
      });
    });

    it('should keep an unknown single place as the city', () => {
      expect(resolveLocation('Auckland', OPTIONS)).toEqual({
        city: 'Auckland',
        state: '',
        country: 'Australia',
      });
    });

    it('should default to the home country for empty text', () => {
      expect(resolveLocation('', OPTIONS)).toEqual({ city: '', state: '', country: 'Australia' });
      expect(resolveLocation(undefined, OPTIONS)).toEqual({ city: '', state: '', country: 'Australia' });
    });
  });

  describe('expandState', () => {
    it('should expand codes and canonicalise names', () => {
      expect(expandState('vic', OPTIONS.abbreviations)).toBe('Victoria');
      expect(expandState('new south wales', OPTIONS.abbreviations)).toBe('New South Wales');
      expect(expandState('Sydney', OPTIONS.abbreviations)).toBeNull();
    });
  });

  describe('formatLocationName', () => {
    it('should join city and state', () => {
      expect(formatLocationName({ city: 'Parramatta', state: 'New South Wales', country: 'Australia' })).toBe(
        'Parramatta, New South Wales'
      );
    });

    it('should fall back to the country', () => {
      expect(formatLocationName({ city: '', state: '', country: 'Australia' })).toBe('Australia');
    });
  });
});
