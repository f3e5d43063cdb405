import { describe, it, expect } from 'vitest';
import { parseLocationText } from '../../src/sources/location';

describe('parseLocationText', () => {
  it('reads two parts as city and state', () => {
    expect(parseLocationText('Brooklyn, NY')).toEqual({ city: 'Brooklyn', state: 'NY' });
  });

  it('reads three parts as city, state and country', () => {
    expect(parseLocationText('New York, NY, United States')).toEqual({
      city: 'New York',
      state: 'NY',
      country: 'United States',
    });
  });

  it('reads a single part as a country', () => {
    expect(parseLocationText('Canada')).toEqual({ country: 'Canada' });
  });

  it('ignores remote markers', () => {
    expect(parseLocationText('Remote')).toBeUndefined();
    expect(parseLocationText('Remote, Canada')).toEqual({ country: 'Canada' });
  });

  it('returns undefined for empty input', () => {
    expect(parseLocationText(undefined)).toBeUndefined();
    expect(parseLocationText('  ')).toBeUndefined();
  });
});
