import { describe, it, expect } from 'vitest';
import { parsePrice } from './price.js';

describe('parsePrice', () => {
  it('returns unknown for empty input', () => {
    expect(parsePrice('')).toEqual({ min: null, max: null });
    expect(parsePrice(undefined)).toEqual({ min: null, max: null });
    expect(parsePrice(null)).toEqual({ min: null, max: null });
  });

  it('treats free keywords in any case as explicitly free', () => {
    expect(parsePrice('Gratis')).toEqual({ min: 0, max: 0 });
    expect(parsePrice('FREE untuk mahasiswa')).toEqual({ min: 0, max: 0 });
    expect(parsePrice('HTM: gratis (Rp 50.000 untuk sertifikat)')).toEqual({ min: 0, max: 0 });
  });

  it('returns unknown when the text has no numbers', () => {
    expect(parsePrice('Hubungi panitia')).toEqual({ min: null, max: null });
    expect(parsePrice('Rp -')).toEqual({ min: null, max: null });
  });

  it('parses a single amount with group separators', () => {
    expect(parsePrice('Rp 25.000')).toEqual({ min: 25000, max: 25000 });
    expect(parsePrice('IDR 1,500,000')).toEqual({ min: 1500000, max: 1500000 });
  });

  it('keeps long numbers that are still exact', () => {
    expect(parsePrice('Rp 50.000, CP 081234567890')).toEqual({ min: 50000, max: 81234567890 });
  });

  it('drops numbers too large to represent exactly', () => {
    expect(parsePrice('Rp 99999999999999999999')).toEqual({ min: null, max: null });
    expect(parsePrice('Rp 25.000 atau 99999999999999999999')).toEqual({ min: 25000, max: 25000 });
  });

  it('applies the k multiplier', () => {
    expect(parsePrice('50k')).toEqual({ min: 50000, max: 50000 });
    expect(parsePrice('HTM 35K - 75K')).toEqual({ min: 35000, max: 75000 });
  });

  it('orders a range regardless of its order in the text', () => {
    expect(parsePrice('Rp 25.000 - 50.000')).toEqual({ min: 25000, max: 50000 });
    expect(parsePrice('Rp 50.000 - 25.000')).toEqual({ min: 25000, max: 50000 });
  });

  it('takes the extremes when there are more than two amounts', () => {
    expect(parsePrice('Early bird 30.000, normal 45.000, late 60.000')).toEqual({
      min: 30000,
      max: 60000,
    });
  });
});
