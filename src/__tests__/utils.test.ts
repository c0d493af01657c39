/**
 * =============================================================================
 * UTILITY TESTS
 * =============================================================================
 *
 * Distance math, money arithmetic and the shared zod field schemas.
 * =============================================================================
 */

import {
  boundingBox,
  haversineDistanceKm,
  haversineDistanceMeters,
  offsetByMeters
} from '../shared/utils/geospatial.utils';
import {
  formatCents,
  multiplyMoney,
  normalizeMoney,
  priceText,
  sumMoney,
  toCents
} from '../shared/utils/money.utils';
import { moneySchema, otpCodeSchema, queryBooleanSchema } from '../shared/utils/validation.utils';

describe('geospatial utils', () => {
  it('measures one degree of latitude', () => {
    expect(haversineDistanceKm(0, 0, 1, 0)).toBeCloseTo(111.195, 3);
  });

  it('is zero for the same point and symmetric otherwise', () => {
    expect(haversineDistanceMeters(12.9716, 77.5946, 12.9716, 77.5946)).toBe(0);
    expect(haversineDistanceKm(12.9716, 77.5946, 13.0827, 80.2707))
      .toBeCloseTo(haversineDistanceKm(13.0827, 80.2707, 12.9716, 77.5946), 9);
  });

  it('builds a square box of radius/111 degrees', () => {
    const box = boundingBox(10, 20, 11.1);

    expect(box.minLat).toBeCloseTo(9.9, 9);
    expect(box.maxLat).toBeCloseTo(10.1, 9);
    expect(box.minLon).toBeCloseTo(19.9, 9);
    expect(box.maxLon).toBeCloseTo(20.1, 9);
  });

  it('offsets a point by meters', () => {
    const north = offsetByMeters(12.9716, 77.5946, 0, 1110);
    const east = offsetByMeters(12.9716, 77.5946, 1000, 0);

    expect(north.latitude).toBeCloseTo(12.9816, 9);
    expect(north.longitude).toBe(77.5946);
    expect(east.latitude).toBe(12.9716);
    expect(haversineDistanceKm(12.9716, 77.5946, east.latitude, east.longitude)).toBeCloseTo(1, 2);
  });
});

describe('money utils', () => {
  it('converts between decimal strings and cents', () => {
    expect(toCents('40.5')).toBe(4050);
    expect(toCents('0.29')).toBe(29);
    expect(formatCents(4050)).toBe('40.50');
    expect(formatCents(7)).toBe('0.07');
    expect(formatCents(-5)).toBe('-0.05');
    expect(normalizeMoney(3)).toBe('3.00');
  });

  it('multiplies and sums without float drift', () => {
    expect(multiplyMoney('3.75', 4)).toBe('15.00');
    expect(multiplyMoney('0.10', 3)).toBe('0.30');
    expect(sumMoney(['0.10', '0.20'])).toBe('0.30');
    expect(sumMoney([])).toBe('0.00');
  });

  it('formats display prices', () => {
    expect(priceText('40.00')).toBe('$40');
    expect(priceText('36.50')).toBe('$36.50');
    expect(priceText('0.99')).toBe('$0.99');
  });
});

describe('validation field schemas', () => {
  it('accepts amounts as numbers or strings and outputs two decimals', () => {
    expect(moneySchema.parse(5)).toBe('5.00');
    expect(moneySchema.parse(' 12.5 ')).toBe('12.50');
    expect(moneySchema.safeParse('-1').success).toBe(false);
    expect(moneySchema.safeParse('1.999').success).toBe(false);
    expect(moneySchema.safeParse('abc').success).toBe(false);
  });

  it('reads query booleans', () => {
    expect(queryBooleanSchema.parse('true')).toBe(true);
    expect(queryBooleanSchema.parse('YES')).toBe(true);
    expect(queryBooleanSchema.parse('1')).toBe(true);
    expect(queryBooleanSchema.parse('false')).toBe(false);
    expect(queryBooleanSchema.parse('')).toBe(false);
  });

  it('takes exactly four digits for an OTP', () => {
    expect(otpCodeSchema.parse(' 0427 ')).toBe('0427');
    expect(otpCodeSchema.safeParse('427').success).toBe(false);
    expect(otpCodeSchema.safeParse('04271').success).toBe(false);
  });
});
