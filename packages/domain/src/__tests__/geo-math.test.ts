import { describe, it, expect } from '@jest/globals';

import {
  bearingDeg,
  distanceKm,
  distanceToSegmentKm,
  isValidCoordinate,
  polygonContains,
} from '../index.js';

const NYC = { lat: 40.7128, lng: -74.006 };
const LA = { lat: 34.0522, lng: -118.2437 };

describe('distanceKm', () => {
  it('is zero for identical points', () => {
    expect(distanceKm(NYC, NYC)).toBe(0);
    expect(distanceKm({ lat: -33.9, lng: 151.2 }, { lat: -33.9, lng: 151.2 })).toBe(0);
  });

  it('is symmetric', () => {
    expect(Math.abs(distanceKm(NYC, LA) - distanceKm(LA, NYC))).toBeLessThan(1e-9);
  });

  it('puts New York about 3936 km from Los Angeles', () => {
    expect(Math.abs(distanceKm(NYC, LA) - 3936)).toBeLessThanOrEqual(5);
  });
});

describe('bearingDeg', () => {
  it('points due east along the equator', () => {
    expect(bearingDeg({ lat: 0, lng: 0 }, { lat: 0, lng: 1 })).toBeCloseTo(90, 6);
  });

  it('points due north along a meridian', () => {
    expect(bearingDeg({ lat: 0, lng: 0 }, { lat: 1, lng: 0 })).toBeCloseTo(0, 6);
  });
});

describe('distanceToSegmentKm', () => {
  const a = { lat: 0, lng: 0 };
  const b = { lat: 0, lng: 2 };

  it('measures the perpendicular offset inside the segment', () => {
    const p = { lat: 0.5, lng: 1 };
    expect(distanceToSegmentKm(p, a, b)).toBeCloseTo(distanceKm(p, { lat: 0, lng: 1 }), 1);
  });

  it('falls back to the nearer endpoint past the end', () => {
    const p = { lat: 0, lng: 3 };
    expect(distanceToSegmentKm(p, a, b)).toBeCloseTo(distanceKm(p, b), 6);
  });

  it('handles a degenerate segment', () => {
    const p = { lat: 1, lng: 0 };
    expect(distanceToSegmentKm(p, a, a)).toBe(distanceKm(a, p));
  });
});

describe('polygonContains', () => {
  const square = [
    { lat: 0, lng: 0 },
    { lat: 0, lng: 1 },
    { lat: 1, lng: 1 },
    { lat: 1, lng: 0 },
  ];

  it('classifies interior, edge, vertex and exterior points', () => {
    expect(polygonContains(square, { lat: 0.5, lng: 0.5 })).toBe(true);
    expect(polygonContains(square, { lat: 0, lng: 0.5 })).toBe(true);
    expect(polygonContains(square, { lat: 1, lng: 1 })).toBe(true);
    expect(polygonContains(square, { lat: 1.5, lng: 0.5 })).toBe(false);
  });

  it('needs at least three vertices', () => {
    expect(polygonContains(square.slice(0, 2), { lat: 0, lng: 0.5 })).toBe(false);
  });
});

describe('isValidCoordinate', () => {
  it('accepts the range limits and rejects beyond them', () => {
    expect(isValidCoordinate(90, 180)).toBe(true);
    expect(isValidCoordinate(-90, -180)).toBe(true);
    expect(isValidCoordinate(90.0001, 0)).toBe(false);
    expect(isValidCoordinate(0, -180.5)).toBe(false);
    expect(isValidCoordinate(Number.NaN, 0)).toBe(false);
  });
});
