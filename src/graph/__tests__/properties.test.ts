import { describe, it, expect } from 'vitest';
import { fingerprintProperties, isPoint3D, serializeProperties, serializeProperty } from '../properties.js';

describe('serializeProperties', () => {
  it('converts points, dates and drops absent values', () => {
    expect(
      serializeProperties({
        count: 4,
        centroid: { x: 1, y: 2, z: 3 },
        modified: new Date('2024-01-02T03:04:05.000Z'),
        notANumber: Number.NaN,
        infinite: Number.POSITIVE_INFINITY,
        missing: undefined,
        empty: null,
        name: 'Base',
        isSolid: false,
        tags: ['a', 'b'],
      })
    ).toEqual({
      count: 4,
      centroid: [1, 2, 3],
      modified: '2024-01-02T03:04:05.000Z',
      name: 'Base',
      isSolid: false,
      tags: ['a', 'b'],
    });
  });

  it('keeps zero and empty strings', () => {
    expect(serializeProperty(0)).toBe(0);
    expect(serializeProperty('')).toBe('');
  });
});

describe('isPoint3D', () => {
  it('requires three numeric coordinates', () => {
    expect(isPoint3D({ x: 0, y: 0, z: 0 })).toBe(true);
    expect(isPoint3D({ x: 0, y: 0 })).toBe(false);
    expect(isPoint3D({ x: '0', y: 0, z: 0 })).toBe(false);
    expect(isPoint3D([0, 0, 0])).toBe(false);
  });
});

describe('fingerprintProperties', () => {
  it('ignores key order', () => {
    expect(fingerprintProperties({ a: 1, b: 'x' })).toBe(fingerprintProperties({ b: 'x', a: 1 }));
  });

  it('differs when a value differs', () => {
    expect(fingerprintProperties({ a: 1 })).not.toBe(fingerprintProperties({ a: 2 }));
  });
});
