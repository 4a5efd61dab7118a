import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_DISTANCE_KM, matchNearest } from '../03-match';
import { ParseError } from '../errors';
import { haversineKm } from '../utils/geo';
import type { Table } from '../types';

// Columns: [id, lat, lon]
function table(rows: string[][]): Table {
  return { header: ['id', 'lat', 'lon'], rows };
}

function join(left: Table, right: Table, extra: { maxDistanceKm?: number; onParseError?: 'zero' | 'skip_row' | 'fail' } = {}) {
  return matchNearest({
    left,
    right,
    leftLatCol: 1,
    leftLonCol: 2,
    rightLatCol: 1,
    rightLonCol: 2,
    ...extra
  });
}

describe('matchNearest', () => {
  it('uses a 3 km default threshold', () => {
    expect(DEFAULT_MAX_DISTANCE_KM).toBe(3);
  });

  it('joins near rows and leaves far rows dangling', () => {
    // 0.005° ≈ 0.56 km, 0.025° ≈ 2.78 km, 0.09° ≈ 10.0 km at the equator
    const left = table([
      ['L1', '0', '0.005'],
      ['L2', '0', '1.025'],
      ['L3', '0.09', '0']
    ]);
    const right = table([
      ['R1', '0', '0'],
      ['R2', '0', '1']
    ]);

    const result = join(left, right);

    expect(result.matched).toEqual([
      ['L1', '0', '0.005', 'R1', '0', '0'],
      ['L2', '0', '1.025', 'R2', '0', '1']
    ]);
    expect(result.dangling).toEqual([['L3', '0.09', '0']]);
  });

  it('picks the nearest of several candidates inside the threshold', () => {
    const left = table([['L1', '0', '0']]);
    const right = table([
      ['far', '0', '0.02'],
      ['near', '0', '0.01'],
      ['mid', '0', '0.015']
    ]);

    expect(join(left, right).matched).toEqual([['L1', '0', '0', 'near', '0', '0.01']]);
  });

  it('breaks exact ties in favour of the earlier right row', () => {
    const left = table([['L1', '0', '0.5']]);
    const first = table([
      ['east', '0', '1'],
      ['west', '0', '0']
    ]);
    const swapped = table([
      ['west', '0', '0'],
      ['east', '0', '1']
    ]);

    for (let run = 0; run < 3; run += 1) {
      expect(join(left, first, { maxDistanceKm: 100 }).matched[0][3]).toBe('east');
      expect(join(left, swapped, { maxDistanceKm: 100 }).matched[0][3]).toBe('west');
    }
  });

  it('treats the threshold as an exclusive upper bound', () => {
    const left = table([['L1', '0', '0']]);
    const right = table([['R1', '0', '1']]);
    const exact = haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 });

    expect(join(left, right, { maxDistanceKm: exact }).dangling).toHaveLength(1);
    expect(join(left, right, { maxDistanceKm: exact + 1e-9 }).matched).toHaveLength(1);
  });

  it('puts every left row into the dangling set when the right table is empty', () => {
    const left = table([
      ['L1', '0', '0'],
      ['L2', '1', '1']
    ]);

    const result = join(left, table([]));
    expect(result.matched).toEqual([]);
    expect(result.dangling).toEqual(left.rows);
  });

  it('does not modify the input rows', () => {
    const left = table([['L1', '0', '0']]);
    const right = table([['R1', '0', '0.001']]);

    join(left, right);
    expect(left.rows[0]).toEqual(['L1', '0', '0']);
    expect(right.rows[0]).toEqual(['R1', '0', '0.001']);
  });

  describe('malformed coordinates', () => {
    it('anchors missing and malformed coordinates at zero by default', () => {
      const left = table([['short', '0']]);
      const right = table([
        ['R1', 'n/a', '']
      ]);

      expect(join(left, right).matched).toEqual([['short', '0', 'R1', 'n/a', '']]);
    });

    it('drops unusable rows from the search under skip_row', () => {
      const left = table([
        ['L1', '0', '0'],
        ['bad', 'abc', '0']
      ]);
      const right = table([
        ['broken', 'n/a', '0'],
        ['R1', '0', '0.01']
      ]);

      expect(join(left, right).matched[0][3]).toBe('broken');

      const result = join(left, right, { onParseError: 'skip_row' });
      expect(result.matched).toEqual([['L1', '0', '0', 'R1', '0', '0.01']]);
      expect(result.dangling).toEqual([['bad', 'abc', '0']]);
    });

    it('throws under the fail policy', () => {
      const left = table([['L1', 'abc', '0']]);
      const right = table([['R1', '0', '0']]);

      expect(() => join(left, right, { onParseError: 'fail' })).toThrow(ParseError);
      expect(() => join(left, right, { onParseError: 'fail' })).toThrow(
        'Cannot parse left latitude in column 1: "abc"'
      );
    });
  });

  describe('properties over a generated field', () => {
    // Deterministic LCG so the field is the same on every run
    function points(count: number, seed: number): string[][] {
      let state = seed;
      const next = () => {
        state = (state * 1664525 + 1013904223) % 4294967296;
        return state / 4294967296;
      };
      return Array.from({ length: count }, (_, i) => [`P${i}`, (28 + next() * 0.2).toFixed(5), (6 + next() * 0.2).toFixed(5)]);
    }

    const left = table(points(40, 7));
    const right = table(points(25, 11));
    const result = join(left, right);

    function point(row: string[], offset: number) {
      return { lat: Number(row[offset + 1]), lon: Number(row[offset + 2]) };
    }

    it('places every left row in exactly one collection', () => {
      expect(result.matched.length + result.dangling.length).toBe(left.rows.length);
      const ids = [...result.matched.map((row) => row[0]), ...result.dangling.map((row) => row[0])].sort();
      expect(ids).toEqual(left.rows.map((row) => row[0]).sort());
    });

    it('joins each matched row to a nearest right row inside the threshold', () => {
      for (const row of result.matched) {
        expect(row).toHaveLength(6);
        const origin = point(row, 0);
        const chosen = haversineKm(origin, point(row, 3));
        expect(chosen).toBeLessThan(DEFAULT_MAX_DISTANCE_KM);
        for (const candidate of right.rows) {
          expect(haversineKm(origin, point(candidate, 0))).toBeGreaterThanOrEqual(chosen);
        }
      }
    });

    it('leaves dangling rows with no right row inside the threshold', () => {
      for (const row of result.dangling) {
        const origin = point(row, 0);
        for (const candidate of right.rows) {
          expect(haversineKm(origin, point(candidate, 0))).toBeGreaterThanOrEqual(DEFAULT_MAX_DISTANCE_KM);
        }
      }
    });
  });
});
