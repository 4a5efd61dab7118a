import type { GeoPoint, JoinResult, ParseErrorPolicy, Table } from './types';
import { haversineKm } from './utils/geo';
import { resolveCell } from './utils/parse-cell';

/** Rows farther apart than this are not the same flare site. The bound is exclusive. */
export const DEFAULT_MAX_DISTANCE_KM = 3.0;

type Located = {
  row: string[];
  point: GeoPoint;
};

function locate(
  row: string[],
  latCol: number,
  lonCol: number,
  policy: ParseErrorPolicy,
  side: 'left' | 'right'
): GeoPoint | null {
  const lat = resolveCell(row, latCol, policy, `${side} latitude`);
  const lon = resolveCell(row, lonCol, policy, `${side} longitude`);
  if (lat == null || lon == null) return null;
  return { lat, lon };
}

/**
 * Joins every left row to its nearest right row by great-circle distance.
 *
 * A right row wins only when it is strictly closer than both the best so far and
 * `maxDistanceKm`, so on equal distances the earlier right row is kept.
 */
export function matchNearest(args: {
  left: Table;
  right: Table;
  leftLatCol: number;
  leftLonCol: number;
  rightLatCol: number;
  rightLonCol: number;
  maxDistanceKm?: number;
  onParseError?: ParseErrorPolicy;
}): JoinResult {
  const maxDistanceKm = args.maxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM;
  const policy = args.onParseError ?? 'zero';

  const candidates: Located[] = [];
  for (const row of args.right.rows) {
    const point = locate(row, args.rightLatCol, args.rightLonCol, policy, 'right');
    if (point) candidates.push({ row, point });
  }

  const matched: string[][] = [];
  const dangling: string[][] = [];

  for (const leftRow of args.left.rows) {
    const point = locate(leftRow, args.leftLatCol, args.leftLonCol, policy, 'left');
    if (!point) {
      dangling.push(leftRow);
      continue;
    }

    let closestDistance = maxDistanceKm;
    let bestMatch: string[] | null = null;

    for (const candidate of candidates) {
      const distance = haversineKm(point, candidate.point);
      if (distance < closestDistance) {
        closestDistance = distance;
        bestMatch = candidate.row;
      }
    }

    if (bestMatch) {
      matched.push([...leftRow, ...bestMatch]);
    } else {
      dangling.push(leftRow);
    }
  }

  return { matched, dangling };
}
