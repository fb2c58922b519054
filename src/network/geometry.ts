import type { Bounds, Point } from "../types";

export function computeBounds(points: Iterable<Point>): Bounds | null {
  let bounds: Bounds | null = null;
  for (const point of points) {
    if (!bounds) {
      bounds = { minX: point.x, minY: point.y, maxX: point.x, maxY: point.y };
      continue;
    }
    if (point.x < bounds.minX) bounds.minX = point.x;
    if (point.y < bounds.minY) bounds.minY = point.y;
    if (point.x > bounds.maxX) bounds.maxX = point.x;
    if (point.y > bounds.maxY) bounds.maxY = point.y;
  }
  return bounds;
}

/**
 * Parses a polyline attribute of the form "x1,y1 x2,y2 ...".
 * Returns null when any coordinate pair is not a finite number pair.
 */
export function parseShapeAttribute(raw: string): Point[] | null {
  const tokens = raw.trim().split(/\s+/).filter(Boolean);
  const points: Point[] = [];
  for (const token of tokens) {
    const parts = token.split(",");
    if (parts.length < 2) {
      return null;
    }
    const x = Number(parts[0]);
    const y = Number(parts[1]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return null;
    }
    points.push({ x, y });
  }
  return points;
}

export function segmentLength(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Splits the segment a→b into alternating dash intervals, starting with a dash.
 * The last dash is clipped to the segment end.
 */
export function dashSegments(a: Point, b: Point, dash: number, gap: number): Array<[Point, Point]> {
  const length = segmentLength(a, b);
  if (length === 0 || dash <= 0) {
    return [];
  }
  const dx = (b.x - a.x) / length;
  const dy = (b.y - a.y) / length;
  const stride = dash + Math.max(0, gap);
  const dashes: Array<[Point, Point]> = [];
  for (let distance = 0; distance < length; distance += stride) {
    const end = Math.min(distance + dash, length);
    dashes.push([
      { x: a.x + distance * dx, y: a.y + distance * dy },
      { x: a.x + end * dx, y: a.y + end * dy }
    ]);
  }
  return dashes;
}
