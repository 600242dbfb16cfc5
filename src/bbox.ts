// Axis-aligned bounding boxes in catalog order: min-x, min-y, max-x, max-y

export type BBox = [minX: number, minY: number, maxX: number, maxY: number];

export function isValidBBox(bbox: readonly number[]): boolean {
  if (bbox.length !== 4) return false;
  if (!bbox.every(Number.isFinite)) return false;
  const [minX, minY, maxX, maxY] = bbox;
  return minX <= maxX && minY <= maxY;
}

/** Parse "minX,minY,maxX,maxY"; throws on anything else. */
export function parseBBox(text: string): BBox {
  const parts = text.split(",").map((s) => Number(s.trim()));
  if (!isValidBBox(parts)) {
    throw new Error(`Invalid bounding box "${text}" (expected minX,minY,maxX,maxY)`);
  }
  const [minX, minY, maxX, maxY] = parts;
  return [minX, minY, maxX, maxY];
}

/** Encode for the catalog's `bbox` query parameter. */
export function bboxParam(bbox: BBox): string {
  return bbox.join(",");
}

/** Smallest box enclosing every position. */
export function enclose(positions: Iterable<readonly [number, number]>): BBox | null {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of positions) {
    if (x < minX) minX = x;
    if (y < minY) minY = y;
    if (x > maxX) maxX = x;
    if (y > maxY) maxY = y;
  }
  if (minX === Infinity) return null;
  return [minX, minY, maxX, maxY];
}
