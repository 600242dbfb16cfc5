// Region of interest: bounding box of every position in a GeoJSON file
// Accepts a FeatureCollection, a Feature, or a bare geometry

import { readFile } from "node:fs/promises";
import { enclose } from "./bbox.js";
import type { BBox } from "./bbox.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPosition(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number"
  );
}

function* coordinatePositions(coords: unknown): Generator<[number, number]> {
  if (isPosition(coords)) {
    yield [coords[0], coords[1]];
    return;
  }
  if (!Array.isArray(coords)) return;
  for (const child of coords) yield* coordinatePositions(child);
}

/** Walk every position reachable from a GeoJSON object. */
export function* geojsonPositions(node: unknown): Generator<[number, number]> {
  if (!isRecord(node)) return;
  switch (node.type) {
    case "FeatureCollection":
      if (Array.isArray(node.features)) {
        for (const feature of node.features) yield* geojsonPositions(feature);
      }
      return;
    case "Feature":
      yield* geojsonPositions(node.geometry);
      return;
    case "GeometryCollection":
      if (Array.isArray(node.geometries)) {
        for (const geometry of node.geometries) yield* geojsonPositions(geometry);
      }
      return;
    default:
      yield* coordinatePositions(node.coordinates);
  }
}

export function regionBBox(geojson: unknown): BBox {
  const bbox = enclose(geojsonPositions(geojson));
  if (!bbox) throw new Error("Region contains no coordinates");
  return bbox;
}

export async function readRegionBBox(filePath: string): Promise<BBox> {
  const text = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`Region file ${filePath} is not valid JSON: ${String(err)}`);
  }
  return regionBBox(parsed);
}
