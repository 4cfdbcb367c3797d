import type { Geometry } from "geojson";

import { InvalidGeometryKindError } from "./errors.js";
import {
    buffer,
    difference,
    intersection,
    lineLength,
    lineMerge,
    type Corridor,
    type Line,
} from "./lineGeometry.js";

export interface AnnotatedPolyline {
    line: Line;
    count: number; // trips running over this line
}

// a buffered line standing in for the subtrahend of a diff
export interface BufferedProbe {
    corridor: Corridor;
    count: number;
}

export interface Tolerances {
    tol: number; // shortest piece worth keeping
    bufferTol: number; // how far apart two "same street" shapes may drift
}

export interface MergeResult {
    overlap: AnnotatedPolyline[];
    residual: AnnotatedPolyline[];
}

function mergeAndFilter(lines: Line[], tol: number, prefilter: boolean): Line[] {
    const kept = prefilter ? lines.filter(l => lineLength(l) > tol) : lines;
    if (!kept.length) return [];
    return lineMerge(kept).filter(l => lineLength(l) > tol);
}

/**
 * Reduces an intersection/difference result to the line pieces longer than
 * `tol`. Points are touch contacts and get dropped. With `prefilter`, short
 * pieces are thrown away before re-merging instead of getting the chance to
 * join a neighbour.
 */
export function linePieces(geom: Geometry, tol: number, { prefilter = false } = {}): Line[] {
    switch (geom.type) {
        case "LineString":
            return lineLength(geom.coordinates) > tol ? [geom.coordinates] : [];
        case "Point":
        case "MultiPoint":
            return [];
        case "MultiLineString":
            return mergeAndFilter(geom.coordinates, tol, prefilter);
        case "GeometryCollection": {
            const lines: Line[] = [];
            for (const g of geom.geometries) {
                if (g.type === "Point" || g.type === "MultiPoint") continue;
                if (g.type === "LineString") lines.push(g.coordinates);
                else if (g.type === "MultiLineString") lines.push(...g.coordinates);
                else throw new InvalidGeometryKindError(g.type);
            }
            return mergeAndFilter(lines, tol, prefilter);
        }
        default:
            throw new InvalidGeometryKindError(geom.type);
    }
}

/** What's left of `a` once `b` is taken away, split into pieces carrying a's count. */
export function diffLayers(a: AnnotatedPolyline, b: AnnotatedPolyline | BufferedProbe, tol: number): AnnotatedPolyline[] {
    const corridor = "corridor" in b ? b.corridor : buffer(b.line, 0);
    return linePieces(difference(a.line, corridor), tol).map(line => ({ line, count: a.count }));
}

/**
 * Finds the stretch two lines share. The shared part (taken from `a`'s
 * geometry) gets both counts; whatever sticks out of either side comes back as
 * residual with its own count. No usable overlap hands both lines back
 * untouched.
 *
 * Shapes digitised separately along the same street rarely coincide exactly, so
 * both the overlap test and the subtraction go through a `bufferTol` corridor.
 */
export function mergeLayers(a: AnnotatedPolyline, b: AnnotatedPolyline, { tol, bufferTol }: Tolerances): MergeResult {
    const bCorridor = buffer(b.line, bufferTol);
    const shared = linePieces(intersection(a.line, bCorridor), tol, { prefilter: true });
    if (!shared.length) {
        return { overlap: [], residual: [a, b] };
    }

    const total = a.count + b.count;
    const overlap = shared.map(line => ({ line, count: total }));

    const aProbe: BufferedProbe = { corridor: buffer(a.line, bufferTol), count: b.count };
    const bProbe: BufferedProbe = { corridor: bCorridor, count: b.count };
    const residual = [...diffLayers(a, bProbe, tol), ...diffLayers(b, aProbe, tol)];

    return { overlap, residual };
}
