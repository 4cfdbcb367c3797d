import type { Geometry, LineString, Point, Position } from "geojson";

/**
 * Planar polyline geometry for projected coordinates (metres in UTM).
 *
 * Everything here works on arc-length intervals along a line: "which stretch of
 * line A lies within r of line B" is a union of intervals, and slicing the line
 * at the interval ends gives the intersection, slicing at the gaps gives the
 * difference. Results come back as GeoJSON geometries so callers can switch on
 * `type` the same way they would on any geometry library's output.
 */

export type Line = Position[];

// a line dilated by `radius`; radius 0 is the line itself
export interface Corridor {
    axis: Line;
    radius: number;
}

interface Interval {
    start: number;
    end: number;
}

export const EPS = 1e-7;

// endpoints closer than this count as the same node when merging
const NODE_PRECISION = 1e-6;

function dist(a: Position, b: Position): number {
    return Math.hypot(b[0] - a[0], b[1] - a[1]);
}

function cumulative(line: Line): number[] {
    const cum = [0];
    for (let i = 0; i + 1 < line.length; i++) {
        cum.push(cum[i] + dist(line[i], line[i + 1]));
    }
    return cum;
}

export function lineLength(line: Line): number {
    let total = 0;
    for (let i = 0; i + 1 < line.length; i++) total += dist(line[i], line[i + 1]);
    return total;
}

export function buffer(line: Line, radius: number): Corridor {
    return { axis: line, radius };
}

// t-range of segment p0->p1 inside the disc around c
function discRange(p0: Position, p1: Position, c: Position, r: number): [number, number] | null {
    const dx = p1[0] - p0[0];
    const dy = p1[1] - p0[1];
    const fx = p0[0] - c[0];
    const fy = p0[1] - c[1];
    const a = dx * dx + dy * dy;
    if (a === 0) return null;
    const b = 2 * (fx * dx + fy * dy);
    const cc = fx * fx + fy * fy - r * r;
    const disc = b * b - 4 * a * cc;
    if (disc < 0) return null;
    const root = Math.sqrt(disc);
    const lo = Math.max((-b - root) / (2 * a), 0);
    const hi = Math.min((-b + root) / (2 * a), 1);
    return lo <= hi ? [lo, hi] : null;
}

// narrows [lo, hi] to the t where min <= f0 + t * f1 <= max
function clip(range: [number, number], f0: number, f1: number, min: number, max: number): [number, number] | null {
    let [lo, hi] = range;
    if (f1 === 0) {
        return f0 >= min && f0 <= max ? range : null;
    }
    const ta = (min - f0) / f1;
    const tb = (max - f0) / f1;
    lo = Math.max(lo, Math.min(ta, tb));
    hi = Math.min(hi, Math.max(ta, tb));
    return lo <= hi ? [lo, hi] : null;
}

// t-range of segment p0->p1 inside the rectangle swept by q0->q1 at width 2r
function slabRange(p0: Position, p1: Position, q0: Position, q1: Position, r: number): [number, number] | null {
    const m = dist(q0, q1);
    if (m < EPS) return null;
    const ux = (q1[0] - q0[0]) / m;
    const uy = (q1[1] - q0[1]) / m;
    const ox = p0[0] - q0[0];
    const oy = p0[1] - q0[1];
    const dx = p1[0] - p0[0];
    const dy = p1[1] - p0[1];

    const along = clip([0, 1], ox * ux + oy * uy, dx * ux + dy * uy, 0, m);
    if (!along) return null;
    return clip(along, -ox * uy + oy * ux, -dx * uy + dy * ux, -r, r);
}

// the capsule is convex, so the three pieces always join into one range
function capsuleRange(p0: Position, p1: Position, q0: Position, q1: Position, r: number): [number, number] | null {
    const hits = [discRange(p0, p1, q0, r), discRange(p0, p1, q1, r), slabRange(p0, p1, q0, q1, r)].filter(
        (h): h is [number, number] => h !== null
    );
    if (!hits.length) return null;
    return [Math.min(...hits.map(h => h[0])), Math.max(...hits.map(h => h[1]))];
}

function mergeIntervals(intervals: Interval[]): Interval[] {
    const sorted = intervals.slice().sort((a, b) => a.start - b.start);
    const out: Interval[] = [];
    for (const cur of sorted) {
        const last = out[out.length - 1];
        if (!last || cur.start > last.end + EPS) out.push({ ...cur });
        else last.end = Math.max(last.end, cur.end);
    }
    return out;
}

function coveredIntervals(line: Line, corridor: Corridor): Interval[] {
    const { axis } = corridor;
    const r = Math.max(corridor.radius, EPS);
    const out: Interval[] = [];
    let offset = 0;

    for (let i = 0; i + 1 < line.length; i++) {
        const p0 = line[i];
        const p1 = line[i + 1];
        const len = dist(p0, p1);
        if (len >= EPS) {
            const hits: Array<[number, number] | null> = [];
            if (axis.length === 1) hits.push(discRange(p0, p1, axis[0], r));
            for (let j = 0; j + 1 < axis.length; j++) {
                hits.push(capsuleRange(p0, p1, axis[j], axis[j + 1], r));
            }
            for (const hit of hits) {
                if (hit) out.push({ start: offset + hit[0] * len, end: offset + hit[1] * len });
            }
        }
        offset += len;
    }

    return mergeIntervals(out);
}

function pointAt(line: Line, cum: number[], s: number): Position {
    for (let i = 0; i + 1 < line.length; i++) {
        if (s <= cum[i] + EPS) return line[i];
        if (s < cum[i + 1] - EPS) {
            const t = (s - cum[i]) / (cum[i + 1] - cum[i]);
            const [x0, y0] = line[i];
            const [x1, y1] = line[i + 1];
            return [x0 + t * (x1 - x0), y0 + t * (y1 - y0)];
        }
    }
    return line[line.length - 1];
}

function sliceLine(line: Line, cum: number[], start: number, end: number): Line {
    const coords: Line = [pointAt(line, cum, start)];
    for (let k = 0; k < line.length; k++) {
        if (cum[k] > start + EPS && cum[k] < end - EPS) coords.push(line[k]);
    }
    coords.push(pointAt(line, cum, end));
    return coords;
}

function toGeometry(line: Line, cum: number[], intervals: Interval[]): Geometry {
    const parts: Array<LineString | Point> = intervals.map(iv =>
        iv.end - iv.start > EPS
            ? { type: "LineString", coordinates: sliceLine(line, cum, iv.start, iv.end) }
            : { type: "Point", coordinates: pointAt(line, cum, iv.start) }
    );
    if (!parts.length) return { type: "GeometryCollection", geometries: [] };
    if (parts.length === 1) return parts[0];

    const lines = parts.filter((g): g is LineString => g.type === "LineString");
    const points = parts.filter((g): g is Point => g.type === "Point");
    if (!points.length) return { type: "MultiLineString", coordinates: lines.map(g => g.coordinates) };
    if (!lines.length) return { type: "MultiPoint", coordinates: points.map(g => g.coordinates) };
    return { type: "GeometryCollection", geometries: parts };
}

/** Part of `line` lying inside the corridor. */
export function intersection(line: Line, corridor: Corridor): Geometry {
    return toGeometry(line, cumulative(line), coveredIntervals(line, corridor));
}

/** Part of `line` lying outside the corridor. Touching points are dropped. */
export function difference(line: Line, corridor: Corridor): Geometry {
    const cum = cumulative(line);
    const total = cum[cum.length - 1];
    const gaps: Interval[] = [];
    let cursor = 0;
    for (const iv of coveredIntervals(line, corridor)) {
        if (iv.start - cursor > EPS) gaps.push({ start: cursor, end: iv.start });
        cursor = Math.max(cursor, iv.end);
    }
    if (total - cursor > EPS) gaps.push({ start: cursor, end: total });
    return toGeometry(line, cum, gaps);
}

interface MergeEdge {
    coords: Line;
    startKey: string;
    endKey: string;
    visited: boolean;
}

function nodeKey(p: Position): string {
    return `${Math.round(p[0] / NODE_PRECISION)},${Math.round(p[1] / NODE_PRECISION)}`;
}

function joinParts(parts: Line[]): Line {
    const out: Line = [...parts[0]];
    for (const part of parts.slice(1)) out.push(...part.slice(1));
    return out;
}

/**
 * Sews lines together wherever exactly two of them meet at an endpoint.
 * Junctions where three or more lines meet stay as breaks, and closed rings
 * come back as a single line. Each chain keeps the direction of the first
 * input line it contains.
 */
export function lineMerge(lines: Line[]): Line[] {
    const edges: MergeEdge[] = [];
    const nodes = new Map<string, MergeEdge[]>();

    for (const coords of lines) {
        if (coords.length < 2 || lineLength(coords) < EPS) continue;
        const edge: MergeEdge = {
            coords,
            startKey: nodeKey(coords[0]),
            endKey: nodeKey(coords[coords.length - 1]),
            visited: false,
        };
        edges.push(edge);
        for (const key of [edge.startKey, edge.endKey]) {
            const incident = nodes.get(key);
            if (incident) incident.push(edge);
            else nodes.set(key, [edge]);
        }
    }

    // follows the chain leaving `key` away from `from`, orienting each edge as it goes
    const extend = (from: MergeEdge, key: string): Line[] => {
        const chain: Line[] = [];
        let prev = from;
        let at = key;
        for (;;) {
            const incident = nodes.get(at) ?? [];
            if (incident.length !== 2) break;
            const next = incident[0] === prev ? incident[1] : incident[0];
            if (next.visited) break;
            next.visited = true;
            const forward = next.startKey === at;
            chain.push(forward ? next.coords : next.coords.slice().reverse());
            at = forward ? next.endKey : next.startKey;
            prev = next;
        }
        return chain;
    };

    const merged: Line[] = [];
    for (const seed of edges) {
        if (seed.visited) continue;
        seed.visited = true;
        const ahead = extend(seed, seed.endKey);
        const behind = extend(seed, seed.startKey)
            .reverse()
            .map(part => part.slice().reverse());
        merged.push(joinParts([...behind, seed.coords, ...ahead]));
    }
    return merged;
}

/**
 * Cuts a line in two at its middle vertex (both halves keep that vertex).
 * Shapes that loop back over themselves ("loop on a stick") can't be
 * reconciled against themselves, but their two halves can.
 */
export function splitAtMidpoint(line: Line): Line[] {
    if (line.length < 3) return [line];
    const mid = Math.floor(line.length / 2);
    return [line.slice(0, mid + 1), line.slice(mid)];
}
