import type { Position } from "geojson";

import { DegenerateInputError } from "./errors.js";
import type { AnnotatedPolyline } from "./frequencyMerge.js";
import { routeTypeToMode, type GtfsSource } from "./gtfsUtils.js";
import { splitAtMidpoint, type Line } from "./lineGeometry.js";
import type { Projection } from "./projection.js";

export interface Shape {
    id: string;
    line: Line; // projected
    count: number;
    routeId?: string;
}

export interface RouteInfo {
    id: string;
    name: string;
    mode: string;
}

export interface TripStats {
    seen: number;
    counted: number;
    missingShape: number;
}

export interface RouteCandidates {
    routes: Map<string, AnnotatedPolyline[]>;
    rejected: DegenerateInputError[];
}

function num(v: string | undefined) {
    return v === undefined || v === "" ? NaN : Number(v);
}

/** Reads shapes.txt into one projected line per shape_id, points in sequence order. */
export async function loadShapes(source: GtfsSource, projection: Projection): Promise<Map<string, Shape>> {
    const points = new Map<string, { seq: number; pos: Position }[]>();
    let skipped = 0;

    await source.streamCsv("shapes.txt", r => {
        const id = r["shape_id"];
        const lat = num(r["shape_pt_lat"]);
        const lon = num(r["shape_pt_lon"]);
        const seq = num(r["shape_pt_sequence"]);
        if (!id || Number.isNaN(lat) || Number.isNaN(lon) || Number.isNaN(seq)) {
            skipped++;
            return;
        }
        const pos = projection.forward([lon, lat]);
        const list = points.get(id);
        if (list) list.push({ seq, pos });
        else points.set(id, [{ seq, pos }]);
    });

    const shapes = new Map<string, Shape>();
    for (const [id, list] of points) {
        list.sort((a, b) => a.seq - b.seq);
        shapes.set(id, { id, line: list.map(p => p.pos), count: 0 });
    }

    console.log(`[${source.label}] shapes=${shapes.size.toLocaleString()} skippedPoints=${skipped.toLocaleString()}`);
    return shapes;
}

/**
 * Counts trips onto their shapes. Only services listed in `calendars` count,
 * or every service when the list is empty. A shape's route is whichever route
 * its (last) counted trip belongs to.
 */
export async function loadTrips(source: GtfsSource, shapes: Map<string, Shape>, calendars: string[]): Promise<TripStats> {
    const services = new Set(calendars);
    const stats: TripStats = { seen: 0, counted: 0, missingShape: 0 };

    await source.streamCsv("trips.txt", r => {
        stats.seen++;
        if (services.size && !services.has(r["service_id"])) return;
        const shapeId = r["shape_id"];
        if (!shapeId) return;
        const shape = shapes.get(shapeId);
        if (!shape) {
            stats.missingShape++;
            return;
        }
        shape.count += 1;
        shape.routeId = r["route_id"];
        stats.counted++;
    });

    console.log(
        `[${source.label}] trips: seen=${stats.seen.toLocaleString()} counted=${stats.counted.toLocaleString()} missingShape=${stats.missingShape.toLocaleString()}`
    );
    return stats;
}

/** routes.txt is only used for labels, a feed without one is fine. */
export async function loadRoutes(source: GtfsSource): Promise<Map<string, RouteInfo>> {
    const routes = new Map<string, RouteInfo>();
    if (!(await source.has("routes.txt"))) return routes;

    await source.streamCsv("routes.txt", r => {
        const id = r["route_id"];
        if (!id) return;
        routes.set(id, {
            id,
            name: r["route_short_name"] || r["route_long_name"] || id,
            mode: routeTypeToMode(r["route_type"] ?? ""),
        });
    });
    return routes;
}

export function validateShape(shape: Shape) {
    if (shape.line.length < 2) {
        throw new DegenerateInputError(shape.id, `needs at least 2 points, has ${shape.line.length}`);
    }
    if (!Number.isSafeInteger(shape.count) || shape.count <= 0) {
        throw new DegenerateInputError(shape.id, `trip count must be a positive integer, got ${shape.count}`);
    }
}

/**
 * Groups counted shapes by route, each split in two halves carrying the full
 * trip count. Shapes that fail validation are left out and reported.
 */
export function buildRouteCandidates(shapes: Iterable<Shape>): RouteCandidates {
    const routes = new Map<string, AnnotatedPolyline[]>();
    const rejected: DegenerateInputError[] = [];

    for (const shape of shapes) {
        if (!shape.routeId) continue;
        try {
            validateShape(shape);
        } catch (err) {
            if (!(err instanceof DegenerateInputError)) throw err;
            console.error(`skipping ${err.message}`);
            rejected.push(err);
            continue;
        }

        const halves = splitAtMidpoint(shape.line).map(line => ({ line, count: shape.count }));
        const list = routes.get(shape.routeId);
        if (list) list.push(...halves);
        else routes.set(shape.routeId, halves);
    }

    return { routes, rejected };
}
