import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";

import type { FrequencyConfig } from "./config.js";
import { toFeature, toFeatureCollection, toRows, type SegmentFeature, type SegmentRow } from "./geojsonOutput.js";
import { openGtfsSource } from "./gtfsUtils.js";
import { buildRouteCandidates, loadRoutes, loadShapes, loadTrips } from "./loadFeed.js";
import { Palette } from "./palette.js";
import { utmProjection, type Projection } from "./projection.js";
import { reconcileRoutes, type RouteOutcome } from "./reconcile.js";

export const COMBINED_FILE = "all_routes.geojson";
export const SEGMENTS_FILE = "segments.csv";

export interface FrequencyMapResult {
    outcomes: RouteOutcome[];
    rejectedShapes: number;
    files: string[];
}

// `taken` holds lower-cased names already written, case-insensitive filesystems included
function routeFileName(routeId: string, taken: Set<string>) {
    const base = routeId.replace(/[^\w.-]+/g, "_");
    let name = `${base}.geojson`;
    for (let n = 2; taken.has(name.toLowerCase()); n++) name = `${base}_${n}.geojson`;
    taken.add(name.toLowerCase());
    return name;
}

async function reconcileFeed(config: FrequencyConfig, projection: Projection) {
    const source = await openGtfsSource(config.input, config.outDir);
    try {
        const shapes = await loadShapes(source, projection);
        await loadTrips(source, shapes, config.calendars);
        const routeInfo = await loadRoutes(source);

        const candidates = buildRouteCandidates(shapes.values());
        console.log(`routes=${candidates.routes.size.toLocaleString()} rejectedShapes=${candidates.rejected.length}`);

        const outcomes = reconcileRoutes(candidates.routes, { tol: config.tol, bufferTol: config.bufferTol });
        return { outcomes, routeInfo, rejectedShapes: candidates.rejected.length };
    } finally {
        await source.close();
    }
}

/**
 * The whole run: load the feed, reconcile every route, write one geojson per
 * route plus a combined one and a csv summary into `config.outDir`.
 */
export async function buildFrequencyMap(config: FrequencyConfig, palette = new Palette()): Promise<FrequencyMapResult> {
    fs.mkdirSync(config.outDir, { recursive: true });
    const projection = utmProjection(config.utmZone, config.south);
    const { outcomes, routeInfo, rejectedShapes } = await reconcileFeed(config, projection);

    const files: string[] = [];
    const allFeatures: SegmentFeature[] = [];
    const rows: SegmentRow[] = [];
    const taken = new Set([COMBINED_FILE.toLowerCase()]);

    for (const outcome of outcomes) {
        if (!outcome.ok) continue;
        const route = routeInfo.get(outcome.routeId) ?? { id: outcome.routeId, name: outcome.routeId, mode: "unknown" };
        const color = palette.next();
        const features = outcome.partition.map(piece => toFeature(piece, route, color, projection));

        const file = path.join(config.outDir, routeFileName(outcome.routeId, taken));
        fs.writeFileSync(file, JSON.stringify(toFeatureCollection(features)));
        files.push(file);

        allFeatures.push(...features);
        rows.push(...toRows(outcome.routeId, outcome.partition));
    }

    const combined = path.join(config.outDir, COMBINED_FILE);
    fs.writeFileSync(combined, JSON.stringify(toFeatureCollection(allFeatures)));
    const summary = path.join(config.outDir, SEGMENTS_FILE);
    fs.writeFileSync(summary, Papa.unparse(rows, { columns: ["route", "count", "lengthMeters"] }));
    files.push(combined, summary);

    const failed = outcomes.filter(o => !o.ok).length;
    console.log(`Done. routes=${outcomes.length - failed} failed=${failed} segments=${rows.length}`);
    return { outcomes, rejectedShapes, files };
}
