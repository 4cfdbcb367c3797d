import * as turf from "@turf/turf";
import type { Feature, FeatureCollection, LineString } from "geojson";

import type { AnnotatedPolyline } from "./frequencyMerge.js";
import { lineLength } from "./lineGeometry.js";
import type { RouteInfo } from "./loadFeed.js";
import type { Projection } from "./projection.js";

// geojson.io / simplestyle property names, so the output renders as-is
export type SegmentProperties = {
    route: string;
    routeName: string;
    mode: string;
    count: number;
    "stroke-width": number;
    stroke: string;
    lengthKm: number;
};

export type SegmentFeature = Feature<LineString, SegmentProperties>;

export type SegmentRow = {
    route: string;
    count: number;
    lengthMeters: number;
};

// 200 trips a day draws 10px wide
export function strokeWidth(count: number): number {
    return (10 * count) / 200;
}

export function toFeature(piece: AnnotatedPolyline, route: RouteInfo, color: string, projection: Projection): SegmentFeature {
    const coords = piece.line.map(p => projection.inverse(p));
    const lengthKm = turf.length(turf.lineString(coords), { units: "kilometers" });
    return turf.lineString(coords, {
        route: route.id,
        routeName: route.name,
        mode: route.mode,
        count: piece.count,
        "stroke-width": strokeWidth(piece.count),
        stroke: color,
        lengthKm: Math.round(lengthKm * 1000) / 1000,
    });
}

export function toFeatureCollection(features: SegmentFeature[]): FeatureCollection<LineString, SegmentProperties> {
    return turf.featureCollection(features);
}

export function toRows(routeId: string, partition: AnnotatedPolyline[]): SegmentRow[] {
    return partition.map(piece => ({
        route: routeId,
        count: piece.count,
        lengthMeters: Math.round(lineLength(piece.line) * 10) / 10,
    }));
}
