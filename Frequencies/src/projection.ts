import proj4 from "proj4";
import type { Position } from "geojson";

const WGS84 = "EPSG:4326";

export interface Projection {
    // [lon, lat] -> [easting, northing]
    forward(lonLat: Position): Position;
    inverse(xy: Position): Position;
}

export function utmDefinition(zone: number, south = false): string {
    return `+proj=utm +zone=${zone}${south ? " +south" : ""} +ellps=WGS84 +units=m +no_defs`;
}

/**
 * Lines get compared by plain Euclidean distance, so the feed has to be in a
 * metric projection before anything is merged. UTM is good enough at city scale.
 */
export function utmProjection(zone: number, south = false): Projection {
    const converter = proj4(WGS84, utmDefinition(zone, south));
    return {
        forward: lonLat => converter.forward([lonLat[0], lonLat[1]]),
        inverse: xy => converter.inverse([xy[0], xy[1]]),
    };
}
