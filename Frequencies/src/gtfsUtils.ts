import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import fetch from "node-fetch";
import StreamZip from "node-stream-zip";
import { parse } from "csv-parse";

import { MissingTableError } from "./errors.js";

export type CsvRow = Record<string, string>;
export type RowHandler = (row: CsvRow) => void | Promise<void>;

/** A GTFS feed we can pull tables out of, wherever it lives. */
export interface GtfsSource {
    readonly label: string;
    has(table: string): Promise<boolean>;
    streamCsv(table: string, fn: RowHandler): Promise<void>;
    close(): Promise<void>;
}

// route_type from routes.txt, basic codes and the extended (Google) ranges
export function routeTypeToMode(rt: number | string): string {
    if (rt === "") return "unknown";
    const n = Number(rt);
    //Standard GTFS
    if (n === 0) return "tram";
    if (n === 1) return "metro";
    if (n === 2) return "rail";
    if (n === 3) return "bus";
    if (n === 4) return "water";
    if (n === 5) return "cablecar";
    if (n === 6) return "gondola";
    if (n === 7) return "funicular";
    if (n === 11) return "trolleybus";
    if (n === 12) return "monorail";
    //Extended GTFS
    if (n >= 100 && n <= 117) return "rail";
    if (n >= 200 && n <= 209) return "coach service";
    if (n >= 400 && n <= 405) return "metro";
    if (n >= 700 && n <= 716) return "bus";
    if (n === 800) return "trolleybus";
    if (n >= 900 && n <= 906) return "tram";
    if (n === 1000 || n === 1200) return "water";
    if (n === 1100) return "air";
    if (n >= 1300 && n <= 1307) return "aerial lift";
    if (n === 1400) return "funicular service";
    if (n >= 1500 && n <= 1507) return "taxi";
    if (n === 1700) return "miscellaneous service";
    if (n === 1702) return "horse-drawn carriage";
    return "unknown";
}

/** Writes to `<dest>.part` and only moves it to `dest` once the whole body is in. */
export async function download(url: string, dest: string) {
    const part = `${dest}.part`;
    try {
        const res = await fetch(url);
        if (!res.ok) throw new Error(`download failed ${res.status} for ${url}`);
        if (!res.body) throw new Error(`download of ${url} came back empty`);
        await pipeline(res.body, fs.createWriteStream(part));
    } catch (err) {
        fs.rmSync(part, { force: true });
        throw err;
    }
    fs.renameSync(part, dest);
}

// row at a time, shapes.txt for a big city is a few hundred MB
async function parseRows(stream: NodeJS.ReadableStream, fn: RowHandler) {
    await pipeline(
        stream,
        parse({ columns: true, skip_empty_lines: true, trim: true, bom: true }),
        async function* (rows: AsyncIterable<CsvRow>) {
            for await (const row of rows) await fn(row);
        }
    );
}

function sameTable(name: string, table: string) {
    return path.basename(name).toLowerCase() === table.toLowerCase();
}

export function directorySource(dir: string): GtfsSource {
    const find = (table: string) => {
        const name = fs.readdirSync(dir).find(f => sameTable(f, table));
        return name ? path.join(dir, name) : undefined;
    };
    return {
        label: dir,
        has: async table => find(table) !== undefined,
        streamCsv: async (table, fn) => {
            const file = find(table);
            if (!file) throw new MissingTableError(table, dir);
            await parseRows(fs.createReadStream(file), fn);
        },
        close: async () => {},
    };
}

export function zipSource(file: string): GtfsSource {
    const zip = new StreamZip.async({ file });
    const find = async (table: string) => Object.keys(await zip.entries()).find(k => sameTable(k, table));
    return {
        label: file,
        has: async table => (await find(table)) !== undefined,
        streamCsv: async (table, fn) => {
            const key = await find(table);
            if (!key) throw new MissingTableError(table, file);
            await parseRows(await zip.stream(key), fn);
        },
        close: async () => {
            await zip.close();
        },
    };
}

/**
 * Opens a feed from a folder of .txt files, a .zip, or an http(s) url. Urls are
 * downloaded once into `cacheDir` and reused after that.
 */
export async function openGtfsSource(input: string, cacheDir: string): Promise<GtfsSource> {
    if (/^https?:\/\//i.test(input)) {
        fs.mkdirSync(cacheDir, { recursive: true });
        const zipFile = path.join(cacheDir, path.basename(new URL(input).pathname) || "gtfs.zip");
        if (!fs.existsSync(zipFile)) {
            console.log(`downloading GTFS from ${input}…`);
            await download(input, zipFile);
        } else {
            console.log(`using existing ${zipFile}`);
        }
        return zipSource(zipFile);
    }

    if (!fs.existsSync(input)) throw new Error(`no GTFS feed at ${input}`);
    return fs.statSync(input).isDirectory() ? directorySource(input) : zipSource(input);
}
