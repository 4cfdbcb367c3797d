#!/usr/bin/env node
/**
 * Command line entry for the frequency map.
 *
 * Reads a GTFS feed (folder, zip or url), counts how many trips in the chosen
 * calendars run over each shape, then splits every route's shapes wherever
 * they overlap so each output segment carries one trip count. Output is a
 * geojson per route, one combined geojson and a csv summary, styled so a
 * plain geojson viewer draws busier segments thicker.
 *
 *   npm run frequencies -- GRT_GTFS 16WINT-All-Weekday-02 --utm 17
 */
import "dotenv/config";

import { parseArgs, USAGE, type FrequencyConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { buildFrequencyMap } from "./frequencyMap.js";

function readConfig(argv: string[]): FrequencyConfig | undefined {
    try {
        return parseArgs(argv);
    } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error(err.message);
        console.error(USAGE);
        return undefined;
    }
}

async function run() {
    const argv = process.argv.slice(2);
    if (argv.includes("--help") || argv.includes("-h")) {
        console.log(USAGE);
        return;
    }

    const config = readConfig(argv);
    if (!config) {
        process.exitCode = 1;
        return;
    }

    console.log(
        `feed=${config.input} calendars=${config.calendars.join(",") || "all"} utm=${config.utmZone}${config.south ? "S" : ""} tol=${config.tol} bufferTol=${config.bufferTol}`
    );

    const { outcomes } = await buildFrequencyMap(config);
    if (outcomes.some(o => !o.ok)) {
        console.error("some routes failed, their segments are missing from the output");
        process.exitCode = 1;
    }
}

run().catch(err => {
    console.error("frequency map failed:", err);
    process.exit(1);
});
