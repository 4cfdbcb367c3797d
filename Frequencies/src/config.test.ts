import { describe, it, expect } from "vitest";

import { parseArgs } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseArgs", () => {
    it("reads the feed, calendars and flags", () => {
        expect(parseArgs(["GRT_GTFS", "WKDY", "SAT", "--utm", "18", "--tol=2.5", "--south"], {})).toEqual({
            input: "GRT_GTFS",
            calendars: ["WKDY", "SAT"],
            utmZone: 18,
            south: true,
            tol: 2.5,
            bufferTol: 1,
            outDir: "out",
        });
    });

    it("falls back to the environment, then the defaults", () => {
        const config = parseArgs(["feed.zip"], { FREQ_TOL: "3", FREQ_OUT_DIR: "maps" });
        expect(config.tol).toBe(3);
        expect(config.outDir).toBe("maps");
        expect(config.utmZone).toBe(17);
        expect(config.bufferTol).toBe(1);
        expect(config.calendars).toEqual([]);
    });

    it("prefers flags over the environment", () => {
        const config = parseArgs(["feed", "--buffer-tol", "0.5"], { FREQ_BUFFER_TOL: "2" });
        expect(config.bufferTol).toBe(0.5);
    });

    it("needs a feed", () => {
        expect(() => parseArgs([], {})).toThrow(ConfigError);
        expect(() => parseArgs([], {})).toThrow("GTFS folder, zip or url is required");
    });

    it("rejects unknown options and missing values", () => {
        expect(() => parseArgs(["feed", "--nope", "1"], {})).toThrow("unknown option --nope");
        expect(() => parseArgs(["feed", "--utm"], {})).toThrow("--utm needs a value");
    });

    it("rejects out of range numbers", () => {
        expect(() => parseArgs(["feed", "--utm", "61"], {})).toThrow(ConfigError);
        expect(() => parseArgs(["feed", "--tol", "0"], {})).toThrow(/^tol:/);
        expect(() => parseArgs(["feed", "--buffer-tol", "-1"], {})).toThrow(/^bufferTol:/);
    });

    it("keeps the corridor narrower than the shortest segment", () => {
        expect(() => parseArgs(["feed", "--tol", "1", "--buffer-tol", "2"], {})).toThrow(
            "bufferTol: must be smaller than tol"
        );
        expect(() => parseArgs(["feed"], { FREQ_TOL: "1", FREQ_BUFFER_TOL: "1" })).toThrow(ConfigError);
        expect(parseArgs(["feed", "--tol", "1", "--buffer-tol", "0.9"], {}).bufferTol).toBe(0.9);
    });
});
