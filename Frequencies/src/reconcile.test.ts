import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { Position } from "geojson";

import { ConfigError, ReconciliationLimitError } from "./errors.js";
import { linePieces, type AnnotatedPolyline } from "./frequencyMerge.js";
import { buffer, intersection } from "./lineGeometry.js";
import { coalesceByCount, reconcile, reconcileRoutes, roundLimit } from "./reconcile.js";

const OPTIONS = { tol: 0.5, bufferTol: 0.1 };

function poly(line: Position[], count: number): AnnotatedPolyline {
    return { line, count };
}

function byCount(pieces: AnnotatedPolyline[]) {
    return pieces.slice().sort((a, b) => a.count - b.count);
}

function expectCoords(actual: Position[], expected: Position[], digits = 9) {
    expect(actual).toHaveLength(expected.length);
    actual.forEach((p, i) => {
        expect(p[0]).toBeCloseTo(expected[i][0], digits);
        expect(p[1]).toBeCloseTo(expected[i][1], digits);
    });
}

// counts of every piece passing within 1cm of the point
function countsAt(pieces: AnnotatedPolyline[], point: Position) {
    return pieces.filter(p => intersection(p.line, buffer([point], 0.01)).type !== "GeometryCollection").map(p => p.count);
}

describe("reconcile", () => {
    it("adds up the counts of identical lines", () => {
        const line = [[0, 0], [10, 0], [10, 10]];
        expect(reconcile([poly(line, 3), poly(line, 5)], OPTIONS)).toEqual([{ line, count: 8 }]);
    });

    it("splits two partly overlapping lines in three", () => {
        const result = byCount(reconcile([poly([[0, 0], [10, 0]], 2), poly([[5, 0], [15, 0]], 4)], OPTIONS));

        expect(result.map(p => p.count)).toEqual([2, 4, 6]);
        // the shared stretch reaches bufferTol past where b starts
        expectCoords(result[0].line, [[0, 0], [4.9, 0]]);
        expectCoords(result[1].line, [[10.1, 0], [15, 0]]);
        expectCoords(result[2].line, [[4.9, 0], [10, 0]]);

        expect(countsAt(result, [2, 0])).toEqual([2]);
        expect(countsAt(result, [7, 0])).toEqual([6]);
        expect(countsAt(result, [12, 0])).toEqual([4]);
    });

    it("leaves lines that only touch at a point alone", () => {
        const a = [[0, 0], [10, 0]];
        const b = [[10, 0], [10, 10]];
        expect(reconcile([poly(a, 2), poly(b, 3)], OPTIONS)).toEqual([
            { line: a, count: 2 },
            { line: b, count: 3 },
        ]);
    });

    it("drops leftovers shorter than the tolerance", () => {
        const result = reconcile([poly([[0, 0], [10, 0]], 1), poly([[0, 0], [10.3, 0]], 1)], OPTIONS);
        expect(result).toEqual([{ line: [[0, 0], [10, 0]], count: 2 }]);
    });

    it("settles a three way overlap pair by pair", () => {
        const line = [[0, 0], [10, 0]];
        expect(reconcile([poly(line, 1), poly(line, 2), poly(line, 3)], OPTIONS)).toEqual([{ line, count: 6 }]);
    });

    it("returns a single candidate as is", () => {
        const line = [[0, 0], [3, 4]];
        expect(reconcile([poly(line, 7)], OPTIONS)).toEqual([{ line, count: 7 }]);
    });

    it("rejoins the halves of a split shape with the same count", () => {
        const halves = [poly([[0, 0], [5, 0], [10, 0]], 4), poly([[10, 0], [10, 5], [10, 10]], 4)];
        expect(reconcile(halves, OPTIONS)).toEqual([
            { line: [[0, 0], [5, 0], [10, 0], [10, 5], [10, 10]], count: 4 },
        ]);
    });

    it("gives the same partition when run on its own output", () => {
        const first = reconcile([poly([[0, 0], [10, 0]], 2), poly([[5, 0], [15, 0]], 4)], OPTIONS);
        const second = byCount(reconcile(first, OPTIONS));
        const expected = byCount(first);

        expect(second.map(p => p.count)).toEqual(expected.map(p => p.count));
        second.forEach((piece, i) => expectCoords(piece.line, expected[i].line));
    });

    it("leaves no overlap longer than the tolerance between output pieces", () => {
        const result = reconcile(
            [
                poly([[0, 0], [20, 0]], 1),
                poly([[5, 0], [25, 0]], 2),
                poly([[10, -10], [10, 0], [15, 0], [15, 10]], 3),
            ],
            OPTIONS
        );
        for (const a of result) {
            for (const b of result) {
                if (a === b) continue;
                expect(linePieces(intersection(a.line, buffer(b.line, OPTIONS.bufferTol)), OPTIONS.tol)).toEqual([]);
            }
        }
    });

    it("refuses a corridor as wide as the shortest segment", () => {
        // that wide, the shared stretch and a's leftover keep re-merging and counts pile up
        const candidates = [poly([[0, 0], [10, 0]], 2), poly([[5, 0], [15, 0]], 4)];
        expect(() => reconcile(candidates, { tol: 1, bufferTol: 2 })).toThrow(ConfigError);
        expect(() => reconcile(candidates, { tol: 1, bufferTol: 1 })).toThrow("bufferTol (1) must be smaller than tol (1)");

        const result = byCount(reconcile(candidates, { tol: 1, bufferTol: 0.5 }));
        expect(result.map(p => p.count)).toEqual([2, 4, 6]);
        expect(countsAt(result, [3.5, 0])).toEqual([2]);
    });

    it("gives up once the round limit is hit", () => {
        const line = [[0, 0], [10, 0]];
        expect(() => reconcile([poly(line, 1), poly(line, 2)], { ...OPTIONS, maxRounds: 1 })).toThrow(
            ReconciliationLimitError
        );
    });
});

describe("roundLimit", () => {
    it("grows with the square of the candidates", () => {
        expect(roundLimit(0)).toBe(16);
        expect(roundLimit(2)).toBe(80);
    });
});

describe("coalesceByCount", () => {
    it("merges touching pieces of the same count only", () => {
        const result = coalesceByCount([
            poly([[0, 0], [1, 0]], 1),
            poly([[1, 0], [2, 0]], 2),
            poly([[1, 0], [0, 1]], 1),
        ]);
        expect(result).toEqual([
            { line: [[0, 0], [1, 0], [0, 1]], count: 1 },
            { line: [[1, 0], [2, 0]], count: 2 },
        ]);
    });
});

describe("reconcileRoutes", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("keeps going after a route fails", () => {
        const line = [[0, 0], [10, 0]];
        const routes = new Map([
            ["broken", [poly(line, 1), poly(line, 2)]],
            ["fine", [poly(line, 5)]],
        ]);
        const outcomes = reconcileRoutes(routes, { ...OPTIONS, maxRounds: 1 });

        expect(outcomes.map(o => [o.routeId, o.ok])).toEqual([
            ["broken", false],
            ["fine", true],
        ]);
        const [broken, fine] = outcomes;
        if (!broken.ok) expect(broken.error).toBeInstanceOf(ReconciliationLimitError);
        if (fine.ok) expect(fine.partition).toEqual([{ line, count: 5 }]);
        expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("stops before any route on bad tolerances", () => {
        const routes = new Map([["fine", [poly([[0, 0], [10, 0]], 5)]]]);
        expect(() => reconcileRoutes(routes, { tol: 1, bufferTol: 2 })).toThrow(ConfigError);
        expect(console.log).not.toHaveBeenCalled();
    });
});
