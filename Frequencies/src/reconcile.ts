import { ConfigError, ReconciliationLimitError } from "./errors.js";
import { mergeLayers, type AnnotatedPolyline, type Tolerances } from "./frequencyMerge.js";
import { lineMerge, type Line } from "./lineGeometry.js";

export interface ReconcileOptions extends Tolerances {
    maxRounds?: number;
}

export type RouteOutcome =
    | { routeId: string; ok: true; partition: AnnotatedPolyline[] }
    | { routeId: string; ok: false; error: Error };

// every round either settles a piece or resolves one overlap, n^2 leaves plenty of room
export function roundLimit(candidates: number): number {
    return 16 * candidates * candidates + 16;
}

// with bufferTol >= tol a piece and the leftover beside it overlap again on the next round
export function checkTolerances({ tol, bufferTol }: Tolerances): void {
    if (!(bufferTol < tol)) throw new ConfigError(`bufferTol (${bufferTol}) must be smaller than tol (${tol})`);
}

/**
 * Joins pieces sharing a count back into the longest lines possible. Groups
 * come out in the order their count was first seen.
 */
export function coalesceByCount(pieces: AnnotatedPolyline[]): AnnotatedPolyline[] {
    const byCount = new Map<number, Line[]>();
    for (const piece of pieces) {
        const lines = byCount.get(piece.count);
        if (lines) lines.push(piece.line);
        else byCount.set(piece.count, [piece.line]);
    }

    const out: AnnotatedPolyline[] = [];
    for (const [count, lines] of byCount) {
        for (const line of lineMerge(lines)) out.push({ line, count });
    }
    return out;
}

/**
 * Splits a route's candidate lines into pieces that don't overlap each other,
 * each labelled with the number of trips over it.
 *
 * Greedy: the head of the worklist is checked against the rest in order and
 * the first overlap found gets split up, the pieces going back on the list.
 * A head that overlaps nothing is done. Where three or more lines share a
 * stretch the answer can depend on input order, so candidates are taken in the
 * order given.
 */
export function reconcile(candidates: AnnotatedPolyline[], options: ReconcileOptions): AnnotatedPolyline[] {
    checkTolerances(options);
    const limit = options.maxRounds ?? roundLimit(candidates.length);
    const unique: AnnotatedPolyline[] = [];
    let worklist = candidates.slice();
    let rounds = 0;

    while (worklist.length) {
        if (rounds >= limit) throw new ReconciliationLimitError(rounds, worklist.length);
        rounds++;

        const [probe, ...rest] = worklist;
        const next: AnnotatedPolyline[] = [];
        let matched = false;

        for (const other of rest) {
            if (matched) {
                next.push(other);
                continue;
            }
            const { overlap, residual } = mergeLayers(probe, other, options);
            if (overlap.length) {
                next.push(...overlap, ...residual);
                matched = true;
            } else {
                next.push(other);
            }
        }

        if (!matched) unique.push(probe);
        worklist = next;
    }

    return coalesceByCount(unique);
}

/**
 * Runs every route on its own. A route that blows up is logged and reported
 * as a failure, the rest carry on.
 */
export function reconcileRoutes(routes: Map<string, AnnotatedPolyline[]>, options: ReconcileOptions): RouteOutcome[] {
    checkTolerances(options);
    const outcomes: RouteOutcome[] = [];
    for (const [routeId, candidates] of routes) {
        try {
            const partition = reconcile(candidates, options);
            console.log(`[route ${routeId}] candidates=${candidates.length} pieces=${partition.length}`);
            outcomes.push({ routeId, ok: true, partition });
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            console.error(`[route ${routeId}] failed:`, error.message);
            outcomes.push({ routeId, ok: false, error });
        }
    }
    return outcomes;
}
