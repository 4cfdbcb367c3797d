import { z } from "zod";

import { ConfigError } from "./errors.js";

// metres, same unit as the UTM projection
export const DEFAULT_TOL = 5;
export const DEFAULT_BUFFER_TOL = 1;
export const DEFAULT_UTM_ZONE = 17;
export const DEFAULT_OUT_DIR = "out";

export const USAGE = `Usage: frequencies <gtfs folder|zip|url> [calendar ...] [options]

  calendar            service_id(s) whose trips are counted (default: all)

Options:
  --utm <zone>        UTM zone to project into (FREQ_UTM_ZONE, default ${DEFAULT_UTM_ZONE})
  --south             southern hemisphere zone
  --tol <m>           shortest segment kept (FREQ_TOL, default ${DEFAULT_TOL})
  --buffer-tol <m>    corridor radius for overlap tests (FREQ_BUFFER_TOL, default ${DEFAULT_BUFFER_TOL})
  --out <dir>         where the geojson/csv go (FREQ_OUT_DIR, default ${DEFAULT_OUT_DIR})`;

// a corridor as wide as tol would pull a piece's own neighbours back in as overlaps
const ConfigSchema = z
    .object({
        input: z.string({ required_error: "GTFS folder, zip or url is required" }).min(1),
        calendars: z.array(z.string().min(1)),
        utmZone: z.coerce.number().int().min(1).max(60),
        south: z.boolean(),
        tol: z.coerce.number().positive(),
        bufferTol: z.coerce.number().nonnegative(),
        outDir: z.string().min(1),
    })
    .refine(c => c.bufferTol < c.tol, { path: ["bufferTol"], message: "must be smaller than tol" });

export type FrequencyConfig = z.infer<typeof ConfigSchema>;

const VALUE_FLAGS = new Set(["utm", "tol", "buffer-tol", "out"]);

/**
 * Builds the run config from CLI arguments, falling back to FREQ_* environment
 * variables (dotenv fills those from .env) and then to the defaults above.
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): FrequencyConfig {
    const positional: string[] = [];
    const flags = new Map<string, string>();
    let south = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith("--")) {
            positional.push(arg);
            continue;
        }
        if (arg === "--south") {
            south = true;
            continue;
        }

        const eq = arg.indexOf("=");
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
        if (!VALUE_FLAGS.has(name)) throw new ConfigError(`unknown option ${arg}`);
        const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
        if (value === undefined) throw new ConfigError(`--${name} needs a value`);
        flags.set(name, value);
    }

    const [input, ...calendars] = positional;
    const parsed = ConfigSchema.safeParse({
        input,
        calendars,
        utmZone: flags.get("utm") ?? env.FREQ_UTM_ZONE ?? DEFAULT_UTM_ZONE,
        south,
        tol: flags.get("tol") ?? env.FREQ_TOL ?? DEFAULT_TOL,
        bufferTol: flags.get("buffer-tol") ?? env.FREQ_BUFFER_TOL ?? DEFAULT_BUFFER_TOL,
        outDir: flags.get("out") ?? env.FREQ_OUT_DIR ?? DEFAULT_OUT_DIR,
    });

    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ")
        );
    }
    return parsed.data;
}
