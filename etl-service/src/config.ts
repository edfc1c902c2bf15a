import path from "node:path";
import { z } from "zod";
import { DEFAULT_WAVELENGTH_COLUMNS, wavelengthColumnsFrom } from "./transform/wavelengths.js";
import type { WavelengthColumn } from "./types.js";

const booleanFlag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value !== "string") return false;
    return value === "1" || value.toLowerCase() === "true";
  });

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().optional(),
  HOST: z.string().optional(),
  SOURCE_CSV: z.string().default(path.join(process.cwd(), "data", "All_Sites_Times_Daily_Averages_AOD20.csv")),
  SOURCE_SKIP_LINES: z.coerce.number().int().nonnegative().default(0),
  WAREHOUSE_PATH: z.string().default(path.join(process.cwd(), "var", "aerosol_dw.sqlite")),
  COUNTRIES_GEOJSON: z.string().optional(),
  WAVELENGTH_COLUMNS: z.string().optional(),
  REPAIR_SWAPPED_COORDINATES: booleanFlag,
  FACT_BATCH_SIZE: z.coerce.number().int().positive().default(10_000),
  CRON_SCHEDULE: z.string().default(""),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type ServiceConfig = z.infer<typeof envSchema> & {
  port: number;
  host: string;
  wavelengths: WavelengthColumn[];
};

function resolveWavelengths(raw: string | undefined): WavelengthColumn[] {
  if (!raw || !raw.trim()) return DEFAULT_WAVELENGTH_COLUMNS;
  const ids = raw.split(",").map((token) => token.trim()).filter(Boolean);
  return wavelengthColumnsFrom(ids);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.parse({
    ...env,
    PORT: env.PORT ?? env.ETL_SERVICE_PORT,
    SOURCE_CSV: env.SOURCE_CSV || undefined,
    COUNTRIES_GEOJSON: env.COUNTRIES_GEOJSON || undefined
  });

  return {
    ...parsed,
    port: parsed.PORT ?? 4020,
    host: parsed.HOST ?? "0.0.0.0",
    wavelengths: resolveWavelengths(parsed.WAVELENGTH_COLUMNS)
  };
}
