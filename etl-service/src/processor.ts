import { randomUUID } from "node:crypto";
import type { EtlRunSummary, TransformResult } from "@aerosol-dw/types";
import type { Logger } from "pino";
import type { ServiceConfig } from "./config.js";
import { readRawTable } from "./extract.js";
import type { ExtractOptions } from "./extract.js";
import { loadCountryBoundaries } from "./geo/countryBoundaries.js";
import { transformAerosols } from "./transform/index.js";
import type { GeoLookup, RawTable } from "./types.js";
import type { SqliteWarehouse } from "./warehouse.js";

export type RunnerConfig = Pick<
  ServiceConfig,
  "SOURCE_CSV" | "SOURCE_SKIP_LINES" | "COUNTRIES_GEOJSON" | "REPAIR_SWAPPED_COORDINATES" | "wavelengths"
>;

export type RunnerDependencies = {
  readTable?: (csvPath: string, options: ExtractOptions) => Promise<RawTable>;
  loadGeoLookup?: (geojsonPath: string) => Promise<GeoLookup>;
  warehouse: Pick<SqliteWarehouse, "load">;
};

export class EtlRunner {
  private readonly config: RunnerConfig;
  private readonly logger: Logger;
  private readonly readTable: (csvPath: string, options: ExtractOptions) => Promise<RawTable>;
  private readonly loadGeoLookup: (geojsonPath: string) => Promise<GeoLookup>;
  private readonly warehouse: Pick<SqliteWarehouse, "load">;
  private inFlight: Promise<EtlRunSummary> | null = null;
  private geoLookup: Promise<GeoLookup | undefined> | null = null;
  private lastRun: EtlRunSummary | null = null;

  constructor(config: RunnerConfig, deps: RunnerDependencies, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.readTable = deps.readTable ?? readRawTable;
    this.loadGeoLookup = deps.loadGeoLookup ?? loadCountryBoundaries;
    this.warehouse = deps.warehouse;
  }

  latest(): EtlRunSummary | null {
    return this.lastRun;
  }

  /** Concurrent callers share the run already in progress. */
  run(): Promise<EtlRunSummary> {
    if (this.inFlight) return this.inFlight;
    const job = this.runInternal().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = job;
    return job;
  }

  async transform(table: RawTable): Promise<TransformResult> {
    const geoLookup = await this.resolveGeoLookup();
    return transformAerosols(table, {
      wavelengths: this.config.wavelengths,
      geoLookup,
      repairSwappedCoordinates: this.config.REPAIR_SWAPPED_COORDINATES,
      logger: this.logger
    });
  }

  private async runInternal(): Promise<EtlRunSummary> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const sourcePath = this.config.SOURCE_CSV;

    this.logger.info({ runId, sourcePath }, "Extracting source table");
    const table = await this.readTable(sourcePath, { skipLines: this.config.SOURCE_SKIP_LINES });
    this.logger.info({ runId, rows: table.rows.length, columns: table.columns.length }, "Extracted rows");

    const result = await this.transform(table);
    const { report, ...tables } = result;

    const loaded = this.warehouse.load(tables);
    this.logger.info({ runId, loaded }, "Loaded star schema into warehouse");

    const summary: EtlRunSummary = {
      runId,
      sourcePath,
      startedAt,
      finishedAt: new Date().toISOString(),
      report,
      loaded
    };
    this.lastRun = summary;
    return summary;
  }

  private resolveGeoLookup(): Promise<GeoLookup | undefined> {
    if (!this.geoLookup) {
      this.geoLookup = this.loadGeoLookupOnce();
    }
    return this.geoLookup;
  }

  private async loadGeoLookupOnce(): Promise<GeoLookup | undefined> {
    const geojsonPath = this.config.COUNTRIES_GEOJSON;
    if (!geojsonPath) return undefined;
    try {
      const lookup = await this.loadGeoLookup(geojsonPath);
      this.logger.info({ geojsonPath }, "Loaded country boundaries");
      return lookup;
    }
    catch (err) {
      this.logger.warn({ err, geojsonPath }, "Geographic enrichment skipped: country boundaries unavailable");
      return undefined;
    }
  }
}
