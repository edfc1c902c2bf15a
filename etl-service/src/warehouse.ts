import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { isParticleClass } from "@aerosol-dw/types";
import type { FactAod, StarSchemaTables, WarehouseCounts } from "@aerosol-dw/types";

export const DEFAULT_FACT_BATCH_SIZE = 10_000;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS dim_wavelength (
    id_wavelength INTEGER PRIMARY KEY,
    wavelength_nm REAL NOT NULL UNIQUE,
    spectral_band TEXT NOT NULL,
    sensitivity TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS dim_date (
    id_date INTEGER PRIMARY KEY,
    date TEXT NOT NULL UNIQUE,
    year INTEGER NOT NULL,
    month INTEGER NOT NULL,
    day INTEGER NOT NULL,
    day_of_year INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS dim_site (
    id_site INTEGER PRIMARY KEY,
    site_name TEXT NOT NULL,
    latitude REAL NOT NULL,
    longitude REAL NOT NULL,
    elevation REAL,
    region TEXT,
    country TEXT,
    continent TEXT
  );

  CREATE TABLE IF NOT EXISTS fact_aod (
    fact_id INTEGER PRIMARY KEY,
    id_date INTEGER NOT NULL REFERENCES dim_date(id_date),
    id_wavelength INTEGER NOT NULL REFERENCES dim_wavelength(id_wavelength),
    id_site INTEGER NOT NULL REFERENCES dim_site(id_site),
    particle_type TEXT NOT NULL CHECK (particle_type IN ('fine', 'coarse', 'mixed', 'unknown')),
    aod_value REAL NOT NULL,
    precipitable_water REAL,
    angstrom_exponent REAL
  );

  CREATE INDEX IF NOT EXISTS ix_site_name ON dim_site(site_name);
  CREATE INDEX IF NOT EXISTS ix_site_latlon ON dim_site(latitude, longitude);
  CREATE INDEX IF NOT EXISTS ix_fact_date ON fact_aod(id_date);
  CREATE INDEX IF NOT EXISTS ix_fact_wavelength ON fact_aod(id_wavelength);
  CREATE INDEX IF NOT EXISTS ix_fact_site ON fact_aod(id_site);
`;

interface FactRow {
  readonly fact_id: number;
  readonly id_date: number;
  readonly id_wavelength: number;
  readonly id_site: number;
  readonly particle_type: string;
  readonly aod_value: number;
  readonly precipitable_water: number | null;
  readonly angstrom_exponent: number | null;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    out.push(items.slice(start, start + size));
  }
  return out;
}

export type WarehouseOptions = {
  batchSize?: number;
};

/**
 * Star-schema warehouse on SQLite. Every load replaces the previous
 * contents: truncate and dimensions in one transaction, then facts in
 * transactions of `batchSize` rows.
 */
export class SqliteWarehouse {
  private readonly db: Database.Database;
  private readonly batchSize: number;

  constructor(dbPath: string, options: WarehouseOptions = {}) {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_FACT_BATCH_SIZE);
  }

  createSchema(): void {
    this.db.exec(SCHEMA_SQL);
  }

  load(tables: StarSchemaTables): WarehouseCounts {
    this.createSchema();

    const insertWavelength = this.db.prepare(`
      INSERT INTO dim_wavelength (id_wavelength, wavelength_nm, spectral_band, sensitivity)
      VALUES (@wavelengthId, @wavelengthNm, @spectralBand, @sensitivity)
    `);
    const insertDate = this.db.prepare(`
      INSERT INTO dim_date (id_date, date, year, month, day, day_of_year)
      VALUES (@dateId, @date, @year, @month, @day, @dayOfYear)
    `);
    const insertSite = this.db.prepare(`
      INSERT INTO dim_site (id_site, site_name, latitude, longitude, elevation, region, country, continent)
      VALUES (@siteId, @siteName, @latitude, @longitude, @elevation, @region, @country, @continent)
    `);
    const insertFact = this.db.prepare(`
      INSERT INTO fact_aod (
        fact_id, id_date, id_wavelength, id_site,
        particle_type, aod_value, precipitable_water, angstrom_exponent
      ) VALUES (
        @factId, @dateId, @wavelengthId, @siteId,
        @particleClass, @aodValue, @precipitableWater, @angstromExponent
      )
    `);

    const replaceDimensions = this.db.transaction((next: StarSchemaTables) => {
      for (const table of ["fact_aod", "dim_wavelength", "dim_date", "dim_site"]) {
        this.db.prepare(`DELETE FROM ${table}`).run();
      }
      for (const row of next.dimWavelength) insertWavelength.run(row);
      for (const row of next.dimDate) insertDate.run(row);
      for (const row of next.dimSite) insertSite.run(row);
    });
    const insertFacts = this.db.transaction((batch: FactAod[]) => {
      for (const row of batch) insertFact.run(row);
    });

    replaceDimensions(tables);
    for (const batch of chunk(tables.factAod, this.batchSize)) {
      insertFacts(batch);
    }
    return this.counts();
  }

  counts(): WarehouseCounts {
    const count = (table: string) => {
      const row = this.db.prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
      return row?.total ?? 0;
    };
    return {
      factAod: count("fact_aod"),
      dimDate: count("dim_date"),
      dimSite: count("dim_site"),
      dimWavelength: count("dim_wavelength")
    };
  }

  readFacts(): FactAod[] {
    const rows = this.db.prepare<unknown[], FactRow>("SELECT * FROM fact_aod ORDER BY fact_id").all();
    return rows.map((row) => ({
      factId: row.fact_id,
      dateId: row.id_date,
      siteId: row.id_site,
      wavelengthId: row.id_wavelength,
      particleClass: isParticleClass(row.particle_type) ? row.particle_type : "unknown",
      aodValue: row.aod_value,
      precipitableWater: row.precipitable_water,
      angstromExponent: row.angstrom_exponent
    }));
  }

  close(): void {
    this.db.close();
  }
}
