import { RecordParseError, SchemaMismatchError } from "../errors.js";
import type { CleanedRecord, RawTable, RawValue, SourceColumns, WavelengthColumn } from "../types.js";

export const SENTINEL = -999;

export const DEFAULT_SOURCE_COLUMNS: SourceColumns = {
  site: "AERONET_Site",
  latitude: "Site_Latitude(Degrees)",
  longitude: "Site_Longitude(Degrees)",
  elevation: "Site_Elevation(m)",
  date: "Date(dd:mm:yyyy)",
  angstromExponent: "440-870_Angstrom_Exponent",
  precipitableWater: "Precipitable_Water(cm)"
};

const NUMERIC_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const AERONET_DATE = /^(\d{1,2}):(\d{1,2}):(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

export type CleanOptions = {
  wavelengths: readonly WavelengthColumn[];
  columns?: SourceColumns;
  repairSwappedCoordinates?: boolean;
};

export type CleanResult = {
  records: CleanedRecord[];
  errors: RecordParseError[];
  presentWavelengths: WavelengthColumn[];
  absentWavelengthColumns: string[];
};

export function isSentinel(raw: RawValue | undefined): boolean {
  if (typeof raw === "number") return raw === SENTINEL;
  if (typeof raw !== "string") return false;
  const token = raw.trim();
  return NUMERIC_TOKEN.test(token) && Number(token) === SENTINEL;
}

/** Numeric cast where the sentinel and anything non-numeric become null. */
export function toMeasurement(raw: RawValue | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  }
  else {
    const token = raw.trim();
    if (!NUMERIC_TOKEN.test(token)) return null;
    value = Number(token);
  }
  if (!Number.isFinite(value) || value === SENTINEL) return null;
  return value;
}

function isoDate(year: number, month: number, day: number): string | null {
  const stamp = new Date(Date.UTC(year, month - 1, day));
  if (stamp.getUTCFullYear() !== year || stamp.getUTCMonth() !== month - 1 || stamp.getUTCDate() !== day) {
    return null;
  }
  return stamp.toISOString().slice(0, 10);
}

/** Accepts `dd:mm:yyyy` and ISO dates; any time-of-day part is dropped. */
export function parseCalendarDate(raw: RawValue | undefined): string | null {
  if (typeof raw !== "string") return null;
  const token = raw.trim();
  const aeronet = AERONET_DATE.exec(token);
  if (aeronet) {
    return isoDate(Number(aeronet[3]), Number(aeronet[2]), Number(aeronet[1]));
  }
  const iso = ISO_DATE.exec(token);
  if (iso) {
    return isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  return null;
}

export function isValidCoordinatePair(latitude: number | null, longitude: number | null): boolean {
  if (latitude === null || longitude === null) return false;
  return latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180;
}

function assertSchema(table: RawTable, columns: SourceColumns, wavelengths: readonly WavelengthColumn[]) {
  const available = new Set(table.columns);
  const required = [columns.site, columns.latitude, columns.longitude, columns.date];
  const missing = required.filter((column) => !available.has(column));
  if (missing.length) {
    throw new SchemaMismatchError(missing);
  }
  const present = wavelengths.filter((wavelength) => available.has(wavelength.column));
  if (!present.length) {
    throw new SchemaMismatchError(
      wavelengths.map((wavelength) => wavelength.column),
      "Input table has none of the configured AOD_<value>nm wavelength columns"
    );
  }
  return present;
}

export function cleanRecords(table: RawTable, options: CleanOptions): CleanResult {
  const columns = options.columns ?? DEFAULT_SOURCE_COLUMNS;
  const presentWavelengths = assertSchema(table, columns, options.wavelengths);
  const absentWavelengthColumns = options.wavelengths
    .filter((wavelength) => !presentWavelengths.includes(wavelength))
    .map((wavelength) => wavelength.column);

  const records: CleanedRecord[] = [];
  const errors: RecordParseError[] = [];

  table.rows.forEach((row, rowIndex) => {
    const rawSite = row[columns.site];
    const siteName = rawSite === null || rawSite === undefined ? "" : String(rawSite).trim();
    if (!siteName || isSentinel(rawSite)) {
      errors.push(new RecordParseError(rowIndex, `Row ${rowIndex}: missing site name`));
      return;
    }

    const date = parseCalendarDate(row[columns.date]);
    if (!date) {
      errors.push(new RecordParseError(rowIndex, `Row ${rowIndex}: unparseable date "${String(row[columns.date] ?? "")}"`));
      return;
    }

    let latitude = toMeasurement(row[columns.latitude]);
    let longitude = toMeasurement(row[columns.longitude]);
    if (options.repairSwappedCoordinates && latitude !== null && longitude !== null
      && Math.abs(latitude) > 90 && Math.abs(longitude) <= 90) {
      [latitude, longitude] = [longitude, latitude];
    }

    const aod: Record<string, number | null> = {};
    for (const wavelength of presentWavelengths) {
      aod[wavelength.column] = toMeasurement(row[wavelength.column]);
    }

    records.push({
      rowIndex,
      siteName,
      latitude,
      longitude,
      elevation: toMeasurement(row[columns.elevation]),
      date,
      aod,
      angstromExponent: toMeasurement(row[columns.angstromExponent]),
      precipitableWater: toMeasurement(row[columns.precipitableWater]),
      coordinatesValid: isValidCoordinatePair(latitude, longitude)
    });
  });

  return { records, errors, presentWavelengths, absentWavelengthColumns };
}
