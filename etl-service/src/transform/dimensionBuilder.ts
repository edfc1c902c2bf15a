import type { DimDate, DimSite, DimWavelength } from "@aerosol-dw/types";
import type { CleanedRecord, SpectralRules, WavelengthColumn } from "../types.js";
import type { EnrichedSite } from "./siteEnricher.js";
import { DEFAULT_SPECTRAL_RULES, labelWavelength } from "./wavelengths.js";

export type Dimensions = {
  dimDate: DimDate[];
  dimSite: DimSite[];
  dimWavelength: DimWavelength[];
  dateIds: Map<string, number>;
  siteIds: Map<string, number>;
  wavelengthIds: Map<number, number>;
};

const DAY_MS = 86_400_000;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNullableNumber(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

export function dayOfYear(year: number, month: number, day: number): number {
  return Math.round((Date.UTC(year, month - 1, day) - Date.UTC(year, 0, 1)) / DAY_MS) + 1;
}

export function buildDateDimension(dates: Iterable<string>): DimDate[] {
  const distinct = [...new Set(dates)].sort(compareText);
  return distinct.map((date, idx) => {
    const [year, month, day] = date.split("-").map(Number);
    return {
      dateId: idx + 1,
      date,
      year,
      month,
      day,
      dayOfYear: dayOfYear(year, month, day)
    };
  });
}

export function buildWavelengthDimension(
  wavelengths: readonly WavelengthColumn[],
  rules: SpectralRules = DEFAULT_SPECTRAL_RULES
): DimWavelength[] {
  const distinct = [...new Set(wavelengths.map((wavelength) => wavelength.wavelengthNm))].sort((a, b) => a - b);
  return distinct.map((wavelengthNm, idx) => ({
    wavelengthId: idx + 1,
    wavelengthNm,
    spectralBand: labelWavelength(wavelengthNm, rules.bands),
    sensitivity: labelWavelength(wavelengthNm, rules.sensitivity)
  }));
}

export function compareSites(a: EnrichedSite, b: EnrichedSite): number {
  return compareText(a.siteName, b.siteName)
    || a.latitude - b.latitude
    || a.longitude - b.longitude
    || compareNullableNumber(a.elevation, b.elevation);
}

export function buildSiteDimension(sites: readonly EnrichedSite[]): { dimSite: DimSite[]; siteIds: Map<string, number> } {
  const ordered = [...sites].sort(compareSites);
  const siteIds = new Map<string, number>();
  const dimSite = ordered.map((site, idx) => {
    const siteId = idx + 1;
    siteIds.set(site.key, siteId);
    return {
      siteId,
      siteName: site.siteName,
      latitude: site.latitude,
      longitude: site.longitude,
      elevation: site.elevation,
      region: site.region,
      country: site.country,
      continent: site.continent
    };
  });
  return { dimSite, siteIds };
}

export function buildDimensions(
  records: readonly CleanedRecord[],
  sites: readonly EnrichedSite[],
  wavelengths: readonly WavelengthColumn[],
  rules: SpectralRules = DEFAULT_SPECTRAL_RULES
): Dimensions {
  const dimDate = buildDateDimension(records.map((record) => record.date));
  const dimWavelength = buildWavelengthDimension(wavelengths, rules);
  const { dimSite, siteIds } = buildSiteDimension(sites);

  return {
    dimDate,
    dimSite,
    dimWavelength,
    dateIds: new Map(dimDate.map((row) => [row.date, row.dateId])),
    siteIds,
    wavelengthIds: new Map(dimWavelength.map((row) => [row.wavelengthNm, row.wavelengthId]))
  };
}
