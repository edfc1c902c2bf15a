import type { DataQualityIssue, TransformResult } from "@aerosol-dw/types";
import type { Logger } from "pino";
import type { GeoLookup, RawTable, SourceColumns, SpectralRules, WavelengthColumn } from "../types.js";
import { cleanRecords } from "./cleaner.js";
import { buildDimensions } from "./dimensionBuilder.js";
import { assembleFacts } from "./factAssembler.js";
import { classifyRecords } from "./particleClassifier.js";
import { enrichSites } from "./siteEnricher.js";
import { reshapeSpectral } from "./spectralReshaper.js";
import { DEFAULT_SPECTRAL_RULES, DEFAULT_WAVELENGTH_COLUMNS } from "./wavelengths.js";

export type TransformOptions = {
  wavelengths?: readonly WavelengthColumn[];
  columns?: SourceColumns;
  spectralRules?: SpectralRules;
  geoLookup?: GeoLookup;
  repairSwappedCoordinates?: boolean;
  logger?: Logger;
};

/**
 * Raw AERONET table to star schema in one synchronous pass. Row and site
 * problems are excluded and reported; a schema mismatch throws.
 */
export function transformAerosols(table: RawTable, options: TransformOptions = {}): TransformResult {
  const logger = options.logger;
  const cleaned = cleanRecords(table, {
    wavelengths: options.wavelengths ?? DEFAULT_WAVELENGTH_COLUMNS,
    columns: options.columns,
    repairSwappedCoordinates: options.repairSwappedCoordinates
  });
  logger?.debug({
    inputRows: table.rows.length,
    cleanedRows: cleaned.records.length,
    rejectedRows: cleaned.errors.length
  }, "Cleaned raw records");

  const classified = classifyRecords(cleaned.records);
  const measurements = reshapeSpectral(classified, cleaned.presentWavelengths);
  logger?.debug({ longMeasurements: measurements.length }, "Reshaped spectral columns");

  const enrichment = enrichSites(cleaned.records, { geoLookup: options.geoLookup, logger });
  const dimensions = buildDimensions(
    cleaned.records,
    enrichment.sites,
    cleaned.presentWavelengths,
    options.spectralRules ?? DEFAULT_SPECTRAL_RULES
  );
  const { facts, unmatched } = assembleFacts(measurements, dimensions);

  const issues: DataQualityIssue[] = [
    ...cleaned.errors.map((error) => error.toIssue()),
    ...enrichment.rejected.map((error) => error.toIssue())
  ];

  const report = {
    inputRows: table.rows.length,
    cleanedRows: cleaned.records.length,
    longMeasurements: measurements.length,
    distinctSites: enrichment.distinctSites,
    validSites: enrichment.sites.length,
    factRows: facts.length,
    excluded: {
      unparseableRecords: cleaned.errors.length,
      invalidSites: enrichment.rejected.length,
      invalidSiteRows: enrichment.invalidSiteRows,
      unmatchedMeasurements: unmatched
    },
    absentWavelengthColumns: cleaned.absentWavelengthColumns,
    geoEnrichment: enrichment.geoEnrichment,
    issues
  };

  if (issues.length || unmatched) {
    logger?.warn({ excluded: report.excluded }, "Transform excluded rows with data-quality problems");
  }
  logger?.info({
    factRows: facts.length,
    dates: dimensions.dimDate.length,
    sites: dimensions.dimSite.length,
    wavelengths: dimensions.dimWavelength.length
  }, "Built star schema");

  return {
    factAod: facts,
    dimDate: dimensions.dimDate,
    dimSite: dimensions.dimSite,
    dimWavelength: dimensions.dimWavelength,
    report
  };
}
