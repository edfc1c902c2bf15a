import type { GeoEnrichmentStatus } from "@aerosol-dw/types";
import type { Logger } from "pino";
import { CoordinateValidationError } from "../errors.js";
import type { CleanedRecord, GeoLocation, GeoLookup, SiteNaturalKey } from "../types.js";
import { isValidCoordinatePair } from "./cleaner.js";

export type EnrichedSite = GeoLocation & {
  key: string;
  siteName: string;
  latitude: number;
  longitude: number;
  elevation: number | null;
};

export type SiteEnrichmentResult = {
  sites: EnrichedSite[];
  rejected: CoordinateValidationError[];
  distinctSites: number;
  invalidSiteRows: number;
  geoEnrichment: GeoEnrichmentStatus;
};

export type SiteEnrichmentOptions = {
  geoLookup?: GeoLookup;
  logger?: Logger;
};

const NO_GEOGRAPHY: GeoLocation = { country: null, continent: null, region: null };

export function siteKey(site: SiteNaturalKey): string {
  return JSON.stringify([site.siteName, site.latitude, site.longitude, site.elevation]);
}

function resolveGeography(
  lookup: GeoLookup,
  latitude: number,
  longitude: number,
  key: string,
  logger?: Logger
): GeoLocation {
  try {
    return lookup.lookup(latitude, longitude) ?? NO_GEOGRAPHY;
  }
  catch (err) {
    logger?.warn({ err, site: key }, "Geographic lookup failed for site");
    return NO_GEOGRAPHY;
  }
}

export function enrichSites(records: readonly CleanedRecord[], options: SiteEnrichmentOptions = {}): SiteEnrichmentResult {
  const { geoLookup, logger } = options;
  const candidates = new Map<string, SiteNaturalKey>();
  const rowsPerSite = new Map<string, number>();

  for (const record of records) {
    const candidate: SiteNaturalKey = {
      siteName: record.siteName,
      latitude: record.latitude,
      longitude: record.longitude,
      elevation: record.elevation
    };
    const key = siteKey(candidate);
    if (!candidates.has(key)) candidates.set(key, candidate);
    rowsPerSite.set(key, (rowsPerSite.get(key) ?? 0) + 1);
  }

  const sites: EnrichedSite[] = [];
  const rejected: CoordinateValidationError[] = [];
  let invalidSiteRows = 0;

  for (const [key, candidate] of candidates) {
    const { latitude, longitude } = candidate;
    if (latitude === null || longitude === null || !isValidCoordinatePair(latitude, longitude)) {
      rejected.push(new CoordinateValidationError(
        key,
        `Site "${candidate.siteName}" has invalid coordinates (lat=${String(latitude)}, lon=${String(longitude)})`
      ));
      invalidSiteRows += rowsPerSite.get(key) ?? 0;
      continue;
    }
    const geography = geoLookup
      ? resolveGeography(geoLookup, latitude, longitude, key, logger)
      : NO_GEOGRAPHY;
    sites.push({
      key,
      siteName: candidate.siteName,
      latitude,
      longitude,
      elevation: candidate.elevation,
      ...geography
    });
  }

  if (!geoLookup) {
    logger?.info("Geographic enrichment skipped: no boundary lookup configured");
  }

  return {
    sites,
    rejected,
    distinctSites: candidates.size,
    invalidSiteRows,
    geoEnrichment: geoLookup ? "applied" : "unavailable"
  };
}
