export const PARTICLE_CLASSES = ["fine", "coarse", "mixed", "unknown"] as const;
export type ParticleClass = typeof PARTICLE_CLASSES[number];

export function isParticleClass(value: unknown): value is ParticleClass {
  return PARTICLE_CLASSES.some((particleClass) => particleClass === value);
}

export type SpectralBand = string;
export type SensitivityCategory = string;

export type DimDate = {
  dateId: number;
  date: string;
  year: number;
  month: number;
  day: number;
  dayOfYear: number;
};

export type DimSite = {
  siteId: number;
  siteName: string;
  latitude: number;
  longitude: number;
  elevation: number | null;
  region: string | null;
  country: string | null;
  continent: string | null;
};

export type DimWavelength = {
  wavelengthId: number;
  wavelengthNm: number;
  spectralBand: SpectralBand;
  sensitivity: SensitivityCategory;
};

export type FactAod = {
  factId: number;
  dateId: number;
  siteId: number;
  wavelengthId: number;
  particleClass: ParticleClass;
  aodValue: number;
  precipitableWater: number | null;
  angstromExponent: number | null;
};

export type StarSchemaTables = {
  factAod: FactAod[];
  dimDate: DimDate[];
  dimSite: DimSite[];
  dimWavelength: DimWavelength[];
};

export type IssueReason = "RECORD_PARSE" | "COORDINATE_INVALID";

export type DataQualityIssue = {
  reason: IssueReason;
  message: string;
  rowIndex?: number;
  siteKey?: string;
};

export type ExclusionCounts = {
  unparseableRecords: number;
  invalidSites: number;
  invalidSiteRows: number;
  unmatchedMeasurements: number;
};

export type GeoEnrichmentStatus = "applied" | "unavailable";

export type TransformReport = {
  inputRows: number;
  cleanedRows: number;
  longMeasurements: number;
  distinctSites: number;
  validSites: number;
  factRows: number;
  excluded: ExclusionCounts;
  absentWavelengthColumns: string[];
  geoEnrichment: GeoEnrichmentStatus;
  issues: DataQualityIssue[];
};

export type TransformResult = StarSchemaTables & {
  report: TransformReport;
};

export type WarehouseCounts = {
  factAod: number;
  dimDate: number;
  dimSite: number;
  dimWavelength: number;
};

export type EtlRunSummary = {
  runId: string;
  sourcePath: string;
  startedAt: string;
  finishedAt: string;
  report: TransformReport;
  loaded: WarehouseCounts;
};
