import type { ParticleClass } from "@aerosol-dw/types";

export type RawValue = string | number | null;

export type RawRow = Record<string, RawValue>;

export type RawTable = {
  columns: string[];
  rows: RawRow[];
};

export type WavelengthColumn = {
  wavelengthNm: number;
  column: string;
};

export type SourceColumns = {
  site: string;
  latitude: string;
  longitude: string;
  elevation: string;
  date: string;
  angstromExponent: string;
  precipitableWater: string;
};

export type CleanedRecord = {
  rowIndex: number;
  siteName: string;
  latitude: number | null;
  longitude: number | null;
  elevation: number | null;
  date: string;
  aod: Record<string, number | null>;
  angstromExponent: number | null;
  precipitableWater: number | null;
  coordinatesValid: boolean;
};

export type ClassifiedRecord = CleanedRecord & {
  particleClass: ParticleClass;
};

export type SiteNaturalKey = {
  siteName: string;
  latitude: number | null;
  longitude: number | null;
  elevation: number | null;
};

export type LongMeasurement = {
  site: SiteNaturalKey;
  date: string;
  wavelengthNm: number;
  column: string;
  aodValue: number;
  particleClass: ParticleClass;
  precipitableWater: number | null;
  angstromExponent: number | null;
};

export type GeoLocation = {
  country: string | null;
  continent: string | null;
  region: string | null;
};

export interface GeoLookup {
  lookup(latitude: number, longitude: number): GeoLocation | null;
}

export type SpectralRule = {
  label: string;
  maxNm?: number;
  maxInclusive?: boolean;
};

export type SpectralRules = {
  bands: SpectralRule[];
  sensitivity: SpectralRule[];
};
