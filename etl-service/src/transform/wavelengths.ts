import type { SpectralRule, SpectralRules, WavelengthColumn } from "../types.js";

const WAVELENGTH_COLUMN_PATTERN = /^AOD_(\d+(?:\.\d+)?)nm$/;

/** Wavelengths (nm) published in the AERONET level 2.0 daily-average export. */
export const AERONET_WAVELENGTHS_NM = [
  340, 380, 400, 440, 443, 490, 500, 510, 532, 551, 555,
  560, 620, 667, 675, 681, 709, 779, 865, 870, 1020, 1640
] as const;

export function wavelengthColumnId(wavelengthNm: number): string {
  return `AOD_${wavelengthNm}nm`;
}

export function parseWavelengthColumn(column: string): number | null {
  const match = WAVELENGTH_COLUMN_PATTERN.exec(column.trim());
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) && value > 0 ? value : null;
}

export function wavelengthColumnsFrom(columns: readonly string[]): WavelengthColumn[] {
  const seen = new Set<number>();
  const out: WavelengthColumn[] = [];
  for (const column of columns) {
    const wavelengthNm = parseWavelengthColumn(column);
    if (wavelengthNm === null) {
      throw new Error(`Invalid wavelength column identifier "${column}". Expected AOD_<value>nm.`);
    }
    if (seen.has(wavelengthNm)) {
      throw new Error(`Duplicate wavelength column for ${wavelengthNm} nm`);
    }
    seen.add(wavelengthNm);
    out.push({ wavelengthNm, column: column.trim() });
  }
  return out;
}

export const DEFAULT_WAVELENGTH_COLUMNS: WavelengthColumn[] = AERONET_WAVELENGTHS_NM.map((wavelengthNm) => ({
  wavelengthNm,
  column: wavelengthColumnId(wavelengthNm)
}));

export const DEFAULT_BAND_RULES: SpectralRule[] = [
  { label: "UV", maxNm: 400, maxInclusive: false },
  { label: "VIS", maxNm: 700, maxInclusive: true },
  { label: "NIR" }
];

export const DEFAULT_SENSITIVITY_RULES: SpectralRule[] = [
  { label: "fine-sensitive", maxNm: 500, maxInclusive: true },
  { label: "balanced", maxNm: 800, maxInclusive: false },
  { label: "coarse-sensitive" }
];

export const DEFAULT_SPECTRAL_RULES: SpectralRules = {
  bands: DEFAULT_BAND_RULES,
  sensitivity: DEFAULT_SENSITIVITY_RULES
};

export const UNCLASSIFIED_LABEL = "unclassified";

/**
 * First rule whose upper bound admits the wavelength wins; a rule without
 * `maxNm` catches everything that reaches it.
 */
export function labelWavelength(wavelengthNm: number, rules: readonly SpectralRule[]): string {
  for (const rule of rules) {
    if (rule.maxNm === undefined) return rule.label;
    const within = rule.maxInclusive ? wavelengthNm <= rule.maxNm : wavelengthNm < rule.maxNm;
    if (within) return rule.label;
  }
  return UNCLASSIFIED_LABEL;
}
