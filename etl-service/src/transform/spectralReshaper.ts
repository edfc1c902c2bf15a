import type { ClassifiedRecord, LongMeasurement, WavelengthColumn } from "../types.js";

/**
 * Wide to long: one measurement per (record, wavelength) pair with a value.
 * Iterates the configured column list; missing values are not emitted.
 */
export function reshapeSpectral(
  records: readonly ClassifiedRecord[],
  wavelengths: readonly WavelengthColumn[]
): LongMeasurement[] {
  const out: LongMeasurement[] = [];
  for (const record of records) {
    const site = {
      siteName: record.siteName,
      latitude: record.latitude,
      longitude: record.longitude,
      elevation: record.elevation
    };
    for (const wavelength of wavelengths) {
      const aodValue = record.aod[wavelength.column];
      if (aodValue === null || aodValue === undefined) continue;
      out.push({
        site,
        date: record.date,
        wavelengthNm: wavelength.wavelengthNm,
        column: wavelength.column,
        aodValue,
        particleClass: record.particleClass,
        precipitableWater: record.precipitableWater,
        angstromExponent: record.angstromExponent
      });
    }
  }
  return out;
}
