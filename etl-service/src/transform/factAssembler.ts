import type { FactAod } from "@aerosol-dw/types";
import type { LongMeasurement } from "../types.js";
import type { Dimensions } from "./dimensionBuilder.js";
import { siteKey } from "./siteEnricher.js";

export type FactAssembly = {
  facts: FactAod[];
  unmatched: number;
};

type KeyedFact = Omit<FactAod, "factId">;

export function assembleFacts(
  measurements: readonly LongMeasurement[],
  dimensions: Pick<Dimensions, "dateIds" | "siteIds" | "wavelengthIds">
): FactAssembly {
  const keyed: KeyedFact[] = [];
  let unmatched = 0;

  for (const measurement of measurements) {
    const dateId = dimensions.dateIds.get(measurement.date);
    const siteId = dimensions.siteIds.get(siteKey(measurement.site));
    const wavelengthId = dimensions.wavelengthIds.get(measurement.wavelengthNm);
    if (dateId === undefined || siteId === undefined || wavelengthId === undefined) {
      unmatched++;
      continue;
    }
    keyed.push({
      dateId,
      siteId,
      wavelengthId,
      particleClass: measurement.particleClass,
      aodValue: measurement.aodValue,
      precipitableWater: measurement.precipitableWater,
      angstromExponent: measurement.angstromExponent
    });
  }

  // Array#sort is stable, so duplicate (date, site, wavelength) rows keep input order.
  keyed.sort((a, b) => a.dateId - b.dateId || a.siteId - b.siteId || a.wavelengthId - b.wavelengthId);

  return {
    facts: keyed.map((fact, idx) => ({ factId: idx + 1, ...fact })),
    unmatched
  };
}
