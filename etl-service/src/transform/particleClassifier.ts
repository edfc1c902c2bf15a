import type { ParticleClass } from "@aerosol-dw/types";
import type { CleanedRecord, ClassifiedRecord } from "../types.js";

/** Exponents at or above this are fine-mode dominated. */
export const FINE_THRESHOLD = 1.5;
/** Exponents at or below this are coarse-mode dominated. */
export const COARSE_THRESHOLD = 1.0;

export function classifyParticle(angstromExponent: number | null): ParticleClass {
  if (angstromExponent === null || Number.isNaN(angstromExponent)) return "unknown";
  if (angstromExponent >= FINE_THRESHOLD) return "fine";
  if (angstromExponent <= COARSE_THRESHOLD) return "coarse";
  return "mixed";
}

export function classifyRecords(records: readonly CleanedRecord[]): ClassifiedRecord[] {
  return records.map((record) => ({
    ...record,
    particleClass: classifyParticle(record.angstromExponent)
  }));
}
