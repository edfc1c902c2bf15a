import { promises as fs } from "node:fs";
import { booleanPointInPolygon, point } from "@turf/turf";
import type { MultiPolygon, Polygon } from "geojson";
import { z } from "zod";
import type { GeoLocation, GeoLookup } from "../types.js";

const position = z.array(z.number()).min(2);

const polygonGeometry = z.object({
  type: z.literal("Polygon"),
  coordinates: z.array(z.array(position))
});

const multiPolygonGeometry = z.object({
  type: z.literal("MultiPolygon"),
  coordinates: z.array(z.array(z.array(position)))
});

const featureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(z.object({
    type: z.literal("Feature"),
    properties: z.record(z.unknown()).nullable().default(null),
    // Points and lines cannot contain a site; drop them.
    geometry: z.union([polygonGeometry, multiPolygonGeometry]).nullable().catch(null)
  }))
});

export type BoundaryPropertyNames = {
  country: string;
  continent: string;
  region: string;
};

/** Natural Earth admin-0 attribute names. */
export const NATURAL_EARTH_PROPERTIES: BoundaryPropertyNames = {
  country: "ADMIN",
  continent: "CONTINENT",
  region: "SUBREGION"
};

type CountryBoundary = GeoLocation & {
  geometry: Polygon | MultiPolygon;
};

function textProperty(properties: Record<string, unknown> | null, name: string): string | null {
  const value = properties?.[name];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

export class CountryBoundaryLookup implements GeoLookup {
  private readonly boundaries: CountryBoundary[];

  constructor(boundaries: CountryBoundary[]) {
    this.boundaries = boundaries;
  }

  static fromGeoJson(input: unknown, names: BoundaryPropertyNames = NATURAL_EARTH_PROPERTIES): CountryBoundaryLookup {
    const collection = featureCollectionSchema.parse(input);
    const boundaries: CountryBoundary[] = [];
    for (const feature of collection.features) {
      if (!feature.geometry) continue;
      boundaries.push({
        geometry: feature.geometry,
        country: textProperty(feature.properties, names.country),
        continent: textProperty(feature.properties, names.continent),
        region: textProperty(feature.properties, names.region)
      });
    }
    return new CountryBoundaryLookup(boundaries);
  }

  get size(): number {
    return this.boundaries.length;
  }

  lookup(latitude: number, longitude: number): GeoLocation | null {
    const site = point([longitude, latitude]);
    // Strictly inside first, then allow sites sitting on a border.
    const match = this.boundaries.find((boundary) => booleanPointInPolygon(site, boundary.geometry, { ignoreBoundary: true }))
      ?? this.boundaries.find((boundary) => booleanPointInPolygon(site, boundary.geometry));
    if (!match) return null;
    return { country: match.country, continent: match.continent, region: match.region };
  }
}

export async function loadCountryBoundaries(
  filePath: string,
  names: BoundaryPropertyNames = NATURAL_EARTH_PROPERTIES
): Promise<CountryBoundaryLookup> {
  const raw = await fs.readFile(filePath, "utf8");
  return CountryBoundaryLookup.fromGeoJson(JSON.parse(raw), names);
}
