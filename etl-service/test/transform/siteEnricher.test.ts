import { describe, expect, it, vi } from "vitest";
import { enrichSites, siteKey } from "../../src/transform/siteEnricher.js";
import type { CleanedRecord, GeoLookup } from "../../src/types.js";

function record(siteName: string, latitude: number | null, longitude: number | null, overrides: Partial<CleanedRecord> = {}): CleanedRecord {
  return {
    rowIndex: 0,
    siteName,
    latitude,
    longitude,
    elevation: 10,
    date: "2021-01-01",
    aod: {},
    angstromExponent: null,
    precipitableWater: null,
    coordinatesValid: true,
    ...overrides
  };
}

describe("enrichSites", () => {
  it("deduplicates on name, latitude, longitude and elevation", () => {
    const result = enrichSites([
      record("Alpha", 10, 20),
      record("Alpha", 10, 20, { date: "2021-01-02" }),
      record("Alpha", 10, 20, { elevation: 12 }),
      record("Beta", -5, 30)
    ]);

    expect(result.distinctSites).toBe(3);
    expect(result.sites.map((site) => [site.siteName, site.elevation])).toEqual([
      ["Alpha", 10],
      ["Alpha", 12],
      ["Beta", 10]
    ]);
  });

  it("excludes out-of-range sites and counts the rows that referenced them", () => {
    const result = enrichSites([
      record("Good", 45, 90),
      record("TooNorth", 91, 0),
      record("TooNorth", 91, 0, { date: "2021-01-02" }),
      record("TooWest", 0, -181),
      record("NoCoords", null, 5)
    ]);

    expect(result.sites.map((site) => site.siteName)).toEqual(["Good"]);
    expect(result.rejected).toHaveLength(3);
    expect(result.invalidSiteRows).toBe(4);
    expect(result.rejected[0].toIssue()).toEqual({
      reason: "COORDINATE_INVALID",
      message: 'Site "TooNorth" has invalid coordinates (lat=91, lon=0)',
      siteKey: siteKey({ siteName: "TooNorth", latitude: 91, longitude: 0, elevation: 10 })
    });
  });

  it("leaves geography unset when no lookup is injected", () => {
    const result = enrichSites([record("Alpha", 10, 20)]);

    expect(result.geoEnrichment).toBe("unavailable");
    expect(result.sites[0]).toMatchObject({ country: null, continent: null, region: null });
  });

  it("attaches geography from an injected lookup", () => {
    const lookup: GeoLookup = {
      lookup: vi.fn((latitude: number) => latitude > 0
        ? { country: "Northland", continent: "Upper", region: "North Region" }
        : null)
    };

    const result = enrichSites([record("North", 10, 20), record("South", -10, 20)], { geoLookup: lookup });

    expect(result.geoEnrichment).toBe("applied");
    expect(lookup.lookup).toHaveBeenCalledWith(10, 20);
    expect(result.sites[0]).toMatchObject({ country: "Northland", continent: "Upper", region: "North Region" });
    expect(result.sites[1]).toMatchObject({ country: null, continent: null, region: null });
  });

  it("keeps going when the lookup throws for a site", () => {
    const lookup: GeoLookup = {
      lookup: () => {
        throw new Error("boundary index corrupt");
      }
    };

    const result = enrichSites([record("Alpha", 10, 20)], { geoLookup: lookup });

    expect(result.sites).toHaveLength(1);
    expect(result.sites[0].country).toBeNull();
  });
});
