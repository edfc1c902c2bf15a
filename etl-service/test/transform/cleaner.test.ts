import { describe, expect, it } from "vitest";
import { SchemaMismatchError } from "../../src/errors.js";
import {
  SENTINEL,
  cleanRecords,
  isValidCoordinatePair,
  parseCalendarDate,
  toMeasurement
} from "../../src/transform/cleaner.js";
import { TEST_WAVELENGTHS, aeronetRow, aeronetTable } from "../testUtils/rawTable.js";

describe("toMeasurement", () => {
  it("turns the sentinel into null in every spelling", () => {
    expect(toMeasurement(-999)).toBeNull();
    expect(toMeasurement("-999")).toBeNull();
    expect(toMeasurement("-999.0")).toBeNull();
    expect(toMeasurement(" -999.000 ")).toBeNull();
  });

  it("coerces non-numeric tokens to null instead of throwing", () => {
    expect(toMeasurement("N/A")).toBeNull();
    expect(toMeasurement("1.2abc")).toBeNull();
    expect(toMeasurement("")).toBeNull();
    expect(toMeasurement(null)).toBeNull();
    expect(toMeasurement(Number.NaN)).toBeNull();
  });

  it("parses numeric strings and passes numbers through", () => {
    expect(toMeasurement("0.125")).toBe(0.125);
    expect(toMeasurement("1e-3")).toBe(0.001);
    expect(toMeasurement(-998.5)).toBe(-998.5);
    expect(toMeasurement(0)).toBe(0);
  });
});

describe("parseCalendarDate", () => {
  it("reads AERONET dd:mm:yyyy dates", () => {
    expect(parseCalendarDate("01:06:2021")).toBe("2021-06-01");
    expect(parseCalendarDate("9:1:2020")).toBe("2020-01-09");
  });

  it("reads ISO dates and drops the time of day", () => {
    expect(parseCalendarDate("2021-06-01")).toBe("2021-06-01");
    expect(parseCalendarDate("2021-06-01T12:00:00Z")).toBe("2021-06-01");
  });

  it("rejects impossible or malformed dates", () => {
    expect(parseCalendarDate("31:02:2021")).toBeNull();
    expect(parseCalendarDate("2021/06/01")).toBeNull();
    expect(parseCalendarDate("")).toBeNull();
    expect(parseCalendarDate(20210601)).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
  });
});

describe("isValidCoordinatePair", () => {
  it("accepts the inclusive range edges", () => {
    expect(isValidCoordinatePair(90, 180)).toBe(true);
    expect(isValidCoordinatePair(-90, -180)).toBe(true);
  });

  it("rejects out-of-range or missing values", () => {
    expect(isValidCoordinatePair(90.1, 0)).toBe(false);
    expect(isValidCoordinatePair(0, -180.5)).toBe(false);
    expect(isValidCoordinatePair(null, 10)).toBe(false);
  });
});

describe("cleanRecords", () => {
  it("never lets the sentinel through to cleaned output", () => {
    const table = aeronetTable([
      aeronetRow({ "AOD_340nm": 0.5, "440-870_Angstrom_Exponent": "-999", "Precipitable_Water(cm)": "-999.0" }),
      aeronetRow({ "Site_Elevation(m)": -999, "AOD_870nm": "0.2" })
    ]);

    const { records, errors } = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(errors).toEqual([]);
    expect(records).toHaveLength(2);
    for (const record of records) {
      const values = [
        record.latitude,
        record.longitude,
        record.elevation,
        record.angstromExponent,
        record.precipitableWater,
        ...Object.values(record.aod)
      ];
      expect(values).not.toContain(SENTINEL);
    }
    expect(records[0].aod).toEqual({ "AOD_340nm": 0.5, "AOD_500nm": null, "AOD_870nm": null });
    expect(records[0].angstromExponent).toBeNull();
    expect(records[0].precipitableWater).toBeNull();
    expect(records[1].elevation).toBeNull();
    expect(records[1].aod["AOD_870nm"]).toBe(0.2);
  });

  it("excludes rows with unparseable dates and keeps going", () => {
    const table = aeronetTable([
      aeronetRow({ "Date(dd:mm:yyyy)": "not-a-date" }),
      aeronetRow({ "Date(dd:mm:yyyy)": "02:06:2021" })
    ]);

    const { records, errors } = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(records.map((record) => record.date)).toEqual(["2021-06-02"]);
    expect(records[0].rowIndex).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].rowIndex).toBe(0);
    expect(errors[0].reason).toBe("RECORD_PARSE");
    expect(errors[0].message).toBe('Row 0: unparseable date "not-a-date"');
  });

  it("excludes rows without a site name", () => {
    const table = aeronetTable([
      aeronetRow({ "AERONET_Site": "  " }),
      aeronetRow({ "AERONET_Site": -999 })
    ]);

    const { records, errors } = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(records).toEqual([]);
    expect(errors.map((error) => error.message)).toEqual([
      "Row 0: missing site name",
      "Row 1: missing site name"
    ]);
  });

  it("flags invalid coordinate pairs without dropping the row", () => {
    const table = aeronetTable([
      aeronetRow({ "Site_Latitude(Degrees)": 95 }),
      aeronetRow({ "Site_Longitude(Degrees)": "-999" }),
      aeronetRow()
    ]);

    const { records } = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(records.map((record) => record.coordinatesValid)).toEqual([false, false, true]);
    expect(records[1].longitude).toBeNull();
  });

  it("swaps latitude and longitude only when repair is enabled", () => {
    const table = aeronetTable([
      aeronetRow({ "Site_Latitude(Degrees)": 120.25, "Site_Longitude(Degrees)": 30.5 })
    ]);

    const plain = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });
    expect(plain.records[0]).toMatchObject({ latitude: 120.25, longitude: 30.5, coordinatesValid: false });

    const repaired = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS, repairSwappedCoordinates: true });
    expect(repaired.records[0]).toMatchObject({ latitude: 30.5, longitude: 120.25, coordinatesValid: true });
  });

  it("reports configured wavelength columns the input does not carry", () => {
    const table = aeronetTable([aeronetRow({ "AOD_340nm": 0.4 })], TEST_WAVELENGTHS.slice(0, 2));

    const result = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(result.presentWavelengths.map((wavelength) => wavelength.wavelengthNm)).toEqual([340, 500]);
    expect(result.absentWavelengthColumns).toEqual(["AOD_870nm"]);
    expect(Object.keys(result.records[0].aod)).toEqual(["AOD_340nm", "AOD_500nm"]);
  });

  it("treats optional measurement columns that are absent as missing", () => {
    const table = {
      columns: ["AERONET_Site", "Date(dd:mm:yyyy)", "Site_Latitude(Degrees)", "Site_Longitude(Degrees)", "AOD_500nm"],
      rows: [{
        "AERONET_Site": "Bare",
        "Date(dd:mm:yyyy)": "03:03:2022",
        "Site_Latitude(Degrees)": "10",
        "Site_Longitude(Degrees)": "20",
        "AOD_500nm": "0.3"
      }]
    };

    const { records } = cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });

    expect(records[0]).toMatchObject({
      elevation: null,
      angstromExponent: null,
      precipitableWater: null,
      aod: { "AOD_500nm": 0.3 }
    });
  });

  it("fails the whole batch when a required column is missing", () => {
    const table = aeronetTable([aeronetRow()]);
    table.columns = table.columns.filter((column) => column !== "Date(dd:mm:yyyy)");

    expect(() => cleanRecords(table, { wavelengths: TEST_WAVELENGTHS })).toThrow(SchemaMismatchError);
    try {
      cleanRecords(table, { wavelengths: TEST_WAVELENGTHS });
    }
    catch (err) {
      expect(err).toBeInstanceOf(SchemaMismatchError);
      expect(err).toMatchObject({ reason: "SCHEMA_MISMATCH", missingColumns: ["Date(dd:mm:yyyy)"] });
    }
  });

  it("fails the whole batch when no wavelength column is present", () => {
    const table = aeronetTable([aeronetRow()], []);

    expect(() => cleanRecords(table, { wavelengths: TEST_WAVELENGTHS }))
      .toThrow("Input table has none of the configured AOD_<value>nm wavelength columns");
  });
});
