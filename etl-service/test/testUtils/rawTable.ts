import type { RawRow, RawTable, WavelengthColumn } from "../../src/types.js";

export const TEST_WAVELENGTHS: WavelengthColumn[] = [
  { wavelengthNm: 340, column: "AOD_340nm" },
  { wavelengthNm: 500, column: "AOD_500nm" },
  { wavelengthNm: 870, column: "AOD_870nm" }
];

export const BASE_COLUMNS = [
  "AERONET_Site",
  "Date(dd:mm:yyyy)",
  "Site_Latitude(Degrees)",
  "Site_Longitude(Degrees)",
  "Site_Elevation(m)",
  "440-870_Angstrom_Exponent",
  "Precipitable_Water(cm)"
];

export function aeronetRow(overrides: RawRow = {}): RawRow {
  return {
    "AERONET_Site": "Test_Site",
    "Date(dd:mm:yyyy)": "01:06:2021",
    "Site_Latitude(Degrees)": 40.5,
    "Site_Longitude(Degrees)": -3.7,
    "Site_Elevation(m)": 650,
    "440-870_Angstrom_Exponent": 1.2,
    "Precipitable_Water(cm)": 1.1,
    "AOD_340nm": -999,
    "AOD_500nm": -999,
    "AOD_870nm": -999,
    ...overrides
  };
}

export function aeronetTable(rows: RawRow[], wavelengths: WavelengthColumn[] = TEST_WAVELENGTHS): RawTable {
  return {
    columns: [...BASE_COLUMNS, ...wavelengths.map((wavelength) => wavelength.column)],
    rows
  };
}
