import { promises as fs } from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { RawRow, RawTable } from "./types.js";

const csvRecords = z.array(z.array(z.string()));

export type ExtractOptions = {
  /** AERONET exports carry a few metadata lines above the header row. */
  skipLines?: number;
};

export function parseRawTable(content: string, options: ExtractOptions = {}): RawTable {
  const records = csvRecords.parse(parse(content, {
    from_line: (options.skipLines ?? 0) + 1,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true
  }));

  const [header, ...body] = records;
  if (!header) return { columns: [], rows: [] };

  const rows = body.map((cells) => {
    const row: RawRow = {};
    header.forEach((column, idx) => {
      const cell = cells[idx];
      row[column] = cell === undefined || cell === "" ? null : cell;
    });
    return row;
  });

  return { columns: header, rows };
}

export async function readRawTable(csvPath: string, options: ExtractOptions = {}): Promise<RawTable> {
  const content = await fs.readFile(csvPath, "utf8");
  return parseRawTable(content, options);
}
