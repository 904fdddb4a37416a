// src/lib/ingest.ts
import Papa from "papaparse";
import * as XLSX from "xlsx";
import type { Cell, Table } from "./types";
import { ParseError } from "./errors";
import { coerceValue } from "./stats";

type Format = "csv" | "json" | "xlsx";

const WRAPPER_KEYS = ["data", "items", "results", "records"];

function formatOf(filename: string): Format {
  const ext = filename.toLowerCase().split(".").pop() ?? "";
  if (ext === "json") return "json";
  if (ext === "xlsx" || ext === "xls") return "xlsx";
  return "csv";
}

function decodeText(bytes: Uint8Array) {
  if (bytes.includes(0)) throw new ParseError("File looks binary, not delimited text.");
  return new TextDecoder("utf-8").decode(bytes).replace(/^\uFEFF/, "");
}

function headerName(raw: string, index: number) {
  const trimmed = raw.trim();
  return trimmed ? trimmed : `Column ${index + 1}`;
}

/** Renames repeated headers to `name_1`, `name_2`, ... the way papaparse does for CSV. */
function uniqueHeaders(names: string[]) {
  const taken = new Set(names);
  const counts = new Map<string, number>();
  return names.map((name) => {
    const n = counts.get(name) ?? 0;
    counts.set(name, n + 1);
    if (n === 0) return name;
    let suffix = n;
    while (taken.has(`${name}_${suffix}`)) suffix++;
    const renamed = `${name}_${suffix}`;
    taken.add(renamed);
    counts.set(name, suffix + 1);
    return renamed;
  });
}

/* ---------------------- CSV ---------------------- */

function parseCsv(bytes: Uint8Array): Table {
  const text = decodeText(bytes);
  if (!text.trim()) throw new ParseError("File is empty.");

  const res = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: headerName,
  });

  const fatal = res.errors.find((e) => e.type === "Quotes" || e.code === "TooManyFields");
  if (fatal) {
    const where = typeof fatal.row === "number" ? ` (row ${fatal.row + 1})` : "";
    throw new ParseError(`Malformed CSV${where}: ${fatal.message}`);
  }

  const columns = res.meta.fields ?? [];
  const rows = res.data.map((r) => {
    const out: Record<string, Cell> = {};
    for (const c of columns) out[c] = coerceValue(r[c]);
    return out;
  });
  return { columns, rows };
}

/* ---------------------- JSON ---------------------- */

function toCell(v: unknown): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === "string") return coerceValue(v);
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "boolean") return v;
  if (typeof v === "object") return v;
  return String(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function coerceToRows(data: unknown): Record<string, unknown>[] {
  const wrap = (x: unknown) => (isRecord(x) ? x : { value: x });
  if (Array.isArray(data)) return data.map(wrap);
  if (isRecord(data)) {
    for (const key of WRAPPER_KEYS) {
      const v = data[key];
      if (Array.isArray(v)) return v.map(wrap);
    }
    return [data];
  }
  return [{ value: data }];
}

function parseJson(bytes: Uint8Array): Table {
  const text = decodeText(bytes);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ParseError("Invalid JSON.", { cause: e });
  }
  const records = coerceToRows(raw);

  // union of keys, first-seen order
  const colSet = new Set<string>();
  for (const r of records) Object.keys(r).forEach((k) => colSet.add(k));
  const columns = Array.from(colSet);

  const rows = records.map((r) => {
    const out: Record<string, Cell> = {};
    for (const c of columns) out[c] = toCell(r[c]);
    return out;
  });
  return { columns, rows };
}

/* ---------------------- XLSX ---------------------- */

function sheetCell(v: unknown): Cell {
  if (v instanceof Date) {
    const iso = v.toISOString();
    return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
  }
  return toCell(v);
}

function parseXlsx(bytes: Uint8Array): Table {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: "array", cellDates: true });
  } catch (e) {
    throw new ParseError("Unreadable spreadsheet.", { cause: e });
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) throw new ParseError("Spreadsheet has no sheets.");

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
  const [headerRow = [], ...body] = matrix;
  const columns = uniqueHeaders(
    headerRow.map((h, i) => headerName(h === null || h === undefined ? "" : String(h), i)),
  );

  const rows = body.map((values) => {
    const out: Record<string, Cell> = {};
    columns.forEach((c, i) => { out[c] = sheetCell(values[i]); });
    return out;
  });
  return { columns, rows };
}

/* ---------------------- entry ---------------------- */

export function parseUpload(bytes: Uint8Array, filename: string): Table {
  if (bytes.length === 0) throw new ParseError("File is empty.");

  const format = formatOf(filename);
  const table =
    format === "json" ? parseJson(bytes) :
    format === "xlsx" ? parseXlsx(bytes) :
    parseCsv(bytes);

  if (table.columns.length === 0) throw new ParseError("No columns found.");
  if (table.rows.length === 0) throw new ParseError("No data rows found.");
  return table;
}
