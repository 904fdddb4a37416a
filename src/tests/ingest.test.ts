import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { parseUpload } from "../lib/ingest";
import { ParseError } from "../lib/errors";

const bytes = (s: string) => new TextEncoder().encode(s);

describe("upload parsing", () => {
  it("parses CSV and coerces numbers and missing tokens", () => {
    const table = parseUpload(bytes("name,price,qty\nWidget,9.5,3\nGadget,NA,\n"), "items.csv");

    expect(table.columns).toEqual(["name", "price", "qty"]);
    expect(table.rows).toEqual([
      { name: "Widget", price: 9.5, qty: 3 },
      { name: "Gadget", price: null, qty: null },
    ]);
  });

  it("detects a semicolon delimiter", () => {
    const table = parseUpload(bytes("t;signal\n0;3.5\n1;4.1"), "run.csv");

    expect(table.columns).toEqual(["t", "signal"]);
    expect(table.rows).toEqual([
      { t: 0, signal: 3.5 },
      { t: 1, signal: 4.1 },
    ]);
  });

  it("strips a byte order mark from the header", () => {
    const table = parseUpload(bytes("\uFEFFid,city\n1,Lyon"), "bom.csv");

    expect(table.columns).toEqual(["id", "city"]);
    expect(table.rows).toEqual([{ id: 1, city: "Lyon" }]);
  });

  it("parses a JSON array using the union of keys", () => {
    const table = parseUpload(bytes('[{"a":1},{"a":2,"b":"x"}]'), "rows.json");

    expect(table.columns).toEqual(["a", "b"]);
    expect(table.rows).toEqual([
      { a: 1, b: null },
      { a: 2, b: "x" },
    ]);
  });

  it("unwraps records under a data key", () => {
    const table = parseUpload(bytes('{"data":[{"id":7,"ok":true}]}'), "wrapped.json");

    expect(table.columns).toEqual(["id", "ok"]);
    expect(table.rows).toEqual([{ id: 7, ok: true }]);
  });

  it("parses the first sheet of an XLSX workbook", () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["time", "value"],
      [0, 10],
      [1, 12],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Run1");
    const buffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" }) as ArrayBuffer;

    const table = parseUpload(new Uint8Array(buffer), "run.xlsx");

    expect(table.columns).toEqual(["time", "value"]);
    expect(table.rows).toEqual([
      { time: 0, value: 10 },
      { time: 1, value: 12 },
    ]);
  });

  it("keeps integers beyond double precision as text", () => {
    const table = parseUpload(bytes("id,v\n9007199254740993,a\n9007199254740992,a\n42,a\n"), "ids.csv");

    expect(table.rows.map((r) => r.id)).toEqual(["9007199254740993", "9007199254740992", 42]);
  });

  it("suffixes repeated spreadsheet headers", () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["a", "a", "b"],
      [1, 2, 3],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Sheet1");
    const buffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" }) as ArrayBuffer;

    const table = parseUpload(new Uint8Array(buffer), "dupes.xlsx");

    expect(table.columns).toEqual(["a", "a_1", "b"]);
    expect(table.rows).toEqual([{ a: 1, a_1: 2, b: 3 }]);
  });

  it("rejects an empty upload", () => {
    expect(() => parseUpload(new Uint8Array(), "empty.csv")).toThrow(ParseError);
    expect(() => parseUpload(bytes("   \n"), "blank.csv")).toThrow("File is empty.");
  });

  it("rejects a header without data rows", () => {
    expect(() => parseUpload(bytes("a,b\n"), "header.csv")).toThrow("No data rows found.");
  });

  it("rejects a table without columns", () => {
    expect(() => parseUpload(bytes("[]"), "none.json")).toThrow("No columns found.");
  });

  it("rejects binary content", () => {
    expect(() => parseUpload(new Uint8Array([0x50, 0x4b, 0x00, 0x01]), "data.csv")).toThrow(ParseError);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseUpload(bytes("{not json"), "bad.json")).toThrow("Invalid JSON.");
  });

  it("rejects rows with more fields than the header", () => {
    expect(() => parseUpload(bytes("a,b\n1,2,3\n"), "wide.csv")).toThrow(ParseError);
  });

  it("rejects an unterminated quote", () => {
    expect(() => parseUpload(bytes('a,b\n"x,1\n'), "quotes.csv")).toThrow(ParseError);
  });
});
