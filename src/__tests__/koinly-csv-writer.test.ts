import { describe, it, expect } from "vitest";
import { serializeTargetCsv } from "../lib/koinly-csv-writer";
import { INVALID_ROW } from "../lib/constants";
import type { TargetRow } from "../types";

const HEADER_LINE =
  "Date,Sent Amount,Sent Currency,Received Amount,Received Currency,Fee Amount,Fee Currency," +
  "Net Worth Amount,Net Worth Currency,Label,Description,TxHash";

describe("Koinly CSV Writer", () => {
  it("should write only the header for no rows", () => {
    expect(serializeTargetCsv([])).toBe(`${HEADER_LINE}\r\n`);
  });

  it("should write one CRLF-terminated line per row", () => {
    const row: TargetRow = ["2023-12-25 10:00 UTC", "", "", "0.0123", "BTC", "", "", "", "", "", "Compra", ""];

    expect(serializeTargetCsv([row])).toBe(`${HEADER_LINE}\r\n2023-12-25 10:00 UTC,,,0.0123,BTC,,,,,,Compra,\r\n`);
  });

  it("should quote fields containing commas or quotes", () => {
    const row: TargetRow = ["d", "", "", "", "", "", "", "", "", "", 'Compra, "spot"', ""];

    expect(serializeTargetCsv([row])).toBe(`${HEADER_LINE}\r\nd,,,,,,,,,,"Compra, ""spot""",\r\n`);
  });

  it("should quote fields with a leading or trailing space", () => {
    const row: TargetRow = ["d", "", "", "", "", "", "", "", "", "", " Compra ", ""];

    expect(serializeTargetCsv([row])).toBe(`${HEADER_LINE}\r\nd,,,,,,,,,," Compra ",\r\n`);
  });

  it("should write accented descriptions unchanged", () => {
    const row: TargetRow = ["d", "", "", "", "", "1.50", "BRL", "", "", "", "Taxa de Transação", ""];

    expect(serializeTargetCsv([row])).toBe(`${HEADER_LINE}\r\nd,,,,,1.50,BRL,,,,Taxa de Transação,\r\n`);
  });

  it("should write invalid rows", () => {
    const lines = serializeTargetCsv([INVALID_ROW]).split("\r\n");

    expect(lines[1]).toBe(Array(12).fill("Invalid Row").join(","));
  });
});
