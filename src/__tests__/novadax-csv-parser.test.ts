import { describe, it, expect } from "vitest";
import { parseSourceCsv } from "../lib/novadax-csv-parser";

const HEADER = "Data,Tipo,Moeda,Valor,Status";

describe("NovaDAX CSV Parser", () => {
  describe("parseSourceCsv", () => {
    it("should split header and data rows", () => {
      const csv = `${HEADER}\n25/12/2023 10:00:00,Compra,BTC,0.5,Concluído\n26/12/2023 11:00:00,Venda,BTC,0.1,Concluído`;

      const result = parseSourceCsv(csv);

      expect(result.header).toEqual(["Data", "Tipo", "Moeda", "Valor", "Status"]);
      expect(result.rows).toEqual([
        ["25/12/2023 10:00:00", "Compra", "BTC", "0.5", "Concluído"],
        ["26/12/2023 11:00:00", "Venda", "BTC", "0.1", "Concluído"],
      ]);
      expect(result.errors).toEqual([]);
    });

    it("should keep quoted amounts with commas in one field", () => {
      const csv = `${HEADER}\n01/01/2024 00:00:00,Depósito em Reais,BRL,"R$ 1.234,56",Concluído`;

      const result = parseSourceCsv(csv);

      expect(result.rows[0][3]).toBe("R$ 1.234,56");
      expect(result.rows[0]).toHaveLength(5);
    });

    it("should handle CRLF line endings", () => {
      const csv = `${HEADER}\r\n01/01/2024 00:00:00,Compra,BTC,1,OK\r\n`;

      const result = parseSourceCsv(csv);

      expect(result.rows).toEqual([["01/01/2024 00:00:00", "Compra", "BTC", "1", "OK"]]);
    });

    it("should drop trailing blank lines", () => {
      const csv = `${HEADER}\n01/01/2024 00:00:00,Compra,BTC,1,OK\n\n\n`;

      expect(parseSourceCsv(csv).rows).toHaveLength(1);
    });

    it("should keep a trailing row of empty fields", () => {
      const csv = `${HEADER}\n01/01/2024 00:00:00,Compra,BTC,1,OK\n,,,,\n`;

      const result = parseSourceCsv(csv);

      expect(result.rows).toEqual([
        ["01/01/2024 00:00:00", "Compra", "BTC", "1", "OK"],
        ["", "", "", "", ""],
      ]);
    });

    it("should keep a trailing whitespace-only line", () => {
      const csv = `${HEADER}\n01/01/2024 00:00:00,Compra,BTC,1,OK\n   \n`;

      const result = parseSourceCsv(csv);

      expect(result.rows).toHaveLength(2);
      expect(result.rows[1]).toEqual(["   "]);
    });

    it("should keep blank lines between records", () => {
      const csv = `${HEADER}\n01/01/2024 00:00:00,Compra,BTC,1,OK\n\n02/01/2024 00:00:00,Venda,BTC,1,OK`;

      const result = parseSourceCsv(csv);

      expect(result.rows).toHaveLength(3);
      expect(result.rows[1]).toEqual([""]);
    });

    it("should strip a byte order mark", () => {
      const result = parseSourceCsv(`\uFEFF${HEADER}\n01/01/2024 00:00:00,Compra,BTC,1,OK`);

      expect(result.header[0]).toBe("Data");
    });

    it("should not trim field values", () => {
      const result = parseSourceCsv(`${HEADER}\n01/01/2024 00:00:00, Compra ,BTC,1,OK`);

      expect(result.rows[0][1]).toBe(" Compra ");
    });

    it("should keep rows with extra or missing fields", () => {
      const result = parseSourceCsv(`${HEADER}\na,b,c\n1,2,3,4,5,6,7`);

      expect(result.rows).toEqual([
        ["a", "b", "c"],
        ["1", "2", "3", "4", "5", "6", "7"],
      ]);
    });

    it("should return a header and no rows for a header-only file", () => {
      const result = parseSourceCsv(`${HEADER}\n`);

      expect(result.header).toHaveLength(5);
      expect(result.rows).toEqual([]);
    });

    it("should return nothing for empty content", () => {
      const result = parseSourceCsv("");

      expect(result.header).toEqual([]);
      expect(result.rows).toEqual([]);
    });

    it("should report an unterminated quote as an error", () => {
      const result = parseSourceCsv(`${HEADER}\n01/01/2024 00:00:00,Compra,BTC,"1,OK`);

      expect(result.errors.length).toBeGreaterThan(0);
    });
  });
});
