import * as XLSX from "xlsx";
import type { BatchResults, ExportArtifact, ResultTable } from "../types/batch.js";

const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
const CSV_CONTENT_TYPE = "text/csv; charset=utf-8";

function tableToSheet(table: ResultTable): XLSX.WorkSheet {
  const matrix = [table.columns, ...table.rows.map((row) => table.columns.map((column) => row[column] ?? null))];
  return XLSX.utils.aoa_to_sheet(matrix);
}

/** Sheets keep their header row even when a table has no rows. */
export function buildWorkbook(sheets: Record<string, ResultTable>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, table] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, tableToSheet(table), name);
  }
  const data: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return data;
}

export function toCsv(table: ResultTable): string {
  return XLSX.utils.sheet_to_csv(tableToSheet(table));
}

export function csvArtifact(kind: ExportArtifact["kind"], filename: string, table: ResultTable): ExportArtifact {
  return { kind, filename, contentType: CSV_CONTENT_TYPE, data: Buffer.from(toCsv(table), "utf8") };
}

export function buildBatchExports(batchName: string, results: BatchResults): ExportArtifact[] {
  return [
    {
      kind: "xlsx",
      filename: `vat_compliance_results_${batchName}.xlsx`,
      contentType: XLSX_CONTENT_TYPE,
      data: buildWorkbook({ Summary: results.summary, "Failed Checks": results.failedChecks })
    },
    csvArtifact("invoices_csv", `invoices_${batchName}.csv`, results.summary),
    csvArtifact("checks_csv", `checks_${batchName}.csv`, results.failedChecks)
  ];
}
