import { test } from "node:test";
import assert from "node:assert/strict";
import { batchNotices, batchView, exportKindFromPath } from "../src/services/batchView.js";
import type { BatchRecord } from "../src/types/batch.js";

function record(overrides: Partial<BatchRecord> = {}): BatchRecord {
  return {
    batchName: "B1",
    state: "files_accepted",
    submittedBy: "operational",
    acceptedFiles: ["a.pdf", "b.pdf"],
    rejectedFiles: [],
    uploadedFiles: [],
    createdAt: "2026-10-19T08:30:05.000Z",
    updatedAt: "2026-10-19T08:30:05.000Z",
    ...overrides
  };
}

test("exportKindFromPath maps download paths to export kinds", () => {
  assert.equal(exportKindFromPath("xlsx"), "xlsx");
  assert.equal(exportKindFromPath("invoices.csv"), "invoices_csv");
  assert.equal(exportKindFromPath("checks.csv"), "checks_csv");
  assert.equal(exportKindFromPath("report.pdf"), null);
});

test("batchNotices reports skipped files and failed checks", () => {
  const notices = batchNotices(
    record({
      state: "reset",
      rejectedFiles: [{ name: "big.pdf", size: 90_000_000, reason: "file_too_large" }],
      results: {
        summary: { columns: [], rows: [] },
        failedChecks: { columns: [], rows: [] },
        invoices: [],
        failures: [
          { path: "/b.pdf", invoiceNumber: "INV-2", issueDate: null, finalDecision: "fail", ruleId: "R01", ruleName: null, reason: null },
          { path: "/b.pdf", invoiceNumber: "INV-2", issueDate: null, finalDecision: "fail", ruleId: "R02", ruleName: null, reason: null }
        ],
        allPassed: false
      }
    }),
    "en",
    75
  );
  assert.deepEqual(notices, [
    "Received 2 file(s).",
    "1 file(s) exceed 75 MB and were skipped: big.pdf",
    "2 failed check(s) found.",
    "Session archived and reset (B1)."
  ]);
});

test("batchNotices lists non-PDF uploads apart from oversized ones", () => {
  const notices = batchNotices(
    record({
      rejectedFiles: [
        { name: "scan.png", size: 10, reason: "unsupported_type" },
        { name: "big.pdf", size: 90_000_000, reason: "file_too_large" },
        { name: "notes.docx", size: 20, reason: "unsupported_type" }
      ]
    }),
    "en",
    75
  );
  assert.deepEqual(notices, [
    "Received 2 file(s).",
    "1 file(s) exceed 75 MB and were skipped: big.pdf",
    "2 file(s) are not PDFs and were skipped: scan.png, notes.docx"
  ]);
});

test("batchNotices says results are unavailable when fetching failed", () => {
  const notices = batchNotices(record({ state: "aborted", failedStep: "fetch", errorCode: "query_failed" }), "en", 75);
  assert.deepEqual(notices, ["Received 2 file(s).", "Results could not be fetched; nothing was archived."]);
});

test("batchView replaces export bytes with download links", () => {
  const view = batchView(
    record({
      batchName: "Sept14_Invoices",
      exports: [
        { kind: "xlsx", filename: "vat_compliance_results_Sept14_Invoices.xlsx", contentType: "application/octet-stream", data: Buffer.from("x") },
        { kind: "checks_csv", filename: "checks_Sept14_Invoices.csv", contentType: "text/csv", data: Buffer.from("y") }
      ]
    }),
    "ar",
    75
  );
  assert.deepEqual(view.downloads, [
    { kind: "xlsx", filename: "vat_compliance_results_Sept14_Invoices.xlsx", url: "/api/batches/Sept14_Invoices/export/xlsx" },
    { kind: "checks_csv", filename: "checks_Sept14_Invoices.csv", url: "/api/batches/Sept14_Invoices/export/checks.csv" }
  ]);
  assert.deepEqual(view.notices, ["تم استلام 2 ملف(ات)."]);
  assert.equal(view.results, undefined);
});
