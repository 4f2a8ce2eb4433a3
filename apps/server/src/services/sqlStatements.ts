import type { ArchiveKind } from "../types/auth.js";

export interface WarehouseTables {
  invoicesHead: string;
  checksFlat: string;
  parsedChecks: string;
  invoicesHeadArchive: string;
  checksFlatArchive: string;
}

export function warehouseTables(namespace: string): WarehouseTables {
  return {
    invoicesHead: `${namespace}.invoices_head`,
    checksFlat: `${namespace}.checks_flat`,
    parsedChecks: `${namespace}.invoice_check_parsed`,
    invoicesHeadArchive: `${namespace}.invoices_head_archive`,
    checksFlatArchive: `${namespace}.checks_flat_archive`
  };
}

export function summaryStatement(tables: WarehouseTables): string {
  return `SELECT path, invoice_number, issue_date, final_decision
FROM ${tables.invoicesHead}
ORDER BY path`;
}

export function failedChecksStatement(tables: WarehouseTables): string {
  return `SELECT h.path, h.invoice_number, h.issue_date, h.final_decision,
       c.id AS failed_rule_id, c.name AS failed_rule_name, c.reason AS failed_reason
FROM ${tables.invoicesHead} h
JOIN ${tables.checksFlat} c ON h.path = c.path
WHERE c.result = 'fail'
ORDER BY h.path, c.id`;
}

/** Both statements bind `:batch_name`. Invoices go first, then checks. */
export function archiveStatements(tables: WarehouseTables): string[] {
  return [
    `INSERT INTO ${tables.invoicesHeadArchive} SELECT *, :batch_name AS batch_name FROM ${tables.invoicesHead}`,
    `INSERT INTO ${tables.checksFlatArchive} SELECT *, :batch_name AS batch_name FROM ${tables.checksFlat}`
  ];
}

export function truncateStatements(tables: WarehouseTables): string[] {
  return [tables.invoicesHead, tables.checksFlat, tables.parsedChecks].map((table) => `TRUNCATE TABLE ${table}`);
}

function archiveTable(tables: WarehouseTables, kind: ArchiveKind): string {
  return kind === "invoices" ? tables.invoicesHeadArchive : tables.checksFlatArchive;
}

export function archiveBatchNamesStatement(tables: WarehouseTables, kind: ArchiveKind): string {
  return `SELECT DISTINCT batch_name FROM ${archiveTable(tables, kind)} ORDER BY batch_name DESC`;
}

export function archiveRowsStatement(tables: WarehouseTables, kind: ArchiveKind): string {
  const order = kind === "invoices" ? "path" : "path, id";
  return `SELECT * FROM ${archiveTable(tables, kind)} WHERE batch_name = :batch_name ORDER BY ${order}`;
}

export const WAREHOUSE_PING_STATEMENT = "SELECT current_date() AS today";
