import type { ArchiveKind } from "../types/auth.js";
import type { ExportArtifact, ResultTable } from "../types/batch.js";
import { rowsOrThrow, type QueryEngine } from "./remote/queryClient.js";
import { csvArtifact } from "./resultExport.js";
import { archiveBatchNamesStatement, archiveRowsStatement, type WarehouseTables } from "./sqlStatements.js";

/** Read-only access to the batch-tagged archive tables. */
export class ArchiveService {
  constructor(
    private readonly query: QueryEngine,
    private readonly tables: WarehouseTables
  ) {}

  async listBatchNames(kind: ArchiveKind): Promise<string[]> {
    const rows = rowsOrThrow(await this.query.execute(archiveBatchNamesStatement(this.tables, kind)));
    return rows
      .map((row) => row.batch_name)
      .filter((name): name is string => typeof name === "string" && name.length > 0);
  }

  async fetchArchive(kind: ArchiveKind, batchName: string): Promise<ResultTable> {
    const outcome = await this.query.execute(archiveRowsStatement(this.tables, kind), [{ name: "batch_name", value: batchName }]);
    const rows = rowsOrThrow(outcome);
    return { columns: outcome.ok ? outcome.columns : [], rows };
  }

  async exportCsv(kind: ArchiveKind, batchName: string): Promise<ExportArtifact> {
    const table = await this.fetchArchive(kind, batchName);
    return csvArtifact(kind === "invoices" ? "invoices_csv" : "checks_csv", `${kind}_${batchName}.csv`, table);
  }
}
