export type Role = "operational" | "reporting";

export type GateAction = "submit_batch" | "manage_batch" | "browse_archive";

export type Language = "en" | "ar";

export type ArchiveKind = "invoices" | "checks";

export interface CachedBatchList {
  names: string[];
  fetchedAt: number;
}

export interface SessionContext {
  sessionId: string;
  role: Role;
  language: Language;
  archiveBatchLists: Partial<Record<ArchiveKind, CachedBatchList>>;
  createdAt: string;
  expiresAt: number;
}
