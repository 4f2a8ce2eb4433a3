import { StoreDeleteError, StoreListError, StoreReadError, UploadError } from "../../errors.js";
import type { StoreEntry } from "../../types/remote.js";
import { fileListingSchema } from "./remoteSchemas.js";
import { describeFailure, encodeRemotePath, type RemoteHttp } from "./remoteHttp.js";

export interface ObjectStore {
  put(path: string, bytes: Buffer, signal?: AbortSignal): Promise<void>;
  get(path: string, signal?: AbortSignal): Promise<Buffer>;
  list(path: string, recursive?: boolean): Promise<StoreEntry[]>;
  delete(path: string, recursive?: boolean): Promise<void>;
}

/**
 * Path-addressed file store backed by the workspace Files API.
 * Writes overwrite silently; a missing prefix lists as empty and deletes as a no-op.
 * A recursive listing returns every file below the prefix.
 */
export class StoreClient implements ObjectStore {
  constructor(private readonly http: RemoteHttp) {}

  async put(path: string, bytes: Buffer, signal?: AbortSignal): Promise<void> {
    const response = await this.http.request("PUT", `/api/2.0/fs/files${encodeRemotePath(path)}`, {
      query: { overwrite: "true" },
      body: bytes,
      signal
    });
    if (!response.ok) {
      throw new UploadError(await describeFailure(response, "store_put"), response.status);
    }
  }

  async get(path: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.http.request("GET", `/api/2.0/fs/files${encodeRemotePath(path)}`, { signal });
    if (!response.ok) {
      throw new StoreReadError(await describeFailure(response, "store_get"), response.status);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async list(path: string, recursive = false): Promise<StoreEntry[]> {
    const response = await this.http.request("GET", `/api/2.0/fs/files${encodeRemotePath(path)}`, {
      query: recursive ? { recursive: "true" } : undefined
    });
    if (response.status === 404) return [];
    if (!response.ok) {
      throw new StoreListError(await describeFailure(response, "store_list"), response.status);
    }
    const listing = await this.http.readJson(response, fileListingSchema, "store_list");
    return listing.files.map((item) => ({
      name: item.name,
      path: item.path,
      isDirectory: item.is_directory,
      fileSize: item.file_size
    }));
  }

  async delete(path: string, recursive = true): Promise<void> {
    const response = await this.http.request("DELETE", `/api/2.0/fs/files${encodeRemotePath(path)}`, {
      query: recursive ? { recursive: "true" } : undefined
    });
    if (response.status === 404) return;
    if (!response.ok) {
      throw new StoreDeleteError(await describeFailure(response, "store_delete"), response.status);
    }
  }
}

/**
 * First path segment below `root` of each listed entry, sorted and deduplicated.
 * With `prefixesOnly`, files sitting directly in `root` are skipped.
 */
export function topLevelNames(root: string, entries: StoreEntry[], prefixesOnly = false): string[] {
  const base = `${root.replace(/\/+$/, "")}/`;
  const names = new Set<string>();
  for (const entry of entries) {
    if (!entry.path.startsWith(base)) continue;
    const rest = entry.path.slice(base.length);
    const first = rest.split("/")[0];
    if (!first) continue;
    if (prefixesOnly && !rest.includes("/") && !entry.isDirectory) continue;
    names.add(first);
  }
  return Array.from(names).sort();
}
