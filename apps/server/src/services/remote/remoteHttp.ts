import type { z } from "zod";
import { BatchCancelledError, RemoteResponseError } from "../../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RemoteConnection {
  baseUrl: string;
  token: string;
  fetch?: FetchLike;
}

interface RequestOptions {
  query?: Record<string, string>;
  json?: unknown;
  body?: Buffer;
  signal?: AbortSignal;
}

/**
 * Thin authenticated transport over the remote workspace REST API.
 * Clients build on it; it does not interpret status codes.
 */
export class RemoteHttp {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;

  constructor(connection: RemoteConnection) {
    this.baseUrl = connection.baseUrl.replace(/\/+$/, "");
    this.token = connection.token;
    this.fetchImpl = connection.fetch ?? ((input, init) => fetch(input, init));
  }

  url(path: string, query?: Record<string, string>): string {
    const search = query ? new URLSearchParams(query).toString() : "";
    return `${this.baseUrl}${path}${search ? `?${search}` : ""}`;
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.token}` };
    let body: string | Uint8Array | undefined;
    if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    } else if (options.body) {
      headers["Content-Type"] = "application/octet-stream";
      body = new Uint8Array(options.body);
    }

    if (options.signal?.aborted) throw new BatchCancelledError();
    try {
      return await this.fetchImpl(this.url(path, options.query), {
        method,
        headers,
        body,
        signal: options.signal
      });
    } catch (error) {
      if (options.signal?.aborted) throw new BatchCancelledError();
      throw error;
    }
  }

  async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const payload: unknown = await response.json().catch(() => undefined);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteResponseError(`${what}: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }
    return parsed.data;
  }
}

export async function describeFailure(response: Response, what: string): Promise<string> {
  const text = await response.text().catch(() => "");
  return `${what}_status_${response.status}:${text.slice(0, 220)}`;
}

export function encodeRemotePath(path: string): string {
  return path
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}
