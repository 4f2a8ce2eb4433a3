import type { Request } from "express";
import type multer from "multer";
import type { Readable } from "node:stream";

export interface DrainedFile {
  size: number;
  buffer: Buffer;
}

/**
 * Reads `stream` to the end, counting every byte. Chunks are kept only while the total
 * stays within `maxBytes`; a larger file reports its full size with an empty buffer.
 */
export function drainCapped(
  stream: Readable,
  maxBytes: number,
  done: (error: Error | null, result?: DrainedFile) => void
): void {
  const chunks: Buffer[] = [];
  let size = 0;
  stream.on("data", (chunk: Buffer) => {
    size += chunk.length;
    if (size <= maxBytes) chunks.push(chunk);
  });
  stream.once("error", (error: Error) => done(error));
  stream.once("end", () => done(null, { size, buffer: size <= maxBytes ? Buffer.concat(chunks) : Buffer.alloc(0) }));
}

/**
 * Memory storage that never fails the request over one large file. Oversized files
 * arrive with their real size and no content, so batch screening can skip them alone.
 */
export function cappedMemoryStorage(maxBytes: number): multer.StorageEngine {
  return {
    _handleFile(_req: Request, file: Express.Multer.File, callback: (error?: Error | null, info?: Partial<Express.Multer.File>) => void) {
      drainCapped(file.stream, maxBytes, (error, result) => {
        if (error || !result) return callback(error ?? new Error("upload_stream_failed"));
        callback(null, result);
      });
    },
    _removeFile(_req: Request, _file: Express.Multer.File, callback: (error: Error | null) => void) {
      callback(null);
    }
  };
}
