import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { pipeline } from 'node:stream/promises';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { isErrnoException, statFileSize } from '@/shared/utils/file';
import { parseByteRange, RANGE_CHUNK_BYTES } from '@/adapters/http/utils/byteRange';
import { normalizePath } from '@/adapters/http/utils/requestPath';

export const MEDIA_CONTENT_TYPE = 'audio/mpeg';

/** Sent on every response, errors included. */
const BASE_HEADERS = {
  'Content-Type': MEDIA_CONTENT_TYPE,
} as const;

const NO_CACHE_HEADERS = {
  ...BASE_HEADERS,
  'Accept-Ranges': 'bytes',
  'Cache-Control': 'no-store, no-cache, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
} as const;

export const MEDIA_ERROR_HEADERS: Record<string, string> = { ...BASE_HEADERS };

/**
 * Serves generated speech assets from a single directory, with byte ranges.
 * Query strings are ignored so `?t=` cache busters do not affect lookup.
 */
export class MediaAssetHandler {
  private readonly log = createLogger('Http', 'Media');
  private readonly baseDir: string;

  constructor(
    baseDir: string,
    private readonly chunkBytes: number = RANGE_CHUNK_BYTES,
  ) {
    this.baseDir = path.resolve(baseDir);
  }

  public async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!req.method) {
      this.reject(res, 400, 'no method present');
      return;
    }
    if (req.method !== 'GET') {
      res.setHeader('Allow', 'GET');
      this.reject(res, 405, `only GET requests allowed (${req.method})`);
      return;
    }
    if (!req.url || !req.url.startsWith('/')) {
      this.reject(res, 400, 'no url present');
      return;
    }
    if (Object.keys(req.headers).length === 0) {
      this.reject(res, 400, 'no headers present');
      return;
    }

    const relative = normalizePath(req.url).replace(/^\/+/, '');
    const filePath = this.resolveTarget(relative);
    if (!filePath) {
      this.reject(res, 403, 'path outside asset directory');
      return;
    }

    const size = relative ? await statFileSize(filePath) : undefined;
    if (size === undefined) {
      this.reject(res, 404, `file '${relative}' does not exist`);
      return;
    }

    const rangeHeader = req.headers.range;
    if (rangeHeader === undefined) {
      await this.sendFile(req, res, filePath, size);
      return;
    }
    await this.sendRange(req, res, filePath, size, rangeHeader);
  }

  private async sendFile(req: IncomingMessage, res: ServerResponse, filePath: string, size: number): Promise<void> {
    res.writeHead(200, { ...NO_CACHE_HEADERS, 'Content-Length': size });
    const file = path.basename(filePath);
    try {
      await pipeline(fs.createReadStream(filePath), res);
      this.log.debug('sent full file', { remote: req.socket.remoteAddress, file, size });
    } catch (error) {
      if (isPrematureClose(error)) {
        this.log.debug('client closed media download', { remote: req.socket.remoteAddress, file });
        return;
      }
      this.log.error('media stream error', { file, message: errorMessage(error) });
      res.destroy();
    }
  }

  private async sendRange(
    req: IncomingMessage,
    res: ServerResponse,
    filePath: string,
    size: number,
    rangeHeader: string,
  ): Promise<void> {
    const range = parseByteRange(rangeHeader, size, this.chunkBytes);
    if (!range) {
      res.setHeader('Content-Range', `bytes */${size}`);
      this.reject(res, 416, `unsatisfiable range '${rangeHeader}'`);
      return;
    }

    const length = range.end - range.start + 1;
    const buffer = Buffer.alloc(length);
    const handle = await fsp.open(filePath, 'r');
    let bytesRead = 0;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, length, range.start));
    } finally {
      await handle.close();
    }
    if (bytesRead === 0) {
      res.setHeader('Content-Range', `bytes */${size}`);
      this.reject(res, 416, 'range past end of file');
      return;
    }

    const end = range.start + bytesRead - 1;
    res.writeHead(206, {
      ...NO_CACHE_HEADERS,
      'Content-Range': `bytes ${range.start}-${end}/${size}`,
      'Content-Length': bytesRead,
    });
    res.end(buffer.subarray(0, bytesRead));
    this.log.debug('sent range', {
      remote: req.socket.remoteAddress,
      file: path.basename(filePath),
      range: `${range.start}-${end}/${size}`,
    });
  }

  private resolveTarget(relative: string): string | null {
    const candidate = path.resolve(this.baseDir, relative);
    const normalizedBase = this.baseDir.endsWith(path.sep)
      ? this.baseDir
      : `${this.baseDir}${path.sep}`;

    if (candidate !== this.baseDir && !candidate.startsWith(normalizedBase)) {
      this.log.warn('blocked media path traversal', { candidate });
      return null;
    }
    return candidate;
  }

  private reject(res: ServerResponse, status: number, reason: string): void {
    this.log.warn('invalid media request', { status, reason });
    res.writeHead(status, { ...BASE_HEADERS, 'Content-Length': 0 });
    res.end();
  }
}

function isPrematureClose(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ERR_STREAM_PREMATURE_CLOSE';
}
