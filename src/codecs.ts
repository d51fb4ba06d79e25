import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { ConfigurationError } from './errors.js';
import type { CacheFormat } from './types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface EntryReader {
  /** Read and decode the whole entry as UTF-8 text */
  read(): Promise<string>;
  close(): Promise<void>;
}

export interface EntryWriter {
  write(text: string): Promise<void>;
  /** Flush everything written and move the entry into place */
  close(): Promise<void>;
  /** Close and remove whatever was written; the entry path is left untouched */
  abort(): Promise<void>;
}

/**
 * Byte-level strategy for one on-disk format.
 */
export interface EntryCodec {
  readonly format: CacheFormat;
  readonly extension: string;
  openRead(path: string): Promise<EntryReader>;
  openWrite(path: string): Promise<EntryWriter>;
}

class FileEntryReader implements EntryReader {
  constructor(
    private readonly handle: FileHandle,
    private readonly decode: (data: Buffer) => Promise<Buffer>
  ) {}

  async read(): Promise<string> {
    const raw = await this.handle.readFile();
    return (await this.decode(raw)).toString('utf8');
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Buffers text and writes it to a sibling temp file on close, then renames
 * the temp file over the entry. Readers never see a partial entry.
 */
class FileEntryWriter implements EntryWriter {
  private readonly chunks: string[] = [];
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly tempPath: string,
    private readonly path: string,
    private readonly encode: (data: Buffer) => Promise<Buffer>
  ) {}

  async write(text: string): Promise<void> {
    if (this.closed) throw new Error(`Writer for ${this.path} is closed`);
    this.chunks.push(text);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      const data = await this.encode(Buffer.from(this.chunks.join(''), 'utf8'));
      await this.handle.writeFile(data);
      await this.handle.close();
      await fs.rename(this.tempPath, this.path);
    } catch (err) {
      await this.handle.close().catch(() => {});
      await fs.unlink(this.tempPath).catch(() => {});
      throw err;
    }
  }

  async abort(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
    await fs.rm(this.tempPath, { force: true });
  }
}

abstract class FileCodec implements EntryCodec {
  abstract readonly format: CacheFormat;
  abstract readonly extension: string;

  protected abstract encode(data: Buffer): Promise<Buffer>;
  protected abstract decode(data: Buffer): Promise<Buffer>;

  /**
   * Temp path next to the entry, so the final rename stays on one filesystem
   */
  private getTempPath(path: string): string {
    const id = randomBytes(8).toString('hex');
    return join(dirname(path), `.${basename(path)}.${id}.tmp`);
  }

  async openRead(path: string): Promise<EntryReader> {
    const handle = await fs.open(path, 'r');
    return new FileEntryReader(handle, (data) => this.decode(data));
  }

  async openWrite(path: string): Promise<EntryWriter> {
    const tempPath = this.getTempPath(path);
    const handle = await fs.open(tempPath, 'wx');
    return new FileEntryWriter(handle, tempPath, path, (data) => this.encode(data));
  }
}

/** Plain UTF-8 JSON */
export class JsonCodec extends FileCodec {
  readonly format = 'json';
  readonly extension = 'json';

  protected async encode(data: Buffer): Promise<Buffer> {
    return data;
  }

  protected async decode(data: Buffer): Promise<Buffer> {
    return data;
  }
}

/** Gzip-compressed JSON */
export class GzipCodec extends FileCodec {
  readonly format = 'gzip';
  readonly extension = 'gz';

  protected encode(data: Buffer): Promise<Buffer> {
    return gzipAsync(data);
  }

  protected decode(data: Buffer): Promise<Buffer> {
    return gunzipAsync(data);
  }
}

const CODECS: Record<CacheFormat, EntryCodec> = {
  json: new JsonCodec(),
  gzip: new GzipCodec(),
};

/**
 * Look up the codec for a format. Unknown formats fail before any I/O.
 */
export function getCodec(format: string): EntryCodec {
  if (format === 'json' || format === 'gzip') return CODECS[format];
  throw new ConfigurationError(`${format} is not a valid cache format. Use json or gzip.`);
}
