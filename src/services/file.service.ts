import fs from "fs";
import os from "os";
import path from "path";
import type { FileHandle } from "fs/promises";
import { Readable } from "stream";
import { v4 as uuidv4 } from "uuid";

/** A freshly created file the adapter writes a download into. */
export interface TempFile {
  readonly path: string;
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

/** An existing file opened read-only as an upload source. */
export interface SourceFile {
  readonly path: string;
  readonly size: number;
  createReadStream(): Readable;
  close(): Promise<void>;
}

export interface FileStore {
  createTempFile(): Promise<TempFile>;
  openForRead(filePath: string): Promise<SourceFile>;
  remove(filePath: string): Promise<void>;
}

class LocalTempFile implements TempFile {
  private closed = false;

  constructor(
    readonly path: string,
    private readonly handle: FileHandle,
  ) {}

  async write(chunk: Buffer): Promise<void> {
    let offset = 0;
    while (offset < chunk.length) {
      const { bytesWritten } = await this.handle.write(
        chunk,
        offset,
        chunk.length - offset,
      );
      offset += bytesWritten;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

class LocalSourceFile implements SourceFile {
  private closed = false;

  constructor(
    readonly path: string,
    readonly size: number,
    private readonly handle: FileHandle,
  ) {}

  createReadStream(): Readable {
    return this.handle.createReadStream({ autoClose: false });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

export class LocalFileStore implements FileStore {
  constructor(
    private readonly tempDir: string = os.tmpdir(),
    private readonly prefix: string = "lfscustomdl",
  ) {}

  async createTempFile(): Promise<TempFile> {
    const filePath = path.resolve(this.tempDir, `${this.prefix}${uuidv4()}`);
    const handle = await fs.promises.open(filePath, "wx", 0o600);
    return new LocalTempFile(filePath, handle);
  }

  async openForRead(filePath: string): Promise<SourceFile> {
    const handle = await fs.promises.open(filePath, "r");
    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new Error(`${filePath} is not a regular file`);
      }
      return new LocalSourceFile(filePath, stats.size, handle);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async remove(filePath: string): Promise<void> {
    await fs.promises.rm(filePath, { force: true });
  }
}
