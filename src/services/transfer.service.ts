import { Readable, pipeline } from "stream";
import type { Logger } from "winston";
import type {
  Action,
  CompleteResponse,
  DownloadRequest,
  UploadRequest,
} from "../models/protocol.model";
import {
  LocalIOError,
  RemoteStatusError,
  TransferErrorCode,
  TransportError,
  errorMessage,
  toTransferError,
} from "../models/errors.model";
import type { FileStore, SourceFile, TempFile } from "./file.service";
import {
  findHeader,
  removeHeader,
  setHeader,
  traceRequest,
} from "./http.service";
import type { HttpClient, HttpRequest, HttpResponse } from "./http.service";
import { ProgressTracker, createProgressStream } from "./progress.service";
import type { ProgressSink } from "./progress.service";

/** Runs one transfer to completion and returns its terminal response. */
export interface TransferExecutor {
  download(request: DownloadRequest): Promise<CompleteResponse>;
  upload(request: UploadRequest): Promise<CompleteResponse>;
}

export interface TransferServiceOptions {
  http: HttpClient;
  files: FileStore;
  progress: ProgressSink;
  logger: Logger;
  now?: () => number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError(`unexpected body chunk of type ${typeof chunk}`);
}

function parseContentLength(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

export class TransferService implements TransferExecutor {
  private readonly http: HttpClient;
  private readonly files: FileStore;
  private readonly progress: ProgressSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: TransferServiceOptions) {
    this.http = options.http;
    this.files = options.files;
    this.progress = options.progress;
    this.logger = options.logger;
    this.now = options.now || Date.now;
  }

  async download(request: DownloadRequest): Promise<CompleteResponse> {
    const { oid, size, action } = request;
    this.checkExpiry(oid, action);

    const httpRequest: HttpRequest = {
      method: "GET",
      url: action.href,
      headers: { ...action.header },
    };

    let response: HttpResponse;
    try {
      response = await this.http.issueRequest(httpRequest);
    } catch (error) {
      return this.fail(oid, error);
    }

    if (response.status > 299) {
      await this.drain(oid, response.body);
      return this.fail(
        oid,
        new RemoteStatusError(
          response.status,
          `Invalid status for ${traceRequest(httpRequest)}: ${response.status}`,
        ),
      );
    }

    // The server's length wins over the caller's hint; neither is enforced.
    const expected =
      parseContentLength(response.headers["content-length"]) ?? size;

    let tempFile: TempFile;
    try {
      tempFile = await this.files.createTempFile();
    } catch (error) {
      response.body.destroy();
      return this.fail(
        oid,
        new LocalIOError(
          TransferErrorCode.LocalOpen,
          `cannot create tempfile: ${errorMessage(error)}`,
        ),
      );
    }

    this.logger.debug(`Writing ${oid} to ${tempFile.path}`, { expected });

    const tracker = new ProgressTracker(oid, this.progress);
    try {
      for await (const chunk of response.body) {
        const data = toBuffer(chunk);
        await tempFile.write(data);
        tracker.advance(data.length);
      }
    } catch (error) {
      response.body.destroy();
      await this.discard(tempFile);
      return this.fail(
        oid,
        new LocalIOError(
          TransferErrorCode.LocalWrite,
          `cannot write data to tempfile ${JSON.stringify(tempFile.path)}: ${errorMessage(error)}`,
        ),
      );
    }

    try {
      await tempFile.close();
    } catch (error) {
      await this.removeTempFile(tempFile.path);
      return this.fail(
        oid,
        new LocalIOError(
          TransferErrorCode.LocalClose,
          `can't close tempfile ${JSON.stringify(tempFile.path)}: ${errorMessage(error)}`,
        ),
      );
    }

    if (tracker.total !== expected) {
      this.logger.warn(
        `Downloaded ${tracker.total} bytes for ${oid}, expected ${expected}`,
      );
    }
    this.logger.info(`Download complete for ${oid}`, {
      bytes: tracker.total,
      path: tempFile.path,
    });

    return { id: "complete", oid, path: tempFile.path };
  }

  async upload(request: UploadRequest): Promise<CompleteResponse> {
    const { oid, action } = request;
    this.checkExpiry(oid, action);

    let source: SourceFile;
    try {
      source = await this.files.openForRead(request.path);
    } catch (error) {
      return this.fail(
        oid,
        new LocalIOError(
          TransferErrorCode.LocalOpen,
          `Cannot read data from ${JSON.stringify(request.path)}: ${errorMessage(error)}`,
        ),
      );
    }

    try {
      return await this.sendFile(request, source);
    } finally {
      await this.closeSource(source);
    }
  }

  private async sendFile(
    request: UploadRequest,
    source: SourceFile,
  ): Promise<CompleteResponse> {
    const { oid, size, action } = request;

    const headers: Record<string, string> = { ...action.header };
    if (!findHeader(headers, "Content-Type")) {
      setHeader(headers, "Content-Type", "application/octet-stream");
    }

    const chunked =
      findHeader(headers, "Transfer-Encoding")?.toLowerCase() === "chunked";
    if (chunked) {
      removeHeader(headers, "Content-Length");
    } else {
      setHeader(headers, "Content-Length", String(size));
    }

    if (!chunked && source.size !== size) {
      // The body must match the declared Content-Length exactly.
      return this.fail(
        oid,
        new LocalIOError(
          TransferErrorCode.LocalOpen,
          `Cannot upload ${JSON.stringify(source.path)}: file holds ${source.size} bytes, request declares ${size}`,
        ),
      );
    }

    const body = pipeline(
      source.createReadStream(),
      createProgressStream(oid, this.progress),
      (error) => {
        if (error) {
          this.logger.debug(`Upload body for ${oid} ended early: ${error.message}`);
        }
      },
    );

    const httpRequest: HttpRequest = {
      method: "PUT",
      url: action.href,
      headers,
      body,
    };

    let response: HttpResponse;
    try {
      response = await this.http.issueRequest(httpRequest);
    } catch (error) {
      body.destroy();
      if (error instanceof TransportError) {
        return this.fail(
          oid,
          new TransportError(`Error uploading data for ${oid}: ${error.message}`),
        );
      }
      return this.fail(oid, error);
    }

    await this.drain(oid, response.body);

    if (response.status > 299) {
      // The server may answer before it has read the whole body.
      body.destroy();
      return this.fail(
        oid,
        new RemoteStatusError(
          response.status,
          `Invalid status for ${traceRequest(httpRequest)}: ${response.status}`,
        ),
      );
    }

    this.logger.info(`Upload complete for ${oid}`, { bytes: size });
    return { id: "complete", oid };
  }

  private fail(oid: string, error: unknown): CompleteResponse {
    const transferError = toTransferError(error);
    this.logger.error(`Transfer failed for ${oid}: ${transferError.message}`, {
      code: transferError.code,
    });
    return { id: "complete", oid, error: transferError };
  }

  private checkExpiry(oid: string, action: Action): void {
    if (!action.expires_at) return;
    const expiresAt = Date.parse(action.expires_at);
    // Non-positive timestamps are the controller's "no expiry" zero value.
    if (Number.isNaN(expiresAt) || expiresAt <= 0) return;
    if (expiresAt < this.now()) {
      this.logger.warn(`Action for ${oid} expired at ${action.expires_at}`);
    }
  }

  private async drain(oid: string, body: Readable): Promise<void> {
    try {
      for await (const _chunk of body) {
        // discard
      }
    } catch (error) {
      this.logger.debug(
        `Response body for ${oid} failed while draining: ${errorMessage(error)}`,
      );
    }
  }

  private async discard(tempFile: TempFile): Promise<void> {
    try {
      await tempFile.close();
    } catch (error) {
      this.logger.warn(
        `Unable to close tempfile ${tempFile.path}: ${errorMessage(error)}`,
      );
    }
    await this.removeTempFile(tempFile.path);
  }

  private async removeTempFile(filePath: string): Promise<void> {
    try {
      await this.files.remove(filePath);
    } catch (error) {
      this.logger.error(
        `Unable to remove tempfile ${filePath}: ${errorMessage(error)}`,
      );
    }
  }

  private async closeSource(source: SourceFile): Promise<void> {
    try {
      await source.close();
    } catch (error) {
      this.logger.warn(
        `Unable to close ${source.path}: ${errorMessage(error)}`,
      );
    }
  }
}
