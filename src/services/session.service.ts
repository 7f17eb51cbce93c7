import readline from "readline";
import type { Logger } from "winston";
import type {
  AdapterRequest,
  CompleteResponse,
  TransferOperation,
  TransferRequest,
} from "../models/protocol.model";
import {
  MalformedRequestError,
  TransferErrorCode,
  errorMessage,
} from "../models/errors.model";
import { ResponseWriter, decodeRequest } from "./codec.service";
import type { TransferExecutor } from "./transfer.service";

export type SessionState = "uninitialized" | "ready" | "terminated";

export interface SessionOptions {
  input: NodeJS.ReadableStream;
  writer: ResponseWriter;
  transfers: TransferExecutor;
  logger: Logger;
}

export interface SessionSummary {
  state: SessionState;
  operation?: TransferOperation;
  handled: number;
  skipped: number;
}

/**
 * Reads one request per line and answers it before reading the next.
 * Ends on `terminate` or when the controller closes its end of the input.
 */
export class SessionService {
  private state: SessionState = "uninitialized";
  private operation?: TransferOperation;
  private handled = 0;
  private skipped = 0;

  private readonly input: NodeJS.ReadableStream;
  private readonly writer: ResponseWriter;
  private readonly transfers: TransferExecutor;
  private readonly logger: Logger;

  constructor(options: SessionOptions) {
    this.input = options.input;
    this.writer = options.writer;
    this.transfers = options.transfers;
    this.logger = options.logger;
  }

  getState(): SessionState {
    return this.state;
  }

  async run(): Promise<SessionSummary> {
    const lines = readline.createInterface({
      input: this.input,
      crlfDelay: Infinity,
      terminal: false,
    });

    try {
      for await (const line of lines) {
        if (line.trim() === "") continue;

        let request: AdapterRequest;
        try {
          request = decodeRequest(line);
        } catch (error) {
          if (!(error instanceof MalformedRequestError)) throw error;
          this.skipped++;
          this.logger.warn(`Unable to parse request: ${line}`, {
            reason: error.reason,
            details: error.message,
          });
          continue;
        }

        this.handled++;
        await this.dispatch(request);
        if (this.state === "terminated") break;
      }
    } finally {
      lines.close();
    }

    if (this.state !== "terminated") {
      this.logger.info("Input closed, ending session");
      this.state = "terminated";
    }

    return {
      state: this.state,
      operation: this.operation,
      handled: this.handled,
      skipped: this.skipped,
    };
  }

  private async dispatch(request: AdapterRequest): Promise<void> {
    switch (request.id) {
      case "init":
        this.operation = request.operation;
        this.state = "ready";
        this.logger.info(`Initialised custom adapter for ${request.operation}`, {
          concurrent: request.concurrent,
          concurrentTransfers: request.concurrenttransfers,
        });
        this.writer.send({});
        return;
      case "download":
      case "upload":
        this.writer.send(await this.runTransfer(request));
        return;
      case "terminate":
        this.logger.info("Terminating custom adapter gracefully");
        this.state = "terminated";
        return;
    }
  }

  private async runTransfer(request: TransferRequest): Promise<CompleteResponse> {
    this.logger.info(`Received ${request.id} request for ${request.oid}`, {
      size: request.size,
    });
    if (this.state === "uninitialized") {
      this.logger.debug(`Processing ${request.id} for ${request.oid} before init`);
    }

    try {
      return request.id === "download"
        ? await this.transfers.download(request)
        : await this.transfers.upload(request);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Unexpected failure transferring ${request.oid}: ${message}`);
      return {
        id: "complete",
        oid: request.oid,
        error: { code: TransferErrorCode.Internal, message },
      };
    }
  }
}
