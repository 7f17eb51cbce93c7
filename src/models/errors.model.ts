import type { TransferError } from "./protocol.model";

/**
 * Codes reported in `complete.error.code`. A rejected HTTP status is
 * reported with the status itself instead of one of these.
 */
export enum TransferErrorCode {
  Internal = 1,
  RequestConstruction = 2,
  LocalOpen = 3,
  LocalWrite = 4,
  LocalClose = 5,
  Transport = 6,
}

export type MalformedReason = "syntax" | "unknown-command" | "invalid-fields";

/** A request line that could not be decoded. Never answered on stdout. */
export class MalformedRequestError extends Error {
  constructor(
    readonly reason: MalformedReason,
    message: string,
  ) {
    super(message);
    this.name = "MalformedRequestError";
  }
}

/** Base for every failure that ends a single transfer. */
export class TransferFailure extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = "TransferFailure";
  }

  toTransferError(): TransferError {
    return { code: this.code, message: this.message };
  }
}

export class RequestConstructionError extends TransferFailure {
  constructor(message: string) {
    super(TransferErrorCode.RequestConstruction, message);
    this.name = "RequestConstructionError";
  }
}

export class TransportError extends TransferFailure {
  constructor(message: string) {
    super(TransferErrorCode.Transport, message);
    this.name = "TransportError";
  }
}

export class RemoteStatusError extends TransferFailure {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(status, message);
    this.name = "RemoteStatusError";
  }
}

export type LocalIOCode =
  | TransferErrorCode.LocalOpen
  | TransferErrorCode.LocalWrite
  | TransferErrorCode.LocalClose;

export class LocalIOError extends TransferFailure {
  constructor(code: LocalIOCode, message: string) {
    super(code, message);
    this.name = "LocalIOError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toTransferError(error: unknown): TransferError {
  if (error instanceof TransferFailure) {
    return error.toTransferError();
  }
  return { code: TransferErrorCode.Internal, message: errorMessage(error) };
}
