export type TransferOperation = "upload" | "download";

export interface Action {
  href: string;
  header?: Record<string, string>;
  expires_at?: string;
}

export interface InitRequest {
  id: "init";
  operation: TransferOperation;
  concurrent?: boolean;
  concurrenttransfers?: number;
}

export interface DownloadRequest {
  id: "download";
  oid: string;
  size: number;
  action: Action;
}

export interface UploadRequest {
  id: "upload";
  oid: string;
  size: number;
  path: string;
  action: Action;
}

export interface TerminateRequest {
  id: "terminate";
}

export type AdapterRequest =
  | InitRequest
  | DownloadRequest
  | UploadRequest
  | TerminateRequest;

export type TransferRequest = DownloadRequest | UploadRequest;

export interface TransferError {
  code: number;
  message: string;
}

export interface InitResponse {
  error?: TransferError;
}

export interface ProgressResponse {
  id: "progress";
  oid: string;
  bytesSoFar: number;
  bytesSinceLast: number;
}

// Terminal response: `path` only for a completed download, `error` only on failure.
export interface CompleteResponse {
  id: "complete";
  oid: string;
  path?: string;
  error?: TransferError;
}

export type AdapterResponse = InitResponse | ProgressResponse | CompleteResponse;
