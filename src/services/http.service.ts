import axios from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";
import { Readable } from "stream";
import {
  RequestConstructionError,
  TransportError,
  errorMessage,
} from "../models/errors.model";

export type HttpMethod = "GET" | "PUT";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Readable;
}

export interface HttpResponse {
  status: number;
  // Header names are lower-cased.
  headers: Record<string, string>;
  body: Readable;
}

/**
 * Performs one HTTP exchange. Rejects with RequestConstructionError when the
 * request cannot be built and TransportError when it cannot be completed;
 * any status, including failures, resolves.
 */
export interface HttpClient {
  issueRequest(request: HttpRequest): Promise<HttpResponse>;
}

const SENSITIVE_HEADERS = new Set(["authorization", "proxy-authorization"]);
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const HEADER_VALUE = /^[^\r\n\0]*$/;

export function findHeader(
  headers: Record<string, string>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : headers[key];
}

/** Sets a header, replacing any existing entry whatever its case. */
export function setHeader(
  headers: Record<string, string>,
  name: string,
  value: string,
): void {
  const wanted = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === wanted) delete headers[key];
  }
  headers[name] = value;
}

export function removeHeader(
  headers: Record<string, string>,
  name: string,
): void {
  const wanted = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === wanted) delete headers[key];
  }
}

/** Renders a request for diagnostics, with credentials redacted. */
export function traceRequest(request: HttpRequest): string {
  const headers = Object.entries(request.headers).map(([name, value]) =>
    SENSITIVE_HEADERS.has(name.toLowerCase())
      ? `${name}: <redacted>`
      : `${name}: ${value}`,
  );
  const target = `${request.method} ${request.url}`;
  return headers.length > 0 ? `${target} (${headers.join(", ")})` : target;
}

export function validateRequest(request: HttpRequest): void {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch (error) {
    throw new RequestConstructionError(
      `invalid URL ${JSON.stringify(request.url)}: ${errorMessage(error)}`,
    );
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new RequestConstructionError(
      `unsupported protocol ${url.protocol} in ${request.url}`,
    );
  }

  for (const [name, value] of Object.entries(request.headers)) {
    if (!HEADER_NAME.test(name)) {
      throw new RequestConstructionError(`invalid header name ${JSON.stringify(name)}`);
    }
    if (!HEADER_VALUE.test(value)) {
      throw new RequestConstructionError(`invalid value for header ${name}`);
    }
  }
}

function normalizeHeaders(
  headers: AxiosResponse["headers"],
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      normalized[name.toLowerCase()] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      normalized[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      normalized[name.toLowerCase()] = value.join(", ");
    }
  }
  return normalized;
}

function toReadable(data: unknown): Readable {
  if (data instanceof Readable) return data;
  if (data === undefined || data === null) return Readable.from([]);
  if (typeof data === "string" || Buffer.isBuffer(data)) {
    return Readable.from([Buffer.from(data)]);
  }
  return Readable.from([Buffer.from(JSON.stringify(data))]);
}

export class AxiosHttpClient implements HttpClient {
  constructor(
    private readonly client: AxiosInstance = axios.create(),
    private readonly timeoutMs: number = 0,
  ) {}

  async issueRequest(request: HttpRequest): Promise<HttpResponse> {
    validateRequest(request);

    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        responseType: "stream",
        timeout: this.timeoutMs,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        // Redirect following buffers the whole request body for replay, and a
        // file stream cannot be replayed anyway.
        maxRedirects: request.body ? 0 : undefined,
        // Status handling belongs to the caller.
        validateStatus: () => true,
      });

      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: toReadable(response.data),
      };
    } catch (error) {
      throw new TransportError(errorMessage(error));
    }
  }
}
