import { vi } from "vitest";
import http from "http";
import { Readable, Writable } from "stream";
import type { Logger } from "winston";
import type {
  HttpClient,
  HttpRequest,
  HttpResponse,
} from "../services/http.service";
import type { ProgressSink } from "../services/progress.service";

// Create a silent mock logger compatible with winston's Logger interface
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function bodyOf(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

export function respond(
  status: number,
  body: Readable = bodyOf(),
  headers: Record<string, string> = {},
): HttpResponse {
  return { status, headers, body };
}

export interface RecordedRequest {
  request: HttpRequest;
  body: Buffer;
}

/** In-process HTTP stand-in: reads the whole request body, then answers. */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];

  constructor(
    private readonly handler: (
      request: HttpRequest,
    ) => HttpResponse | Promise<HttpResponse>,
  ) {}

  async issueRequest(request: HttpRequest): Promise<HttpResponse> {
    const body = request.body ? await readAll(request.body) : Buffer.alloc(0);
    this.requests.push({ request, body });
    return this.handler(request);
  }
}

export interface ProgressEvent {
  oid: string;
  bytesSoFar: number;
  bytesSinceLast: number;
}

export class RecordingSink implements ProgressSink {
  readonly events: ProgressEvent[] = [];

  report(oid: string, bytesSoFar: number, bytesSinceLast: number): void {
    this.events.push({ oid, bytesSoFar, bytesSinceLast });
  }
}

/** Collects everything written, synchronously. */
export class OutputCollector extends Writable {
  text = "";

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.text += chunk.toString();
    callback();
  }

  lines(): string[] {
    return this.text.split("\n").filter((line) => line !== "");
  }

  messages(): unknown[] {
    return this.lines().map((line) => JSON.parse(line));
  }
}

export function inputOf(...lines: string[]): Readable {
  return Readable.from([Buffer.from(lines.map((line) => `${line}\n`).join(""))]);
}

export interface ReceivedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

export interface LocalServer {
  url: string;
  received: ReceivedRequest[];
  close(): Promise<void>;
}

/** Plain HTTP server on loopback that reads each request body before answering. */
export async function startServer(
  handler: (request: ReceivedRequest, response: http.ServerResponse) => void,
): Promise<LocalServer> {
  const received: ReceivedRequest[] = [];
  const server = http.createServer((req, res) => {
    readAll(req).then(
      (body) => {
        const request = {
          method: req.method ?? "",
          url: req.url ?? "",
          headers: req.headers,
          body,
        };
        received.push(request);
        handler(request, res);
      },
      () => res.destroy(),
    );
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    received,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
