import { Transform } from "stream";
import type { TransformCallback } from "stream";
import type { ResponseWriter } from "./codec.service";

export interface ProgressSink {
  report(oid: string, bytesSoFar: number, bytesSinceLast: number): void;
}

/** Emits one `progress` line per report; no coalescing or throttling. */
export class ProtocolProgressReporter implements ProgressSink {
  constructor(private readonly writer: ResponseWriter) {}

  report(oid: string, bytesSoFar: number, bytesSinceLast: number): void {
    this.writer.send({ id: "progress", oid, bytesSoFar, bytesSinceLast });
  }
}

/** Cumulative byte count for one transfer. */
export class ProgressTracker {
  private bytesSoFar = 0;

  constructor(
    private readonly oid: string,
    private readonly sink: ProgressSink,
  ) {}

  get total(): number {
    return this.bytesSoFar;
  }

  advance(bytes: number): void {
    if (bytes <= 0) return;
    this.bytesSoFar += bytes;
    this.sink.report(this.oid, this.bytesSoFar, bytes);
  }
}

/** Pass-through stream that reports every chunk it forwards. */
export function createProgressStream(
  oid: string,
  sink: ProgressSink,
): Transform {
  const tracker = new ProgressTracker(oid, sink);
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      tracker.advance(chunk.length);
      callback(null, chunk);
    },
  });
}
