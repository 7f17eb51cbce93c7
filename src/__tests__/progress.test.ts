import { describe, it, expect } from "vitest";
import { ResponseWriter } from "../services/codec.service";
import {
  ProgressTracker,
  ProtocolProgressReporter,
  createProgressStream,
} from "../services/progress.service";
import {
  bodyOf,
  createMockLogger,
  OutputCollector,
  readAll,
  RecordingSink,
} from "./helpers";

describe("ProtocolProgressReporter", () => {
  it("emits one progress line per report", () => {
    const output = new OutputCollector();
    const reporter = new ProtocolProgressReporter(
      new ResponseWriter(output, createMockLogger()),
    );

    reporter.report("abc", 3, 3);
    reporter.report("abc", 5, 2);

    expect(output.lines()).toEqual([
      '{"id":"progress","oid":"abc","bytesSoFar":3,"bytesSinceLast":3}',
      '{"id":"progress","oid":"abc","bytesSoFar":5,"bytesSinceLast":2}',
    ]);
  });
});

describe("ProgressTracker", () => {
  it("accumulates bytes and reports each advance", () => {
    const sink = new RecordingSink();
    const tracker = new ProgressTracker("abc", sink);

    tracker.advance(10);
    tracker.advance(6);

    expect(tracker.total).toBe(16);
    expect(sink.events).toEqual([
      { oid: "abc", bytesSoFar: 10, bytesSinceLast: 10 },
      { oid: "abc", bytesSoFar: 16, bytesSinceLast: 6 },
    ]);
  });

  it("does not report empty chunks", () => {
    const sink = new RecordingSink();
    const tracker = new ProgressTracker("abc", sink);

    tracker.advance(0);

    expect(tracker.total).toBe(0);
    expect(sink.events).toEqual([]);
  });
});

describe("createProgressStream", () => {
  it("passes data through unchanged while reporting", async () => {
    const sink = new RecordingSink();
    const stream = bodyOf("hello ", "world").pipe(
      createProgressStream("abc", sink),
    );

    const data = await readAll(stream);

    expect(data.toString()).toBe("hello world");
    expect(sink.events).toEqual([
      { oid: "abc", bytesSoFar: 6, bytesSinceLast: 6 },
      { oid: "abc", bytesSoFar: 11, bytesSinceLast: 5 },
    ]);
  });
});
