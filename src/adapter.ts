import axios from "axios";
import type { Logger } from "winston";
import { ResponseWriter } from "./services/codec.service";
import { LocalFileStore } from "./services/file.service";
import { AxiosHttpClient } from "./services/http.service";
import type { HttpClient } from "./services/http.service";
import { ProtocolProgressReporter } from "./services/progress.service";
import { SessionService } from "./services/session.service";
import { TransferService } from "./services/transfer.service";
import type { AdapterConfig } from "./utils/config";

export interface AdapterStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export interface AdapterDependencies {
  logger: Logger;
  http?: HttpClient;
}

/** Wires one session to the given streams. */
export function createAdapter(
  config: AdapterConfig,
  streams: AdapterStreams,
  deps: AdapterDependencies,
): SessionService {
  const { logger } = deps;
  const writer = new ResponseWriter(streams.output, logger);

  const transfers = new TransferService({
    http: deps.http || new AxiosHttpClient(axios.create(), config.httpTimeoutMs),
    files: new LocalFileStore(config.tempDir, config.tempPrefix),
    progress: new ProtocolProgressReporter(writer),
    logger,
  });

  return new SessionService({
    input: streams.input,
    writer,
    transfers,
    logger,
  });
}
