import Joi from "joi";
import type { Logger } from "winston";
import type {
  AdapterRequest,
  AdapterResponse,
  DownloadRequest,
  InitRequest,
  TerminateRequest,
  UploadRequest,
} from "../models/protocol.model";
import { MalformedRequestError, errorMessage } from "../models/errors.model";

// Validation schemas, one per command. Unknown keys are ignored so newer
// controllers can add fields without breaking the adapter.
const actionSchema = Joi.object({
  href: Joi.string().required(),
  header: Joi.object().pattern(Joi.string(), Joi.string().allow("")).optional(),
  expires_at: Joi.string().allow("").optional(),
}).unknown(true);

const initSchema = Joi.object<InitRequest>({
  id: Joi.string().valid("init").required(),
  operation: Joi.string().valid("upload", "download").required(),
  concurrent: Joi.boolean().optional(),
  concurrenttransfers: Joi.number().integer().min(0).optional(),
}).unknown(true);

const downloadSchema = Joi.object<DownloadRequest>({
  id: Joi.string().valid("download").required(),
  oid: Joi.string().required(),
  size: Joi.number().integer().min(0).required(),
  action: actionSchema.required(),
}).unknown(true);

const uploadSchema = Joi.object<UploadRequest>({
  id: Joi.string().valid("upload").required(),
  oid: Joi.string().required(),
  size: Joi.number().integer().min(0).required(),
  path: Joi.string().required(),
  action: actionSchema.required(),
}).unknown(true);

const terminateSchema = Joi.object<TerminateRequest>({
  id: Joi.string().valid("terminate").required(),
}).unknown(true);

const commandIds = new Set<string>(["init", "download", "upload", "terminate"]);

function isCommandId(value: unknown): value is AdapterRequest["id"] {
  return typeof value === "string" && commandIds.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateFields<T>(schema: Joi.ObjectSchema<T>, parsed: unknown): T {
  const { error, value } = schema.validate(parsed, { convert: false });
  if (error) {
    throw new MalformedRequestError("invalid-fields", error.message);
  }
  return value;
}

export function decodeRequest(line: string): AdapterRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new MalformedRequestError("syntax", errorMessage(error));
  }

  if (!isRecord(parsed)) {
    throw new MalformedRequestError("syntax", "request is not a JSON object");
  }

  const { id } = parsed;
  if (!isCommandId(id)) {
    throw new MalformedRequestError(
      "unknown-command",
      id === undefined
        ? "missing command id"
        : `unknown command id: ${JSON.stringify(id)}`,
    );
  }

  switch (id) {
    case "init":
      return validateFields(initSchema, parsed);
    case "download":
      return validateFields(downloadSchema, parsed);
    case "upload":
      return validateFields(uploadSchema, parsed);
    case "terminate":
      return validateFields(terminateSchema, parsed);
  }
}

/**
 * Writes protocol responses, one JSON document per line. Each line goes out
 * in a single write so the controller sees it as soon as it is produced.
 */
export class ResponseWriter {
  private broken = false;

  constructor(
    private readonly output: NodeJS.WritableStream,
    private readonly logger: Logger,
  ) {
    // The controller closing its read end surfaces here as EPIPE.
    this.output.on("error", (error: Error) => {
      if (this.broken) return;
      this.broken = true;
      this.logger.error(`Unable to write response: ${error.message}`);
    });
  }

  send(response: AdapterResponse): boolean {
    if (this.broken) return false;

    let line: string;
    try {
      line = `${JSON.stringify(response)}\n`;
    } catch (error) {
      this.logger.error(`Unable to encode response: ${errorMessage(error)}`);
      return false;
    }

    this.output.write(line);
    return true;
  }
}
