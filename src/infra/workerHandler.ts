import { parseChunk } from "../core/chunk";
import { serializeParseError } from "../utils/errors";
import { workerRequestSchema, type WorkerResponse } from "./protocol";

/**
 * Turn one message posted to a parse worker into its reply. Parse errors
 * travel in `error`; anything else the worker cannot handle comes back as
 * `fatal`, with `id: -1` when the request itself is unreadable.
 */
export function handleRequest(message: unknown, warn: boolean): WorkerResponse {
  const request = workerRequestSchema.safeParse(message);
  if (!request.success) {
    return { id: -1, fatal: "Malformed request posted to parse worker" };
  }

  const { id, chunk } = request.data;
  try {
    const outcome = parseChunk(chunk, warn);
    return {
      id,
      records: outcome.records,
      warnings: outcome.warnings,
      error: outcome.error ? serializeParseError(outcome.error) : undefined,
    };
  } catch (err) {
    return { id, fatal: err instanceof Error ? err.message : String(err) };
  }
}
