/**
 * Worker thread entry: parses the line chunks posted by `ThreadPool`.
 */
import { parentPort, workerData } from "worker_threads";
import { workerDataSchema } from "./protocol";
import { handleRequest } from "./workerHandler";

const port = parentPort;
if (!port) {
  throw new Error("parseWorker must be loaded as a worker thread");
}

const { warn } = workerDataSchema.parse(workerData);

port.on("message", (message: unknown) => {
  port.postMessage(handleRequest(message, warn));
});
