import { parentPort } from "worker_threads";
import { handleRequest, type WorkerRequest } from "./worker-protocol.js";

// =============================================================================
// Batch Worker (worker thread entry)
// =============================================================================

const port = parentPort;
if (!port) {
  throw new Error("batch-worker must run inside a worker thread");
}

port.on("message", (request: WorkerRequest) => {
  port.postMessage(handleRequest(request));
});
