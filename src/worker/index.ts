export { startWorker, type StartWorkerConfig, type WorkerHandle } from "./start-worker";
export { createSerialQueue, QueueClosedError, type JobKind, type SerialQueue } from "./queue";
export * from "./execution";
export * from "./orchestrator";
