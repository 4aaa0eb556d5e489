export { WorkerPool } from "./WorkerPool";
export type { WorkerPoolConfig, WorkerPoolRunOptions } from "./WorkerPool";
export { Semaphore } from "./Semaphore";
