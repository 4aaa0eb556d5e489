export { BaseSink, toOutputDocument } from "./BaseSink";
export type { OutputDocument } from "./BaseSink";
export { JSONFileSink } from "./JSONFileSink";
export type { JSONFileSinkConfig } from "./JSONFileSink";
export { InMemorySink } from "./InMemorySink";
