export { RelayServer } from "./relay-server.js";
export type { RelayServerOptions } from "./relay-server.js";
export { RelayMetrics } from "./relay-metrics.js";
export type { RelayMetricsConfig, DropReason } from "./relay-metrics.js";
export { createStatusApp } from "./status-app.js";
