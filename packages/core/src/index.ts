export { config, defineConfig } from "./config.js";
export type { ArithmosConfig, TriangleConfig } from "./config.js";

export { invariant, unreachable } from "./safety.js";

export { Tracer, createTracer } from "./trace.js";
export type { TraceRecord } from "./trace.js";

export { InvariantError, ConfigError } from "./errors.js";
export type { ConfigSource } from "./errors.js";
