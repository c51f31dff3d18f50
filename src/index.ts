export * from "./config/settings.js";
export { createEnvReader, type EnvReader, type EnvSource } from "./config/env.js";
export * from "./dispatch/dispatcher.js";
export { normaliseArguments, prepareArguments, type PreparedArguments } from "./dispatch/normalise.js";
export * from "./errors/cancellation.js";
export * from "./errors/classifier.js";
export * from "./errors/remediation.js";
export * from "./errors/taxonomy.js";
export * from "./gate/writeGate.js";
export { getActiveCallContext, type ActiveCallContext } from "./infra/callContext.js";
export * from "./infra/dedup.js";
export * from "./infra/metrics.js";
export * from "./infra/outbound.js";
export { StructuredLogger, parseRedactionDirectives, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { canonicalToolKey, suggestToolNames } from "./mcp/names.js";
export * from "./mcp/registry.js";
export * from "./monitor/diagnostics.js";
export { redactText, redactValue, REDACTION_TOKEN } from "./monitor/redaction.js";
export { RingBuffer, type RingBufferStats } from "./monitor/ringBuffer.js";
export * from "./runtime.js";
export * from "./schema/compare.js";
export * from "./schema/derive.js";
export * from "./schema/validate.js";
export { createToolServer, type ToolServerInfo } from "./server.js";
export { registerIntrospectionTools, type IntrospectionDependencies } from "./tools/introspection.js";
