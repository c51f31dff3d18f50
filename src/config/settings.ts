import { z } from "zod";

import { createEnvReader, type EnvSource } from "./env.js";

/** Policies accepted by the write-gate. */
export const WRITE_GATE_POLICIES = ["protected_ref", "always_allow"] as const;

/** Log levels accepted by the structured logger. */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** Environment variables whose presence indicates a usable remote credential. */
export const CREDENTIAL_ENV_VARS = ["GITHUB_TOKEN", "GH_TOKEN"] as const;

/**
 * Settings validated before the runtime is assembled. Capacities of zero mean
 * "unbounded" for the corresponding diagnostics buffer.
 */
export const DispatchSettingsSchema = z
  .object({
    dedupTtlMs: z.number().int().min(0),
    eventsCapacity: z.number().int().min(0),
    logsCapacity: z.number().int().min(0),
    errorsCapacity: z.number().int().min(0),
    outboundConcurrency: z.number().int().min(1),
    writeAllowed: z.boolean(),
    protectedRef: z.string().min(1),
    writeGatePolicy: z.enum(WRITE_GATE_POLICIES),
    validateArguments: z.boolean(),
    callTimeoutMs: z.number().int().positive().nullable(),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
    logRedact: z.string().nullable(),
  })
  .strict();

export type DispatchSettings = z.infer<typeof DispatchSettingsSchema>;

/** Defaults applied when neither the environment nor the caller overrides a value. */
export const DEFAULT_DISPATCH_SETTINGS: Readonly<DispatchSettings> = Object.freeze({
  dedupTtlMs: 5_000,
  eventsCapacity: 2_000,
  logsCapacity: 1_000,
  errorsCapacity: 500,
  outboundConcurrency: 8,
  writeAllowed: false,
  protectedRef: "main",
  writeGatePolicy: "protected_ref",
  validateArguments: true,
  callTimeoutMs: null,
  logLevel: "info",
  logFile: null,
  logRedact: null,
} satisfies DispatchSettings);

/**
 * Reads the dispatch settings from the environment. Malformed values fall back
 * to the defaults; explicit overrides win over both and are validated.
 */
export function loadDispatchSettings(
  env: EnvSource = process.env,
  overrides: Partial<DispatchSettings> = {},
): DispatchSettings {
  const read = createEnvReader(env);
  const defaults = DEFAULT_DISPATCH_SETTINGS;
  const fromEnv: DispatchSettings = {
    dedupTtlMs: read.int("TOOL_DEDUP_TTL_MS", defaults.dedupTtlMs, { min: 0 }),
    eventsCapacity: read.int("RECENT_TOOL_EVENTS_CAPACITY", defaults.eventsCapacity, { min: 0 }),
    logsCapacity: read.int("RECENT_LOG_CAPACITY", defaults.logsCapacity, { min: 0 }),
    errorsCapacity: read.int("RECENT_TOOL_ERRORS_CAPACITY", defaults.errorsCapacity, { min: 0 }),
    outboundConcurrency: read.int("OUTBOUND_CONCURRENCY", defaults.outboundConcurrency, { min: 1 }),
    writeAllowed: read.bool("WRITE_ALLOWED", defaults.writeAllowed),
    protectedRef: read.string("PROTECTED_REF", defaults.protectedRef),
    writeGatePolicy: read.enumOf("WRITE_GATE_POLICY", WRITE_GATE_POLICIES, defaults.writeGatePolicy),
    validateArguments: read.bool("TOOL_SCHEMA_VALIDATION", defaults.validateArguments),
    callTimeoutMs: read.optionalInt("TOOL_CALL_TIMEOUT_MS", { min: 1 }) ?? defaults.callTimeoutMs,
    logLevel: read.enumOf("LOG_LEVEL", LOG_LEVELS, defaults.logLevel),
    logFile: read.optionalString("LOG_FILE") ?? defaults.logFile,
    logRedact: read.optionalString("LOG_REDACT") ?? defaults.logRedact,
  };
  return DispatchSettingsSchema.parse({ ...fromEnv, ...overrides });
}

/** Returns true when a remote credential is configured in the environment. */
export function hasConfiguredCredential(env: EnvSource = process.env): boolean {
  return createEnvReader(env).anyPresent(CREDENTIAL_ENV_VARS);
}
