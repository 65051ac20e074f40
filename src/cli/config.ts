import { ConversionError, type FieldError } from "../core/errors.js";
import { DEFAULT_PROGRESS_INTERVAL } from "../core/impl/converter.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { asNonEmpty, asOneOf, asPositiveInt, pushErr } from "./validation.js";

export interface RunConfig {
  logLevel: LogLevel;
  progressInterval: number;
}

/** Raw flag values as commander hands them over. */
export interface ConfigFlags {
  logLevel?: string;
  progressInterval?: string;
}

/**
 * Flags win over the environment:
 * - `LOG_LEVEL` (debug | info | warn | error | silent), `DEBUG=1` forces debug
 * - `PROGRESS_INTERVAL`, postings lists between progress lines
 */
export function resolveConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const errors: FieldError[] = [];

  const rawLevel = asNonEmpty(flags.logLevel) ?? (isTruthy(env.DEBUG) ? "debug" : asNonEmpty(env.LOG_LEVEL));
  const logLevel = rawLevel === undefined ? "info" : asOneOf(rawLevel, LOG_LEVELS);
  if (!logLevel) pushErr(errors, "$.logLevel", `must be one of: ${LOG_LEVELS.join(", ")}`);

  const rawInterval = asNonEmpty(flags.progressInterval) ?? asNonEmpty(env.PROGRESS_INTERVAL);
  const progressInterval = rawInterval === undefined ? DEFAULT_PROGRESS_INTERVAL : asPositiveInt(rawInterval);
  if (!progressInterval) pushErr(errors, "$.progressInterval", "must be a positive integer");

  if (errors.length || !logLevel || !progressInterval) {
    throw new ConversionError({ code: "INVALID_ARGUMENT", detail: "invalid configuration", errors });
  }
  return { logLevel, progressInterval };
}

function isTruthy(v: string | undefined): boolean {
  const s = (v ?? "").trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}
