/**
 * Environment Variable Validator
 *
 * Resolves the environment a logscope command runs with: required variables
 * must be present, optional ones fall back to their defaults.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (the command won't run without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

/**
 * Validate environment variables against a set of requirements.
 *
 * An empty string counts as unset. Optional variables without a default are
 * left out of `values` and reported only at debug level, since most of them
 * switch on an optional feature.
 *
 * Missing required variables are logged and reported through `valid` and
 * `errors`; the caller decides whether to stop.
 *
 * @param requirements - Variables to resolve
 * @param env - Variable source. Default: process.env
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  env: NodeJS.ProcessEnv = process.env,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];
    const described = req.description ? ` (${req.description})` : "";

    if (value !== undefined && value !== "") {
      values[req.name] = value;
      continue;
    }

    if (req.required) {
      errors.push(`Missing required env var: ${req.name}${described}`);
    } else if (req.default !== undefined) {
      values[req.name] = req.default;
    } else {
      warnings.push(`Optional env var ${req.name} not set${described}`);
    }
  }

  if (warnings.length > 0) {
    logger.debug({ warnings }, "Optional environment variables not set");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

// ---------------------------------------------------------------------------
// Command requirement sets
// ---------------------------------------------------------------------------

// LOG_LEVEL is read by createLogger itself.
export const ANALYZER_ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "LOGSCOPE_OUT_DIR", required: false, default: "output", description: "Report output directory" },
  { name: "DATABASE_URL", required: false, description: "PostgreSQL connection string; enables persistence" },
];
