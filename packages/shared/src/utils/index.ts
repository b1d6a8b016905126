export { createLogger, type LoggerOptions } from "./logger.js";
export {
  validateEnvironment,
  type EnvRequirement,
  type EnvValidationResult,
  ANALYZER_ENV_REQUIREMENTS,
} from "./env-validator.js";
