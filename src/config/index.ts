export {
  DEFAULT_FEATURE_PATTERNS,
  ENV_EXCLUDE_PATHS,
  ENV_FEATURE_PATTERNS,
  ENV_STRICT,
  resolveConfig,
  splitList,
} from "./config.js";
export type {
  ConfigOverrides,
  Environment,
  ResolveConfigInput,
  ScanConfig,
} from "./config.js";
export { CONFIGURATION_ERROR_EXIT_CODE, ConfigurationError } from "./errors.js";
