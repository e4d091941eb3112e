/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge } from './config-system-impl.js'
export type { ConfigSource, ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ConductorConfigSchema,
  PartialConductorConfigSchema,
  RejectionPolicySchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  ConductorConfig,
  PartialConductorConfig,
  RejectionPolicyName,
  LogLevelValue,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_STATE_DIR } from './defaults.js'
