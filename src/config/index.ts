/**
 * Configuration module exports
 */

export {
  ENV_PREFIX,
  LOCAL_CONFIG_FILE,
  loadLocalConfig,
  resolveSettings,
  type ResolveSettingsOptions,
  type SettingsResolution,
} from './operator.js';
