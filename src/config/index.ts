/**
 * Configuration module exports
 */

export {
  resolveConnectionSettings,
  resolveNotFoundPolicy,
  resolveAuthHelperPassword,
  readSettingsFile,
  parseAuthHelperArgs,
  getSettingsPath,
  type ConnectionOverrides,
  type ConnectionSettings,
  type SettingSource,
  type Env,
} from './fmc-auth.js';
