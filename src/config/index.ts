/**
 * Config モジュール
 */

export {
  SETTINGS_ENV,
  SettingsSchema,
  parseSettings,
  resolveSettingsPath,
  defaultSettingsPaths,
  loadSettings,
  loadSshPublicKeys,
  expandHome,
} from "./settings.js";
export type { Settings, LoadSettingsOptions } from "./settings.js";
