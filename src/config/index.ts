export { createConfig } from './curveConfig.js';
export {
  loadSettings,
  applySettings,
  defaultSettings,
  resolveSettingsPath,
  DEFAULT_SIMULATION,
  SETTINGS_FILE,
  SETTINGS_ENV
} from './settings.js';
export type { AppSettings, SimulationSettings } from './settings.js';
