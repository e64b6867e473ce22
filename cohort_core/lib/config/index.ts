export { SettingsError, loadSettings } from './settings';
export type { AiSettings, CohortSettings } from './settings';
