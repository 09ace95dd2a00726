export { loadSettings, EnvironmentSchema, DEFAULT_SETTINGS } from './settings';
export type { MaintenanceSettings, LogLevel } from './settings';
