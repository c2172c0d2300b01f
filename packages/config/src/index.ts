export type { ConfigProvider } from './types';
export { EnvConfigProvider } from './env-config';
export { readSettings, ConfigError, type ConfigIssue } from './settings';
