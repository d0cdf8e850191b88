export { ConfigurationError, loadConfig } from './config';
export type { AppConfig, Env, LogLevel } from './config';
