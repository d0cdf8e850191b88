export { createLogger, PinoLogger } from './logger';
export type { LoggerOptions } from './logger';
