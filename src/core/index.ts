export * from './logger/index.js';
export { configFromEnv, loadProcessEnv, parseLogEnv, type LogEnv } from './env.js';
