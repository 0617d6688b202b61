export { getEnv, loadEnv, resetEnvCache, type ValidatedEnv } from './config.js';
