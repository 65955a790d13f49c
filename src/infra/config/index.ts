export { EnvSchema, parseEnv, createConfig, splitList } from './env.js';
export type { Env, AppConfig } from './env.js';
