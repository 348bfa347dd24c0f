export {
  EnvSchema,
  DEFAULT_MAX_UPLOAD_BYTES,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
