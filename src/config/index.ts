export {
  DocfactsConfigSchema,
  LogLevelSchema,
  DocStyleSchema,
  CONFIG_FILE_NAMES,
  resolveConfig,
  loadConfig,
  parseConfigText,
  applyEnvOverrides,
  type DocfactsConfig,
  type DocfactsConfigInput,
} from './settings.js';
