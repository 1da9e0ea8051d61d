// Barrel export for config module

export {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_PATH,
  parseLayoutConfig,
  loadLayoutConfig,
  resolveConfigPath,
} from './layoutConfig';
