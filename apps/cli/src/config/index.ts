export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults";
export type { ConfigData } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve";
export { initConfig, getConfig, toSettings } from "./runtime";
export type { Settings } from "./runtime";
