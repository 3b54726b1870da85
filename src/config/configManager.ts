import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { applyConfigValue, type Config, configSchema } from "./schema.js";

let store: Conf<Config> | undefined;

/**
 * Application configuration store using conf package.
 * Provides atomic writes, dot-notation access, and safe defaults.
 * Opened on first use.
 */
function getStore(): Conf<Config> {
  store ??= new Conf<Config>({
    projectName: "lecturecap",
    cwd: APP_DIR,
    configName: "config",
    defaults: configSchema.parse({}),
  });
  return store;
}

/**
 * Loads the application configuration.
 * Returns validated config with defaults applied.
 */
export function loadConfig(): Config {
  return configSchema.parse(getStore().store);
}

/**
 * Updates one config value and persists the validated result.
 */
export function setConfigValue(key: keyof Config, value: unknown): Config {
  const updated = applyConfigValue(loadConfig(), key, value);
  getStore().store = updated;
  return updated;
}

/**
 * Gets a specific config value.
 */
export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return loadConfig()[key];
}

/**
 * Gets the path to the config file.
 */
export function getConfigPath(): string {
  return getStore().path;
}
