import chalk from "chalk";
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  setConfigValue,
} from "../../config/configManager.js";
import { type Config, configSchema } from "../../config/schema.js";
import { UserInputError } from "../../shared/errors.js";

const CONFIG_KEYS = Object.keys(configSchema.shape);

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(configSchema.shape, key);
}

function requireConfigKey(key: string): keyof Config {
  if (!isConfigKey(key)) {
    throw new UserInputError(`Unknown config key: ${key}`, {
      details: `Valid keys: ${CONFIG_KEYS.join(", ")}`,
    });
  }
  return key;
}

/**
 * Converts command-line text to the type the key currently holds.
 * Validation of the converted value is left to the schema.
 */
export function parseConfigInput(current: unknown, value: string): string | number | boolean {
  if (typeof current === "boolean") {
    return value === "true" || value === "1";
  }
  if (typeof current === "number") {
    return Number(value);
  }
  return value;
}

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Sets a configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  const configKey = requireConfigKey(key);
  const parsedValue = parseConfigInput(getConfigValue(configKey), value);

  const updated = setConfigValue(configKey, parsedValue);
  console.log(chalk.green(`\n✅ Set ${configKey} = ${String(updated[configKey])}\n`));
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  console.log(String(getConfigValue(requireConfigKey(key))));
}
