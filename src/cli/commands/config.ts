import {
  loadConfig,
  saveConfig,
  isConfigKey,
  isNumericKey,
  withConfigValue,
  RepoctxConfigSchema,
  type ConfigKey,
  type RepoctxConfig,
} from '../../storage/config.js';
import { formatAsJson } from './json-formatter.js';

// Valid config keys that can be get/set
const VALID_KEYS = Object.keys(RepoctxConfigSchema.shape).filter(isConfigKey);

/**
 * Run the config command.
 *
 * @param key - Optional config key to get or set
 * @param value - Optional value to set (requires key)
 * @param json - Output as JSON if true
 * @returns Output string to display
 */
export async function runConfigCommand(key?: string, value?: string, json?: boolean): Promise<string> {
  const config = await loadConfig();

  // Show all config
  if (!key) {
    if (json) {
      return formatAsJson('config', config);
    }
    return formatConfig(config);
  }

  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${VALID_KEYS.join(', ')}`);
  }

  // Get single value
  if (value === undefined) {
    if (json) {
      return formatAsJson('config', { [key]: config[key] });
    }
    return formatValue(config[key]);
  }

  const updated = applyValue(config, key, value);
  await saveConfig(updated);

  if (json) {
    return formatAsJson('config', { [key]: updated[key] });
  }
  return `Set ${key} = ${formatValue(updated[key])}`;
}

/**
 * Parse a string value into the config, according to the key's type.
 */
function applyValue(config: RepoctxConfig, key: ConfigKey, value: string): RepoctxConfig {
  if (isNumericKey(key)) {
    const updated = withConfigValue(config, key, Number(value.trim()));
    if (!updated) {
      throw new Error(`Invalid numeric value for ${key}: ${value}`);
    }
    return updated;
  }

  // List fields are comma separated
  const updated = withConfigValue(config, key, value.split(',').map(s => s.trim()).filter(Boolean));
  if (!updated) {
    throw new Error(`Invalid value for ${key}: ${value}`);
  }
  return updated;
}

/**
 * Format a config value for display.
 */
function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}

/**
 * Format the entire config for display.
 */
function formatConfig(config: RepoctxConfig): string {
  return VALID_KEYS.map(key => `${key}: ${formatValue(config[key])}`).join('\n');
}
