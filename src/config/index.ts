import * as fs from 'fs';
import * as path from 'path';
import { ConfigSchema, type Config } from '@/types/config';
import { ConfigurationError } from '@/core/errors';

type ConfigNode = string | number | boolean | null | ConfigNode[] | { [key: string]: ConfigNode };
type ConfigObject = { [key: string]: ConfigNode };

function isConfigObject(value: ConfigNode | undefined): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Development fallbacks for placeholders that are not set in the environment
const fallbacks: Record<string, string> = {
  'HOST': '0.0.0.0',
  'PORT': '3000'
};

function resolveEnvVars(node: ConfigNode): ConfigNode {
  if (typeof node === 'string') {
    // Replace ${VAR_NAME} with process.env.VAR_NAME or fallback values
    return node.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
      const value = process.env[varName];
      if (value !== undefined) {
        return value;
      }
      return fallbacks[varName] ?? match;
    });
  } else if (Array.isArray(node)) {
    return node.map(resolveEnvVars);
  } else if (isConfigObject(node)) {
    const resolved: ConfigObject = {};
    for (const [key, value] of Object.entries(node)) {
      resolved[key] = resolveEnvVars(value);
    }
    return resolved;
  }
  return node;
}

function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isConfigObject(value) && isConfigObject(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function readJson(filePath: string): ConfigObject {
  const parsed: ConfigNode = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!isConfigObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function loadConfig(): ConfigObject {
  const env = process.env.NODE_ENV || 'development';
  const configDir = process.env.CONFIG_DIR || path.resolve(process.cwd(), 'config');

  const defaultConfig = readJson(path.join(configDir, 'default.json'));

  // Environment-specific config overrides default
  const envConfigPath = path.join(configDir, `${env}.json`);
  if (fs.existsSync(envConfigPath)) {
    return deepMerge(defaultConfig, readJson(envConfigPath));
  }
  return defaultConfig;
}

function processSpecialValues(node: ConfigNode): ConfigNode | undefined {
  if (typeof node === 'string') {
    if (node.startsWith('${') && node.endsWith('}')) {
      const varName = node.slice(2, -1);
      if (varName === 'LOG_LEVEL') {
        return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
      }
      if (varName.endsWith('_TOKEN') || varName.endsWith('_JWT')) {
        throw new ConfigurationError(
          `Missing required configuration: ${varName}. Set it in your environment or .env file.`
        );
      }
      return undefined;
    }
    if (node === '') {
      return undefined;
    }
    // Numbers and booleans are coerced by the schema; ids stay strings
    return node;
  } else if (Array.isArray(node)) {
    return node
      .map(processSpecialValues)
      .filter((value): value is ConfigNode => value !== undefined);
  } else if (isConfigObject(node)) {
    const processed: ConfigObject = {};
    for (const [key, value] of Object.entries(node)) {
      const result = processSpecialValues(value);
      if (result !== undefined) {
        processed[key] = result;
      }
    }
    return processed;
  }
  return node;
}

/**
 * Load, resolve and validate configuration.
 * Throws ConfigurationError (or a ZodError) instead of exiting so callers decide.
 */
export function buildConfig(): Config {
  const resolved = resolveEnvVars(loadConfig());
  return ConfigSchema.parse(processSpecialValues(resolved));
}

function validateConfig(): Config {
  try {
    return buildConfig();
  } catch (error) {
    // Don't use logger here to avoid circular dependency
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }

    console.error('Configuration validation failed:', error);
    if (error && typeof error === 'object' && 'issues' in error && Array.isArray(error.issues)) {
      for (const issue of error.issues) {
        console.error(`  • ${issue.path.join('.')}: ${issue.message}`);
      }
      console.error('\nPlease check your .env file and config/default.json\n');
    }

    process.exit(1);
  }
}

export const appConfig = validateConfig();
export default appConfig;
