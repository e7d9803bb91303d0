/**
 * Environment variable expansion for configuration files
 *
 * Supports:
 * - ${VAR} - expands to the value of VAR
 * - ${VAR:-default} - expands to VAR if set, otherwise uses default
 */

import { ErrorCode } from '../errors/codes.js';
import { TidewatchError } from '../errors/tidewatch-error.js';

export type GetEnv = (key: string) => string | undefined;

const PLACEHOLDER = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

export const processEnv: GetEnv = (key) => process.env[key];

/**
 * Expand environment variables in a string
 * @throws TidewatchError when a variable without default is undefined
 */
export function expandEnvironmentVariables(value: string, getEnv: GetEnv = processEnv): string {
  return value.replace(PLACEHOLDER, (_match, varName: string, defaultValue?: string) => {
    const envValue = getEnv(varName);

    if (envValue !== undefined) {
      return envValue;
    }

    if (defaultValue !== undefined) {
      return defaultValue;
    }

    throw new TidewatchError(
      ErrorCode.E_CONFIG_ENV_MISSING,
      `Environment variable '${varName}' is not defined and no default value provided`,
      { variable: varName }
    );
  });
}

/**
 * Numbers and booleans written as placeholders come back as strings; turn them
 * back into scalars so the schema sees the intended type.
 */
function toScalar(expanded: string): string | number | boolean {
  if (expanded === 'true') return true;
  if (expanded === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(expanded)) return Number(expanded);
  return expanded;
}

/**
 * Recursively expand every string value of a parsed configuration document
 */
export function expandConfigValues(config: unknown, getEnv: GetEnv = processEnv): unknown {
  if (typeof config === 'string') {
    PLACEHOLDER.lastIndex = 0;
    if (!PLACEHOLDER.test(config)) {
      return config;
    }
    return toScalar(expandEnvironmentVariables(config, getEnv));
  }

  if (Array.isArray(config)) {
    return config.map((item) => expandConfigValues(item, getEnv));
  }

  if (config !== null && typeof config === 'object') {
    const expanded: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      expanded[key] = expandConfigValues(value, getEnv);
    }
    return expanded;
  }

  return config;
}
