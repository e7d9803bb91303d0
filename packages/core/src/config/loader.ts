/**
 * Engine configuration loader
 *
 * Reads a JSONC document of the form `{ "profile": "balanced", ...overrides }`,
 * expands environment placeholders and validates the merged bundle.
 */

import { readFile } from 'node:fs/promises';
import { type ParseError, parse, printParseErrorCode } from 'jsonc-parser';
import { ErrorCode } from '../errors/codes.js';
import { isTidewatchError, TidewatchError } from '../errors/tidewatch-error.js';
import { mergeWithProfile } from '../profiles.js';
import type { EngineConfig } from '../schemas.js';
import { expandConfigValues, type GetEnv, processEnv } from '../utils/env-expander.js';
import { err, ok, type Result } from '../utils/result.js';

export type LoadEngineConfigOptions = {
  getEnv?: GetEnv;
  /** Profile used when the document does not name one */
  defaultProfile?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  isRecord(error) && error.code === 'ENOENT';

/**
 * Parse JSONC text into an engine configuration
 */
export function parseEngineConfig(
  text: string,
  options: LoadEngineConfigOptions = {},
  configPath?: string
): Result<EngineConfig> {
  const errors: ParseError[] = [];
  const document: unknown = parse(text, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const issues = errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    return err(
      new TidewatchError(ErrorCode.E_CONFIG_PARSE, `Cannot parse configuration`, {
        configPath,
        issues
      })
    );
  }

  if (!isRecord(document)) {
    return err(
      new TidewatchError(ErrorCode.E_CONFIG_PARSE, 'Configuration must be a JSON object', {
        configPath
      })
    );
  }

  try {
    const expanded = expandConfigValues(document, options.getEnv ?? processEnv);
    const record: Record<string, unknown> = isRecord(expanded) ? expanded : {};
    const { profile, ...overrides } = record;
    const profileName = typeof profile === 'string' ? profile : options.defaultProfile;
    return ok(mergeWithProfile(profileName, overrides));
  } catch (error) {
    if (isTidewatchError(error)) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Load and validate an engine configuration file
 */
export async function loadEngineConfig(
  configPath: string,
  options: LoadEngineConfigOptions = {}
): Promise<Result<EngineConfig>> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    const code = isMissingFile(error) ? ErrorCode.E_CONFIG_NOT_FOUND : ErrorCode.E_CONFIG_PARSE;
    return err(
      new TidewatchError(code, `Cannot read configuration at ${configPath}`, { configPath }, error)
    );
  }

  return parseEngineConfig(text, options, configPath);
}
