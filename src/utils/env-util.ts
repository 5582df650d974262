import { log } from './log-util';
import { LogLevel } from '../enums';
import { ConfigurationError } from '../errors';

/**
 * Checks that a given environment variable exists, and returns
 * its value if it does. Conditionally throws an error on failure.
 *
 * @param {string} envVar - the environment variable to retrieve
 * @param {string} defaultValue - default value to use if no environment var is found
 * @returns {string} - the value of the env var being checked, or the default value if one is passed
 */
export function getEnvVar(envVar: string, defaultValue?: string): string {
  log('getEnvVar', LogLevel.INFO, `Fetching env var '${envVar}'`);

  const value = process.env[envVar] || defaultValue;
  if (value === undefined) {
    log(
      'getEnvVar',
      LogLevel.ERROR,
      `Missing environment variable '${envVar}'`,
    );
    throw new ConfigurationError(`Missing environment variable '${envVar}'`);
  }
  return value;
}

/**
 * Reads an enumerated setting, lower-cased, and checks it against the
 * values the setting accepts.
 *
 * @param {string} envVar - the environment variable to retrieve
 * @param {T[]} allowed - every value the setting accepts
 * @param {T} defaultValue - the value used when the variable is unset
 */
export function getEnumEnvVar<T extends string>(
  envVar: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const value = getEnvVar(envVar, defaultValue).toLowerCase();
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`Invalid value for ${envVar}: ${value}`);
  }
  return match;
}
