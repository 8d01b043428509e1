/** The node.js environment variable interface */
export interface Env {
  [key: string]: string | undefined;
}

/**
 * Get a string from the environment variable.
 * @throws Error if the variable is not found or empty and no default value was provided.
 */
export const getEnvVariableString = (
  env: Env,
  field: string,
  fallbackField: string,
  defaultValue?: string,
): string => {
  const value = env[field] ?? env[fallbackField];
  if (typeof value !== 'string' || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(
      `The environment variable ${field} must be a non-empty string.`,
    );
  }
  return value;
};

/**
 * Get an optional string from the environment variable. Empty values are
 * treated as not set.
 */
export const getEnvVariableOptionalString = (
  env: Env,
  field: string,
  fallbackField: string,
): string | undefined => {
  const value = env[field] ?? env[fallbackField];
  return value === '' ? undefined : value;
};

/**
 * Get a number from the environment variable.
 * @throws Error if the variable is not found or not a number and no default value was provided.
 */
export const getEnvVariableNumber = (
  env: Env,
  field: string,
  fallbackField: string,
  defaultValue?: number,
): number => {
  const raw = getEnvVariableOptionalString(env, field, fallbackField);
  if (raw === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`The environment variable ${field} must be a number.`);
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`The environment variable ${field} must be a number.`);
  }
  return value;
};

export interface SettingDescription {
  constantName: string;
  default?: string | number | boolean;
}

/**
 * Shows the available env variables and their default values
 * @param map A list of all the env variables with their default values.
 * @param envPrefix The prefix for the env variables to check first (e.g. "EMAIL_OUTBOX_SMTP_").
 * @param envPrefixFallback The fallback prefix if the other is not found.
 * @returns A string with all the ENV config keys and their default values.
 */
export const printConfigSettings = (
  map: SettingDescription[],
  envPrefix: string,
  envPrefixFallback: string,
): string => {
  let result = '';
  for (const s of map) {
    const value = s.default ?? '';
    result += `${envPrefix}${s.constantName}=${value}
# ${envPrefixFallback}${s.constantName}=${value}
`;
  }
  return result;
};
