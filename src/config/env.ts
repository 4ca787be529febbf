const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Substitutes `${VAR}` and `${VAR:-fallback}` in every string value. An unset
 * variable without a fallback is left as written.
 */
export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match, key: string, fallback: string | undefined) => {
      const value = env[key];
      if (value !== undefined && value !== "") {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return value ?? match;
    });
  }

  if (Array.isArray(config)) {
    return config.map((item) => replaceEnvVars(item, env));
  }

  if (isPlainObject(config)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = replaceEnvVars(value, env);
    }
    return result;
  }

  return config;
}

/** Names referenced by placeholders that have neither a value nor a fallback. */
export function findUnresolvedEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): string[] {
  const missing = new Set<string>();
  const visit = (value: unknown): void => {
    if (typeof value === "string") {
      for (const [, key, fallback] of value.matchAll(ENV_PATTERN)) {
        if (env[key] === undefined && fallback === undefined) {
          missing.add(key);
        }
      }
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (isPlainObject(value)) {
      Object.values(value).forEach(visit);
    }
  };
  visit(config);
  return [...missing].toSorted();
}
