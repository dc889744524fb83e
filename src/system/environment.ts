function assertEnvKey(key: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    throw new Error(`invalid env var name: ${key}`);
  }
}

export function envKeyPresent(env: readonly string[], key: string): boolean {
  return envValue(env, key) !== null;
}

/** Value of the first `KEY=` entry, or null when the key is not exported. */
export function envValue(env: readonly string[], key: string): string | null {
  const prefix = `${key}=`;
  const entry = env.find((e) => e.startsWith(prefix));
  return entry === undefined ? null : entry.slice(prefix.length);
}

/**
 * Appends `KEY=VALUE` to a job environment unless the key is already present;
 * a value the submitter exported always wins. Returns whether it was added.
 */
export function appendEnv(env: string[], key: string, value: string): boolean {
  assertEnvKey(key);
  if (envKeyPresent(env, key)) return false;
  env.push(`${key}=${value}`);
  return true;
}
