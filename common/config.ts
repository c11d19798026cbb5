/**
 * Reads `--name=value` from argv. The last occurrence wins, like most CLIs.
 */
export function argValue(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  let found: string | undefined;
  for (const arg of argv) {
    if (arg.startsWith(prefix)) {
      found = arg.slice(prefix.length);
    }
  }
  return found;
}

/** Command line flag first, then the environment variable. */
export function setting(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  flag: string,
  envName?: string
): string | undefined {
  return argValue(argv, flag) ?? (envName ? env[envName] : undefined);
}
