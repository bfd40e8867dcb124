// `${VAR}` or `$VAR` as the whole value; anything else is returned as-is.
export function expandEnvToken(value: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;

  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}
