/** Thin helpers around process.env. Use the config file for real config shaping. */
export function envString(
  env: NodeJS.ProcessEnv,
  name: string,
  def?: string,
): string | undefined {
  const v = env[name];
  return v == null || v === "" ? def : v;
}

export function envNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  def?: number,
): number | undefined {
  const v = env[name];
  if (v == null || v.trim() === "") return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}
