export type EnvSource = Record<string, string | undefined>;

export function env(name: string, source: EnvSource = process.env): string | undefined {
  const v = source[name];
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

export function parseIntEnv(name: string, def: number, min: number, max: number, source: EnvSource = process.env): number {
  const raw = env(name, source);
  if (!raw) return def;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return def;
  return Math.min(Math.max(n, min), max);
}

export function parseBoolEnv(name: string, source: EnvSource = process.env): boolean {
  const raw = (env(name, source) || "").toLowerCase();
  return raw === "1" || raw === "true";
}
