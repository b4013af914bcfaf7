export function envOptional(name: string): string | undefined {
  const v = process.env[name];
  if (v === undefined || v === "") return undefined;
  return v;
}

export function envNumber(name: string, fallback: number, bounds?: { min?: number; max?: number }): number {
  const raw = (envOptional(name) ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  const lo = bounds?.min ?? -Infinity;
  const hi = bounds?.max ?? Infinity;
  return Math.max(lo, Math.min(hi, n));
}

export function envFlag(name: string, fallback = false): boolean {
  const raw = String(envOptional(name) ?? "").trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
}
