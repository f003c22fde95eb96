import { ConfigError } from "./errors";

export function env(name: string, fallback?: string): string {
  const v = process.env[name];
  if (v === undefined || v === "") {
    if (fallback !== undefined) return fallback;
    throw new ConfigError(`Missing env: ${name}`);
  }
  return v;
}

export function envOptional(name: string): string | undefined {
  const v = process.env[name];
  if (v === undefined || v === "") return undefined;
  return v;
}

export function envInt(name: string, fallback: number): number {
  const raw = env(name, String(fallback)).trim();
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || String(n) !== raw) throw new ConfigError(`Invalid integer env: ${name}=${raw}`);
  return n;
}

export function envFlag(name: string, fallback = false): boolean {
  const raw = envOptional(name);
  if (raw === undefined) return fallback;
  return /^(1|true|yes|on)$/i.test(raw.trim());
}
