const TRUTHY = new Set(['1', 'true', 't', 'yes', 'y', 'on']);

export function env(key: string, fallback?: string): string {
  const value = process.env[key];
  if (value !== undefined) {
    return value;
  }

  if (fallback !== undefined) {
    return fallback;
  }

  return '';
}

export function envBool(key: string, fallback = false): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return fallback;
  }
  return TRUTHY.has(value.trim().toLowerCase());
}

/** Reads an integer variable; unset, blank or non-numeric values yield the fallback. */
export function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}
