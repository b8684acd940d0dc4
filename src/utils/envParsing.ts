export function parseBooleanEnv(v: string | undefined, fallback: boolean): boolean {
  if (v === undefined) return fallback;
  const normalized = v.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function parseIntegerEnv(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === '') return fallback;
  const parsed = Number.parseInt(v, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}
