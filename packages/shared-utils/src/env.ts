export function env(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function envNumber(key: string, defaultValue: number): number;
export function envNumber(key: string, defaultValue?: number): number | undefined;
export function envNumber(key: string, defaultValue?: number): number | undefined {
  const value = env(key);
  if (value === undefined) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}
