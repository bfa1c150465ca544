const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'] as const;
const STEP = 1024;

export const THRESHOLD_GREEN = 50;
export const THRESHOLD_YELLOW = 80;

export type UsageColor = 'green' | 'yellow' | 'red';

/**
 * Formats a byte count with IEC units. The unit is settled after rounding,
 * so 1023.999 MiB prints as "1.00 GiB" rather than "1024.00 MiB".
 */
export function formatBytes(count: number): string {
  if (!Number.isFinite(count) || count < 0) {
    throw new RangeError(`byte count must be a finite number >= 0, got ${count}`);
  }
  if (count < STEP) return `${Math.floor(count)} B`;

  let value = count;
  let unit = 0;
  while (value >= STEP && unit < BYTE_UNITS.length - 1) {
    value /= STEP;
    unit += 1;
  }
  if (unit < BYTE_UNITS.length - 1 && Number(value.toFixed(2)) >= STEP) {
    value /= STEP;
    unit += 1;
  }
  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3_600);
  const minutes = Math.floor((total % 3_600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (days > 0 || hours > 0) parts.push(`${hours}h`);
  parts.push(`${minutes}m`);
  return parts.join(' ');
}

export function percentOf(used: number, total: number): number {
  if (total <= 0) return 0;
  return (used / total) * 100;
}

export function formatPercent(used: number, total: number): string {
  return `${percentOf(used, total).toFixed(1)}%`;
}

export function usageColor(percent: number): UsageColor {
  if (percent < THRESHOLD_GREEN) return 'green';
  if (percent < THRESHOLD_YELLOW) return 'yellow';
  return 'red';
}

export function formatLoad(load: readonly number[]): string {
  return load.map((value) => value.toFixed(2)).join(' ');
}

export const GAUGE_WIDTH = 10;

/** An ASCII bar such as "[###-------]" for a 0-100 percentage. */
export function formatGauge(percent: number, width: number = GAUGE_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

export function formatCelsius(celsius: number): string {
  return `${celsius.toFixed(1)}°C`;
}
