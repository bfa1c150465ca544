import chalk from 'chalk';
import stringWidth from 'string-width';
import { z } from 'zod';
import { Fact, factValue, LoadAverage, MemoryUsage, Session, SystemSnapshot } from '../collector/types';
import {
  formatBytes,
  formatCelsius,
  formatDuration,
  formatGauge,
  formatLoad,
  formatPercent,
  percentOf,
  usageColor,
} from './format';
import { bannerLines, Cell, cell, padEndWidth, sideBySide } from './layout';

export * from './format';
export { toJson } from './json';

export const PLACEHOLDER = 'unknown';

export const renderOptionsSchema = z
  .object({
    colorEnabled: z.boolean(),
    compact: z.boolean(),
  })
  .strict();

export type RenderOptions = z.infer<typeof renderOptionsSchema>;

export type Painter = chalk.Chalk;

export type FactRow = { label: string; value: Cell } | { line: Cell };

function painterFor(options: RenderOptions): Painter {
  return new chalk.Instance({ level: options.colorEnabled ? 1 : 0 });
}

function placeholder(paint: Painter): Cell {
  return cell(PLACEHOLDER, paint.gray(PLACEHOLDER));
}

function textCell(fact: Fact<string | number>, paint: Painter): Cell {
  return fact.ok ? cell(String(fact.value)) : placeholder(paint);
}

function usageCell(usage: MemoryUsage, paint: Painter, withPercent: boolean): Cell {
  const amount = `${formatBytes(usage.used)} / ${formatBytes(usage.total)}`;
  if (!withPercent) return cell(amount);
  const percent = formatPercent(usage.used, usage.total);
  const color = usageColor(percentOf(usage.used, usage.total));
  return cell(`${amount} (${percent})`, `${amount} (${paint[color](percent)})`);
}

function gaugeCell(percent: number, paint: Painter): Cell {
  const text = `${formatGauge(percent)} ${percent.toFixed(1)}%`;
  return cell(text, paint[usageColor(percent)](text));
}

// Per-core figures are coloured as a share of one fully busy core.
function loadCell(load: LoadAverage, cores: number | undefined, paint: Painter, compact: boolean): Cell {
  const raw = formatLoad(load);
  if (compact || cores === undefined) return cell(raw);
  const perCore = load.map((value) => value / cores);
  const styled = perCore.map((value) => paint[usageColor(value * 100)](value.toFixed(2))).join(' ');
  return cell(`${raw} (${formatLoad(perCore)} per core)`, `${raw} (${styled} per core)`);
}

function sessionCell(session: Session): Cell {
  let text = session.terminal;
  if (session.host) text += ` from ${session.host}`;
  if (session.seconds !== undefined) text += ` for ${formatDuration(session.seconds)}`;
  return cell(text);
}

function titleRows(snapshot: SystemSnapshot, paint: Painter): FactRow[] {
  const user = factValue(snapshot.user) ?? PLACEHOLDER;
  const host = factValue(snapshot.hostname) ?? PLACEHOLDER;
  const title = `${user}@${host}`;
  return [
    { line: cell(title, paint.bold(title)) },
    { line: cell('-'.repeat(stringWidth(title))) },
  ];
}

function osCell(snapshot: SystemSnapshot, paint: Painter): Cell {
  const name = textCell(snapshot.osName, paint);
  if (!snapshot.arch.ok) return name;
  const suffix = ` (${snapshot.arch.value})`;
  return cell(name.plain + suffix, name.styled + suffix);
}

function detailRows(snapshot: SystemSnapshot, paint: Painter): FactRow[] {
  const { swap, disks, addresses, traffic, temperatures, sessions } = snapshot;
  const rows: FactRow[] = [];

  if (!swap.ok) {
    rows.push({ label: 'Swap', value: placeholder(paint) });
  } else if (swap.value.total > 0) {
    rows.push({ label: 'Swap', value: usageCell(swap.value, paint, true) });
  }

  if (disks.ok) {
    for (const disk of disks.value) {
      rows.push({ label: `Disk (${disk.mount})`, value: usageCell(disk, paint, true) });
    }
  } else {
    rows.push({ label: 'Disk', value: placeholder(paint) });
  }

  if (addresses.ok) {
    for (const entry of addresses.value) {
      const speed = entry.speedMbps ? ` (${entry.speedMbps} Mbps)` : '';
      rows.push({ label: `IP (${entry.iface})`, value: cell(`${entry.address}${speed}`) });
    }
  } else {
    rows.push({ label: 'IP', value: placeholder(paint) });
  }

  if (traffic.ok) {
    for (const entry of traffic.value) {
      const text = `sent ${formatBytes(entry.sent)}, received ${formatBytes(entry.received)}`;
      rows.push({ label: `Net (${entry.iface})`, value: cell(text) });
    }
  } else {
    rows.push({ label: 'Net', value: placeholder(paint) });
  }

  if (temperatures.ok) {
    for (const entry of temperatures.value) {
      const text = formatCelsius(entry.celsius);
      rows.push({ label: `Temp (${entry.sensor})`, value: cell(text, paint[usageColor(entry.celsius)](text)) });
    }
  } else {
    rows.push({ label: 'Temp', value: placeholder(paint) });
  }

  if (!sessions.ok) {
    rows.push({ label: 'Users', value: placeholder(paint) });
  } else if (sessions.value.length === 0) {
    rows.push({ label: 'Users', value: cell('none') });
  } else {
    for (const session of sessions.value) {
      rows.push({ label: `User (${session.user})`, value: sessionCell(session) });
    }
  }
  return rows;
}

export function buildFactRows(snapshot: SystemSnapshot, options: RenderOptions, paint: Painter): FactRow[] {
  const { compact } = options;
  const rows: FactRow[] = compact
    ? [{ label: 'Host', value: textCell(snapshot.hostname, paint) }]
    : titleRows(snapshot, paint);

  const { uptimeSeconds, loadAverage, cpuUsage, memory } = snapshot;
  rows.push(
    { label: 'OS', value: osCell(snapshot, paint) },
    { label: 'Kernel', value: textCell(snapshot.kernel, paint) },
    {
      label: 'Uptime',
      value: uptimeSeconds.ok ? cell(formatDuration(uptimeSeconds.value)) : placeholder(paint),
    },
    { label: 'CPU', value: textCell(snapshot.cpuModel, paint) },
    { label: 'Cores', value: textCell(snapshot.cpuCores, paint) },
    {
      label: 'Load',
      value: loadAverage.ok
        ? loadCell(loadAverage.value, factValue(snapshot.cpuCores), paint, compact)
        : placeholder(paint),
    },
  );

  if (!compact) {
    if (cpuUsage.ok) {
      cpuUsage.value.forEach((percent, index) => {
        rows.push({ label: `Core ${index}`, value: gaugeCell(percent, paint) });
      });
    } else {
      rows.push({ label: 'CPU usage', value: placeholder(paint) });
    }
  }

  rows.push({ label: 'Memory', value: memory.ok ? usageCell(memory.value, paint, !compact) : placeholder(paint) });
  if (compact) return rows;

  return [...rows, ...detailRows(snapshot, paint)];
}

function toCells(rows: FactRow[], paint: Painter): Cell[] {
  const width = Math.max(0, ...rows.map((row) => ('label' in row ? stringWidth(row.label) + 1 : 0)));
  return rows.map((row) => {
    if ('line' in row) return row.line;
    const label = padEndWidth(`${row.label}:`, width);
    return cell(`${label} ${row.value.plain}`, `${paint.bold.yellow(label)} ${row.value.styled}`);
  });
}

function bannerCells(bannerText: string, settings: RenderOptions, paint: Painter): Cell[] {
  return bannerLines(bannerText).map((line) => {
    if (!settings.colorEnabled) return cell(line.plain);
    // Art that brings its own colours keeps them.
    return line.styled !== line.plain ? line : cell(line.plain, paint.cyan(line.plain));
  });
}

/**
 * Renders the banner beside the fact list. Pure: the same snapshot, banner
 * and options always produce the same string, ending in a newline.
 */
export function render(snapshot: SystemSnapshot, bannerText: string, options: RenderOptions): string {
  const settings = renderOptionsSchema.parse(options);
  const paint = painterFor(settings);
  const facts = toCells(buildFactRows(snapshot, settings, paint), paint);
  const banner = bannerCells(bannerText, settings, paint);
  const gap = settings.compact ? 2 : 3;
  return `${sideBySide(banner, facts, gap).join('\n')}\n`;
}
