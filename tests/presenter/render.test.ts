import { PLACEHOLDER, render, RenderOptions } from '@presenter/index';
import { emptySnapshot, fullSnapshot } from '../utils/fakeSource';

const PLAIN: RenderOptions = { colorEnabled: false, compact: false };
const COLOR: RenderOptions = { colorEnabled: true, compact: false };
const ANSI = /\u001b\[/;

const rowsOf = (output: string) => output.slice(0, -1).split('\n');

describe('render', () => {
  it('lays out every fact of a full snapshot', () => {
    const output = render(fullSnapshot(), '', PLAIN);
    expect(rowsOf(output)).toEqual([
      'tester@box1',
      '-----------',
      'OS:            Linux 6.8 (x86_64)',
      'Kernel:        6.8.0-test',
      'Uptime:        1d 1h 1m',
      'CPU:           Generic CPU',
      'Cores:         8',
      'Load:          0.80 4.00 7.20 (0.10 0.50 0.90 per core)',
      'Core 0:        [#---------] 12.5%',
      'Core 1:        [######----] 62.5%',
      'Memory:        8.00 GiB / 16.00 GiB (50.0%)',
      'Swap:          0 B / 2.00 GiB (0.0%)',
      'Disk (/):      80.00 GiB / 100.00 GiB (80.0%)',
      'IP (eth0):     10.0.0.5 (1000 Mbps)',
      'Net (eth0):    sent 1.00 GiB, received 2.00 GiB',
      'Temp (cpu):    45.0°C',
      'User (tester): pts/0 from 10.0.0.9 for 1h 1m',
    ]);
  });

  it('ends with exactly one trailing newline', () => {
    const output = render(fullSnapshot(), '', PLAIN);
    expect(output.endsWith('for 1h 1m\n')).toBe(true);
  });

  it('renders every absent fact as the placeholder', () => {
    const rows = rowsOf(render(emptySnapshot(), '', PLAIN));
    expect(rows[0]).toBe(`${PLACEHOLDER}@${PLACEHOLDER}`);
    expect(rows[1]).toBe('---------------');
    const labelled = rows.slice(2);
    expect(labelled).toHaveLength(14);
    for (const row of labelled) {
      expect(row.endsWith(` ${PLACEHOLDER}`)).toBe(true);
    }
    expect(labelled).toContain('CPU usage: unknown');
    expect(labelled).toContain('Disk:      unknown');
    expect(labelled).toContain('Memory:    unknown');
    expect(labelled).toContain('Users:     unknown');
  });

  it('omits swap when the machine has none', () => {
    const snapshot = { ...fullSnapshot(), swap: { ok: true as const, value: { total: 0, used: 0 } } };
    const output = render(snapshot, '', PLAIN);
    expect(output).not.toContain('Swap:');
  });

  it('says so when nobody is logged in', () => {
    const snapshot = { ...fullSnapshot(), sessions: { ok: true as const, value: [] } };
    const rows = rowsOf(render(snapshot, '', PLAIN));
    expect(rows[rows.length - 1]).toBe('Users:      none');
  });

  it('leaves out the parts of a session that were not reported', () => {
    const snapshot = {
      ...fullSnapshot(),
      sessions: { ok: true as const, value: [{ user: 'tester', terminal: 'tty1' }] },
    };
    const rows = rowsOf(render(snapshot, '', PLAIN));
    expect(rows[rows.length - 1]).toBe('User (tester): tty1');
  });

  it('shows load without the per-core figures when the core count is unknown', () => {
    const snapshot = { ...fullSnapshot(), cpuCores: { ok: false as const, reason: 'unavailable' } };
    expect(rowsOf(render(snapshot, '', PLAIN))).toContain('Load:          0.80 4.00 7.20');
  });

  it('shows a compact list without title, percentages or optional lines', () => {
    const rows = rowsOf(render(fullSnapshot(), '', { colorEnabled: false, compact: true }));
    expect(rows).toEqual([
      'Host:   box1',
      'OS:     Linux 6.8 (x86_64)',
      'Kernel: 6.8.0-test',
      'Uptime: 1d 1h 1m',
      'CPU:    Generic CPU',
      'Cores:  8',
      'Load:   0.80 4.00 7.20',
      'Memory: 8.00 GiB / 16.00 GiB',
    ]);
  });

  it('places the banner to the left of the facts', () => {
    const rows = rowsOf(render(fullSnapshot(), 'AB\nC\n', PLAIN));
    expect(rows).toHaveLength(17);
    expect(rows[0]).toBe('AB   tester@box1');
    expect(rows[1]).toBe('C    -----------');
    expect(rows[2]).toBe('     OS:            Linux 6.8 (x86_64)');
  });

  it('pads the fact column when the banner is taller', () => {
    const banner = Array.from({ length: 10 }, () => 'xx').join('\n');
    const rows = rowsOf(render(fullSnapshot(), banner, { colorEnabled: false, compact: true }));
    expect(rows).toHaveLength(10);
    expect(rows[0]).toBe('xx  Host:   box1');
    expect(rows[8]).toBe('xx');
    expect(rows[9]).toBe('xx');
  });

  it('has max(banner, facts) rows for any banner height', () => {
    for (const height of [1, 5, 8, 17, 24]) {
      const banner = Array.from({ length: height }, (_, i) => `#${i}`).join('\n');
      const rows = rowsOf(render(fullSnapshot(), banner, PLAIN));
      expect(rows).toHaveLength(Math.max(height, 17));
    }
  });

  it('drops the banner column for a blank banner', () => {
    const rows = rowsOf(render(fullSnapshot(), '  \n\n', PLAIN));
    expect(rows[0]).toBe('tester@box1');
  });

  it('is byte-identical across calls', () => {
    const first = render(fullSnapshot(), 'AB\nC', COLOR);
    const second = render(fullSnapshot(), 'AB\nC', COLOR);
    expect(second).toBe(first);
  });

  it('emits no escape sequences with color disabled', () => {
    expect(render(fullSnapshot(), 'AB\nC', PLAIN)).not.toMatch(ANSI);
    expect(render(emptySnapshot(), 'AB\nC', PLAIN)).not.toMatch(ANSI);
  });

  it('colors usage by threshold when color is enabled', () => {
    const output = render(fullSnapshot(), '', COLOR);
    expect(output).toContain('(\u001b[33m50.0%\u001b[39m)');
    expect(output).toContain('(\u001b[31m80.0%\u001b[39m)');
    expect(output).toContain('(\u001b[32m0.0%\u001b[39m)');
  });

  it('colors each per-core load figure by threshold', () => {
    const output = render(fullSnapshot(), '', COLOR);
    expect(output).toContain(
      '(\u001b[32m0.10\u001b[39m \u001b[33m0.50\u001b[39m \u001b[31m0.90\u001b[39m per core)',
    );
  });

  it('colors the core gauges and temperatures', () => {
    const output = render(fullSnapshot(), '', COLOR);
    expect(output).toContain('\u001b[32m[#---------] 12.5%\u001b[39m');
    expect(output).toContain('\u001b[33m[######----] 62.5%\u001b[39m');
    expect(output).toContain('\u001b[32m45.0°C\u001b[39m');
  });

  it('rejects unknown options', () => {
    const options = { colorEnabled: false, compact: false, wide: true };
    expect(() => render(fullSnapshot(), '', options)).toThrow();
  });

  describe('banner art with its own escape sequences', () => {
    const art = '\u001b[31m /\\ \u001b[0m\n\u001b[31m/__\\\u001b[0m';

    it('strips them with color disabled and aligns on the visible width', () => {
      const output = render(fullSnapshot(), art, PLAIN);
      expect(output).not.toMatch(ANSI);
      const rows = rowsOf(output);
      expect(rows[0]).toBe(' /\\    tester@box1');
      expect(rows[1]).toBe('/__\\   -----------');
      expect(rows[2]).toBe('       OS:            Linux 6.8 (x86_64)');
    });

    it('keeps them with color enabled', () => {
      const rows = rowsOf(render(fullSnapshot(), art, COLOR));
      expect(rows[0]).toBe('\u001b[31m /\\ \u001b[0m   \u001b[1mtester@box1\u001b[22m');
    });
  });

  it('aligns facts after wide characters in the banner', () => {
    const rows = rowsOf(render(fullSnapshot(), '日本\nab', PLAIN));
    expect(rows[0]).toBe('日本   tester@box1');
    expect(rows[1]).toBe('ab     -----------');
    expect(rows[2]).toBe('       OS:            Linux 6.8 (x86_64)');
  });
});
