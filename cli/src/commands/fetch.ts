import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { z } from 'zod';
import { resolveBanner } from '../../../src/banner';
import { collect, factValue, SystemSource } from '../../../src/collector';
import { render, toJson } from '../../../src/presenter';
import { logger, setLogLevel } from '../../../src/telemetry';

export type FetchDeps = {
  source?: SystemSource;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
  setExitCode?: (code: number) => void;
  colorSupported?: boolean;
  platform?: string;
};

const fetchOptionsSchema = z.object({
  color: z.boolean().default(true),
  compact: z.boolean().default(false),
  banner: z.boolean().default(true),
  bannerFile: z.string().min(1).optional(),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type FetchOptions = z.infer<typeof fetchOptionsSchema>;

function detectColor(): boolean {
  return Boolean(process.stdout.isTTY) && chalk.supportsColor !== false;
}

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

/** Collects, renders and prints once. Resolves to the process exit code. */
export async function runFetch(options: FetchOptions, deps: FetchDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(text));
  if (options.verbose) setLogLevel('debug');

  const spinner = ora({
    text: 'Collecting system facts...',
    stream: process.stderr,
    isSilent: !process.stderr.isTTY,
    discardStdin: false,
  }).start();

  let output: string;
  try {
    const snapshot = await collect(deps.source);
    spinner.stop();
    if (options.json) {
      output = toJson(snapshot);
    } else {
      const banner = resolveBanner({
        banner: options.banner,
        bannerFile: options.bannerFile,
        hostname: factValue(snapshot.hostname),
        platform: deps.platform,
      });
      const colorEnabled = options.color && (deps.colorSupported ?? detectColor());
      output = render(snapshot, banner, { colorEnabled, compact: options.compact });
    }
  } catch (err) {
    spinner.stop();
    logger.debug({ err }, 'fetch failed');
    writeError(`hostglance: ${messageOf(err)}\n`);
    return 1;
  }

  try {
    write(output);
  } catch (err) {
    writeError(`hostglance: cannot write output: ${messageOf(err)}\n`);
    return 1;
  }
  return 0;
}

export function registerFetch(program: Command, deps: FetchDeps = {}) {
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  program
    .option('--no-color', 'Disable ANSI colors')
    .option('--compact', 'Compact layout with fewer lines', false)
    .option('--no-banner', 'Omit the banner column')
    .option('--banner-file <path>', 'Use a custom ASCII banner from a file')
    .option('--json', 'Print the collected facts as JSON', false)
    .option('--verbose', 'Log collection details to stderr', false)
    .action(async (raw: Record<string, unknown>) => {
      const parsed = fetchOptionsSchema.safeParse(raw);
      if (!parsed.success) {
        const writeError = deps.writeError ?? ((text: string) => process.stderr.write(text));
        writeError(`hostglance: invalid options: ${parsed.error.issues.map((i) => i.message).join('; ')}\n`);
        setExitCode(1);
        return;
      }
      setExitCode(await runFetch(parsed.data, deps));
    });
}
