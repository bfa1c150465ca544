import figlet from 'figlet';
import fs from 'fs';
import { logger } from '../telemetry';
import { LOGOS } from './logos';

export class BannerError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = 'BannerError';
  }
}

export const BANNER_FONT = 'Slant';

export function platformLogo(platform: string = process.platform): string {
  const logo = LOGOS[platform] ?? LOGOS.generic ?? [];
  return logo.join('\n');
}

export type DefaultBannerOptions = {
  hostname?: string;
  platform?: string;
};

/** The hostname drawn in figlet; the platform logo when there is no hostname to draw. */
export function defaultBanner(options: DefaultBannerOptions = {}): string {
  const hostname = options.hostname?.trim();
  if (!hostname) return platformLogo(options.platform);
  try {
    return figlet.textSync(hostname, { font: BANNER_FONT });
  } catch (err) {
    logger.debug({ err }, 'figlet could not draw the hostname');
    return platformLogo(options.platform);
  }
}

export function loadBannerFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new BannerError(`cannot read banner ${filePath}: ${reason}`, filePath);
  }
}

export type BannerChoice = {
  banner: boolean;
  bannerFile?: string;
  hostname?: string;
  platform?: string;
};

/** Resolves the banner text the CLI flags ask for; '' means no banner column. */
export function resolveBanner(choice: BannerChoice): string {
  if (!choice.banner) return '';
  if (choice.bannerFile) return loadBannerFile(choice.bannerFile);
  return defaultBanner({ hostname: choice.hostname, platform: choice.platform });
}
