/**
 * Boot splash collaborators: the rethemer that re-renders the splash theme at
 * a new integer scale, and the probe that reports which scale is applied now.
 */
import { execFile } from 'child_process';
import { readFile } from 'fs/promises';
import { promisify } from 'util';
import ini from 'ini';
import { ExternalOperationError, describeError } from '../errors.js';
import { createLogger } from '../logger.js';

const execFileAsync = promisify(execFile);
const logger = createLogger('Splash');

/** Re-themes the boot splash. Slow, not cancellable; rejects on failure. */
export interface Rethemer {
  apply(factor: number): Promise<void>;
}

/** Reports the factor the splash is rendered at, if it can tell. */
export interface AppliedFactorProbe {
  currentFactor(): Promise<number | undefined>;
}

export type SplashThemes = Record<number, string>;

export async function readSplashTheme(configFile: string): Promise<string> {
  const doc = ini.decode(await readFile(configFile, 'utf-8'));
  const daemon = doc['Daemon'];
  const theme = typeof daemon === 'object' && daemon !== null ? daemon['Theme'] : undefined;
  if (typeof theme !== 'string' || theme === '') {
    throw new Error(`No [Daemon] Theme in ${configFile}`);
  }
  return theme;
}

/** Factor a theme renders at, 0 when the theme is not one of ours. */
export function themeScaleFactor(theme: string, themes: SplashThemes): number {
  for (const [factor, name] of Object.entries(themes)) {
    if (name === theme) return Number(factor);
  }
  return 0;
}

export class SplashProbe implements AppliedFactorProbe {
  constructor(
    private readonly configFile: string,
    private readonly themes: SplashThemes
  ) {}

  async currentFactor(): Promise<number | undefined> {
    try {
      const theme = await readSplashTheme(this.configFile);
      return themeScaleFactor(theme, this.themes);
    } catch (e) {
      logger.warn(`Cannot read splash theme: ${describeError(e)}`);
      return undefined;
    }
  }
}

/**
 * Runs an external command to switch the splash theme. `{theme}` and
 * `{factor}` in the arguments are substituted.
 */
export class CommandRethemer implements Rethemer {
  constructor(
    private readonly command: string[],
    private readonly themes: SplashThemes
  ) {}

  async apply(factor: number): Promise<void> {
    const theme = this.themes[factor];
    if (theme === undefined) {
      throw new ExternalOperationError(`No splash theme for factor ${factor}`, factor);
    }

    const [cmd, ...args] = this.command.map((part) =>
      part.replace(/\{theme\}/g, theme).replace(/\{factor\}/g, String(factor))
    );
    logger.debug(`Running ${cmd} ${args.join(' ')}`);
    try {
      await execFileAsync(cmd, args);
    } catch (e) {
      throw new ExternalOperationError(`Splash retheme to ${theme} failed`, factor, { cause: e });
    }
  }
}

/** Stand-in used by `--dry-run`: logs instead of touching the splash. */
export class LoggingRethemer implements Rethemer, AppliedFactorProbe {
  private applied: number | undefined;

  async apply(factor: number): Promise<void> {
    logger.info(`(dry run) would retheme splash at factor ${factor}`);
    this.applied = factor;
  }

  async currentFactor(): Promise<number | undefined> {
    return this.applied;
  }
}
