#!/usr/bin/env node
/**
 * display-scale - set display scale factors for the desktop session and
 * re-theme the boot splash to match.
 */
import 'dotenv/config';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import pc from 'picocolors';
import { loadConfig } from './config.js';
import { createScaleContext, type ScaleContext } from './context.js';
import { ValidationError, describeError } from './errors.js';
import { setDebug } from './logger.js';
import { EventNotifier } from './scaling/notifier.js';
import { parseScreenFactors, singleToMap, type ScreenFactors } from './scaling/screen_factors.js';
import { SettingsWatcher } from './settings/watcher.js';

const VERSION = '0.1.0';

export interface CliOptions {
  command: string | undefined;
  args: string[];
  notify: boolean;
  dryRun: boolean;
  debug: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const positional = argv.filter((a) => !a.startsWith('-'));
  return {
    command: positional[0],
    args: positional.slice(1),
    notify: !argv.includes('--no-notify'),
    dryRun: argv.includes('--dry-run'),
    debug: argv.includes('--debug') || process.env.DEBUG === 'true',
  };
}

export function parseFactorArg(value: string | undefined): number {
  const factor = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(factor)) {
    throw new ValidationError(`Expected a scale factor, got ${value ?? 'nothing'}`);
  }
  return factor;
}

function printHelp(): void {
  console.log(`
  ${pc.bgCyan(pc.black(' DISPLAY-SCALE '))} ${pc.dim(`v${VERSION}`)}

  ${pc.bold('Usage:')}
    display-scale <command> [options]

  ${pc.bold('Commands:')}
    get                       Show the current scale settings
    set <factor>              Set one factor for every screen
    set-screens "<a=f;b=f>"   Set per-screen factors
    watch                     Reapply factors edited into the settings file

  ${pc.bold('Options:')}
    --no-notify        Do not emit started/done signals
    --dry-run          Keep settings in memory and only log the splash retheme
    --debug            Verbose logging
    --version, -v      Show version
    --help, -h         Show help
`);
}

function printSignals(ctx: ScaleContext): void {
  if (!(ctx.notifier instanceof EventNotifier)) return;
  ctx.notifier.on('SetScaleFactorStarted', () => console.log(pc.cyan('● scaling started')));
  ctx.notifier.on('SetScaleFactorDone', () => console.log(pc.green('✔ scaling done')));
}

async function showSettings(ctx: ScaleContext): Promise<void> {
  const scale = await ctx.manager.getScaleFactor();
  const windowScale = await ctx.manager.getWindowScale();
  const screens = await ctx.manager.getScreenScaleFactors();

  console.log(`${pc.bold('scale factor')}  ${scale}`);
  console.log(`${pc.bold('window scale')}  ${windowScale}`);
  for (const [name, value] of Object.entries(screens)) {
    console.log(`${pc.bold('screen')}        ${name} = ${value}`);
  }
}

async function applyFactors(ctx: ScaleContext, factors: ScreenFactors, notify: boolean): Promise<void> {
  try {
    await ctx.manager.setScreenScaleFactors(factors, notify);
  } finally {
    // the splash retheme may already be queued when a later step throws
    await ctx.queue.onIdle();
  }
}

async function watch(ctx: ScaleContext): Promise<void> {
  const watcher = new SettingsWatcher({
    file: ctx.config.settingsFile,
    store: ctx.store,
    manager: ctx.manager,
  });
  await watcher.start();
  console.log(pc.dim(`Watching ${ctx.config.settingsFile} (Ctrl+C to stop)`));

  await new Promise<void>((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });

  await watcher.stop();
  await ctx.queue.onIdle();
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  if (argv.includes('--version') || argv.includes('-v')) {
    console.log(`display-scale v${VERSION}`);
    return 0;
  }
  const options = parseArgs(argv);
  if (argv.includes('--help') || argv.includes('-h') || !options.command) {
    printHelp();
    return 0;
  }

  setDebug(options.debug);
  const config = await loadConfig();
  const ctx = createScaleContext(config, { dryRun: options.dryRun });
  printSignals(ctx);

  try {
    switch (options.command) {
      case 'get':
        await showSettings(ctx);
        return 0;
      case 'set':
        await applyFactors(ctx, singleToMap(parseFactorArg(options.args[0])), options.notify);
        return 0;
      case 'set-screens':
        await applyFactors(ctx, parseScreenFactors(options.args[0] ?? ''), options.notify);
        return 0;
      case 'watch':
        await watch(ctx);
        return 0;
      default:
        console.error(pc.red(`Unknown command: ${options.command}`));
        printHelp();
        return 1;
    }
  } catch (e) {
    const label = e instanceof ValidationError ? 'Invalid input' : 'Error';
    console.error(pc.red(`${label}: ${describeError(e)}`));
    return 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main().then(
    (code) => process.exit(code),
    (e) => {
      console.error(pc.red(describeError(e)));
      process.exit(1);
    }
  );
}
