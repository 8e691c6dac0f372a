import { readFile, writeFile, rename, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { Mutex } from 'async-mutex';
import ini from 'ini';
import { ResourceError, ValidationError, describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { joinScreenScaleFactors, type ScreenFactors } from '../scaling/screen_factors.js';

const logger = createLogger('QtTheme');

// serialises the read-modify-write of theme files within this process
const themeLock = new Mutex();

export const QT_THEME_SECTION = 'Theme';
export const QtThemeKeys = {
  screenScaleFactors: 'ScreenScaleFactors',
  scaleFactor: 'ScaleFactor',
  scaleLogicalDpi: 'ScaleLogicalDpi',
} as const;

type IniSection = Record<string, unknown>;
type IniDocument = Record<string, unknown>;

function isSection(value: unknown): value is IniSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function loadThemeFile(file: string): Promise<IniDocument> {
  try {
    return ini.decode(await readFile(file, 'utf-8'));
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return {};
    }
    logger.warn(`Failed to load ${file}: ${describeError(e)}`);
    return {};
  }
}

function screenScaleFactorsValue(factors: ScreenFactors): string {
  const values = Object.values(factors);
  if (values.length === 1) {
    return values[0].toFixed(2);
  }
  // ini quotes values that contain '='
  return joinScreenScaleFactors(factors);
}

async function saveThemeFile(file: string, doc: IniDocument): Promise<void> {
  try {
    await mkdir(dirname(file), { recursive: true });
    const tempFile = `${file}.tmp`;
    await writeFile(tempFile, ini.encode(doc));
    await rename(tempFile, file);
  } catch (e) {
    throw new ResourceError('theme', `Failed to write ${file}`, { cause: e });
  }
}

/**
 * Rewrites the toolkit theme file for the given per-screen factors and, when
 * `greeterFile` is given, writes the login greeter's copy with a fixed 96 DPI.
 */
export async function writeQtTheme(
  file: string,
  factors: ScreenFactors,
  greeterFile?: string
): Promise<void> {
  if (Object.keys(factors).length === 0) {
    throw new ValidationError('factors is empty');
  }

  await themeLock.runExclusive(() => updateThemeFiles(file, factors, greeterFile));
}

async function updateThemeFiles(file: string, factors: ScreenFactors, greeterFile?: string): Promise<void> {
  const doc = await loadThemeFile(file);
  const existing = doc[QT_THEME_SECTION];
  const section: IniSection = isSection(existing) ? { ...existing } : {};

  section[QtThemeKeys.screenScaleFactors] = screenScaleFactorsValue(factors);
  delete section[QtThemeKeys.scaleFactor];
  section[QtThemeKeys.scaleLogicalDpi] = '-1,-1';
  doc[QT_THEME_SECTION] = section;

  await saveThemeFile(file, doc);

  if (greeterFile) {
    const greeterDoc: IniDocument = {
      ...doc,
      [QT_THEME_SECTION]: { ...section, [QtThemeKeys.scaleLogicalDpi]: '96,96' },
    };
    await saveThemeFile(greeterFile, greeterDoc);
  }
}

export async function readQtTheme(file: string): Promise<IniSection> {
  const doc = await loadThemeFile(file);
  const section = doc[QT_THEME_SECTION];
  return isSection(section) ? section : {};
}
