import { readFile, writeFile, rename, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { Mutex } from 'async-mutex';
import { ResourceError } from '../errors.js';

export const SettingsKeys = {
  scaleFactor: 'scale-factor',
  windowScale: 'window-scale',
  gtkCursorThemeSize: 'gtk-cursor-theme-size',
  cursorSize: 'cursor-size',
  individualScaling: 'individual-scaling',
} as const;

export type SettingsKey = (typeof SettingsKeys)[keyof typeof SettingsKeys];

type SettingsValue = number | string;
type SettingsData = Record<string, SettingsValue>;

export interface SettingsStore {
  getDouble(key: SettingsKey): Promise<number | undefined>;
  setDouble(key: SettingsKey, value: number): Promise<void>;
  getInt(key: SettingsKey): Promise<number | undefined>;
  setInt(key: SettingsKey, value: number): Promise<void>;
  getString(key: SettingsKey): Promise<string | undefined>;
  setString(key: SettingsKey, value: string): Promise<void>;
}

abstract class BaseSettingsStore implements SettingsStore {
  protected abstract read(key: SettingsKey): Promise<SettingsValue | undefined>;
  protected abstract write(key: SettingsKey, value: SettingsValue): Promise<void>;

  async getDouble(key: SettingsKey): Promise<number | undefined> {
    const value = await this.read(key);
    return typeof value === 'number' ? value : undefined;
  }

  setDouble(key: SettingsKey, value: number): Promise<void> {
    return this.write(key, value);
  }

  async getInt(key: SettingsKey): Promise<number | undefined> {
    const value = await this.read(key);
    return typeof value === 'number' ? Math.trunc(value) : undefined;
  }

  setInt(key: SettingsKey, value: number): Promise<void> {
    return this.write(key, Math.trunc(value));
  }

  async getString(key: SettingsKey): Promise<string | undefined> {
    const value = await this.read(key);
    return typeof value === 'string' ? value : undefined;
  }

  setString(key: SettingsKey, value: string): Promise<void> {
    return this.write(key, value);
  }
}

export class MemorySettingsStore extends BaseSettingsStore {
  private data: Map<string, SettingsValue>;

  constructor(initial: SettingsData = {}) {
    super();
    this.data = new Map(Object.entries(initial));
  }

  protected async read(key: SettingsKey): Promise<SettingsValue | undefined> {
    return this.data.get(key);
  }

  protected async write(key: SettingsKey, value: SettingsValue): Promise<void> {
    this.data.set(key, value);
  }

  toJSON(): SettingsData {
    return Object.fromEntries(this.data);
  }
}

/**
 * Settings persisted as one JSON object. Writes go through a mutex and are
 * atomic (temp file, then rename).
 */
export class JsonSettingsStore extends BaseSettingsStore {
  private readonly tempFile: string;
  private readonly mutex = new Mutex();

  constructor(readonly file: string) {
    super();
    this.tempFile = `${file}.tmp`;
  }

  async load(): Promise<SettingsData> {
    if (!existsSync(this.file)) {
      return {};
    }
    let content: string;
    try {
      content = await readFile(this.file, 'utf-8');
    } catch (e) {
      throw new ResourceError('settings', `Failed to read ${this.file}`, { cause: e });
    }
    return parseSettings(content, this.file);
  }

  protected async read(key: SettingsKey): Promise<SettingsValue | undefined> {
    const data = await this.load();
    return data[key];
  }

  protected write(key: SettingsKey, value: SettingsValue): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const data = await this.load();
      data[key] = value;
      try {
        await mkdir(dirname(this.file), { recursive: true });
        await writeFile(this.tempFile, JSON.stringify(data, null, 2));
        await rename(this.tempFile, this.file);
      } catch (e) {
        throw new ResourceError('settings', `Failed to save ${this.file}`, { cause: e });
      }
    });
  }
}

function parseSettings(content: string, file: string): SettingsData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new ResourceError('settings', `Corrupt settings file ${file}`, { cause: e });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ResourceError('settings', `Settings file ${file} does not hold an object`);
  }

  const data: SettingsData = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'number' || typeof value === 'string') {
      data[key] = value;
    }
  }
  return data;
}
