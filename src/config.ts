import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { z } from "zod";
import { describeError } from "./errors.js";

const SplashConfigSchema = z.object({
  configFile: z.string().optional(),
  // integer factor -> theme applied for it
  themes: z.record(z.string().regex(/^\d+$/), z.string().min(1)).optional(),
  command: z.array(z.string()).min(1).optional(),
});

export const ConfigFileSchema = z
  .object({
    minFactor: z.number().int().positive().optional(),
    maxFactor: z.number().int().positive().optional(),
    baseCursorSize: z.number().int().positive().optional(),
    settingsFile: z.string().optional(),
    qtThemeFile: z.string().optional(),
    greeterThemeFile: z.string().optional(),
    userEnvFile: z.string().optional(),
    cleanEnvKeys: z.array(z.string()).optional(),
    metricsDir: z.string().optional(),
    splash: SplashConfigSchema.optional(),
  })
  .refine((c) => (c.minFactor ?? 1) <= (c.maxFactor ?? 2), {
    message: "minFactor must not exceed maxFactor",
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface SplashConfig {
  configFile: string;
  themes: Record<number, string>;
  command: string[];
}

export interface Config {
  minFactor: number;
  maxFactor: number;
  baseCursorSize: number;
  settingsFile: string;
  qtThemeFile: string;
  greeterThemeFile?: string;
  userEnvFile: string;
  cleanEnvKeys: string[];
  metricsDir?: string;
  splash: SplashConfig;
}

export const DEFAULT_CLEAN_ENV_KEYS = [
  "QT_SCALE_FACTOR",
  "QT_SCREEN_SCALE_FACTORS",
  "QT_AUTO_SCREEN_SCALE_FACTOR",
  "QT_FONT_DPI",
];

function userConfigDir(): string {
  return process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
}

export function resolveConfig(file: ConfigFile, cwd: string = process.cwd()): Config {
  const themes: Record<number, string> = { 1: "spinner", 2: "spinner-hidpi" };
  if (file.splash?.themes) {
    for (const [factor, theme] of Object.entries(file.splash.themes)) {
      themes[Number(factor)] = theme;
    }
  }

  const inCwd = (p: string | undefined) => (p === undefined ? undefined : resolve(cwd, p));

  return {
    minFactor: file.minFactor ?? 1,
    maxFactor: file.maxFactor ?? 2,
    baseCursorSize: file.baseCursorSize ?? 24,
    settingsFile: inCwd(file.settingsFile) ?? join(cwd, ".display-scale", "settings.json"),
    qtThemeFile: inCwd(file.qtThemeFile) ?? join(userConfigDir(), "display-scale", "qt-theme.ini"),
    greeterThemeFile: inCwd(file.greeterThemeFile),
    userEnvFile: inCwd(file.userEnvFile) ?? join(homedir(), ".session_env"),
    cleanEnvKeys: file.cleanEnvKeys ?? DEFAULT_CLEAN_ENV_KEYS,
    metricsDir: inCwd(file.metricsDir),
    splash: {
      configFile: file.splash?.configFile ?? "/etc/plymouth/plymouthd.conf",
      themes,
      command: file.splash?.command ?? ["plymouth-set-default-theme", "-R", "{theme}"],
    },
  };
}

export async function loadConfig(cwd: string = process.cwd()): Promise<Config> {
  const explicit = process.env.DISPLAY_SCALE_CONFIG;
  const locations = explicit
    ? [resolve(cwd, explicit)]
    : [join(cwd, "display-scale.json"), join(cwd, ".display-scale", "config.json")];

  let file: ConfigFile = {};

  for (const loc of locations) {
    if (existsSync(loc)) {
      try {
        const content = await readFile(loc, "utf-8");
        const parsed = ConfigFileSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
          console.error(`Invalid config at ${loc}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
          continue;
        }
        file = parsed.data;
        break;
      } catch (e) {
        console.error(`Failed to parse config at ${loc}: ${describeError(e)}`);
      }
    }
  }

  return resolveConfig(file, cwd);
}
