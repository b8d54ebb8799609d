import { homedir, platform } from 'os';
import { join, dirname } from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { z } from 'zod';
import { DEPTHS, DEFAULT_RENAME_SUFFIX } from './core/planner.js';
import { HASH_ALGORITHMS, DEFAULT_HASH_ALGORITHM } from './utils/file-hash.js';
import { CONFLICT_POLICIES } from './actions/copy.js';
import { ConfigError } from './utils/errors.js';
import { expandTilde } from './utils/paths.js';

function getPackageVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(pkg);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const VERSION = getPackageVersion();

export const DEFAULT_MEDIA_EXTENSIONS = [
  '.jpg',
  '.jpeg',
  '.gif',
  '.png',
  '.webp',
  '.raw',
  '.mp4',
  '.mkv',
];

const ConfigSchema = z.object({
  version: z.number().default(1),
  settings: z.object({
    depth: z.enum(DEPTHS).default('month'),
    renameSuffix: z.string().min(1).default(DEFAULT_RENAME_SUFFIX),
    hashAlgorithm: z.enum(HASH_ALGORITHMS).default(DEFAULT_HASH_ALGORITHM),
    concurrency: z.number().int().min(1).max(64).default(4),
    includeHidden: z.boolean().default(true),
    onConflict: z.enum(CONFLICT_POLICIES).default('fail'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
  mediaExtensions: z.array(z.string().min(1)).min(1).default(DEFAULT_MEDIA_EXTENSIONS),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Settings = Config['settings'];

export interface AppPaths {
  configDir: string;
  configFile: string;
}

export function getAppPaths(): AppPaths {
  const configDir = platform() === 'win32'
    ? join(process.env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'mediasort')
    : join(process.env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'mediasort');

  return {
    configDir,
    configFile: join(configDir, 'config.yaml'),
  };
}

/**
 * Reads the YAML config. A missing file means defaults; a file that cannot
 * be parsed or fails validation is an error.
 */
export function loadConfig(configFile = getAppPaths().configFile): Config {
  if (!existsSync(configFile)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(configFile, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configFile, error instanceof Error ? error.message : String(error), error);
  }

  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(configFile, detail, result.error);
  }

  return result.data;
}

export function saveConfig(config: Config, configFile = getAppPaths().configFile): void {
  mkdirSync(dirname(configFile), { recursive: true });
  writeFileSync(configFile, YAML.stringify(config), 'utf-8');
}

export function expandPath(inputPath: string): string {
  let result = expandTilde(inputPath);

  if (platform() === 'win32') {
    result = result.replace(/%([^%]+)%/g, (match, varName: string) => {
      return process.env[varName] || match;
    });
  }

  return result;
}

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
