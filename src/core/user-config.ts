/**
 * User configuration loader for ~/.config/everyfind/config.toml.
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { Either, Schema } from 'effect';

export interface SearchSettings {
  regex: boolean;
  migemo: boolean;
  shellContextMenu: boolean;
  pageSize: number;
  debounceMs: number;
  retriggerDelayMs: number;
}

export interface ProviderSettings {
  everythingUrl: string;
}

export interface DisplaySettings {
  nameWidth: number;
  pathWidth: number;
  ellipsis: string;
}

export interface UserConfig {
  search: SearchSettings;
  provider: ProviderSettings;
  display: DisplaySettings;
}

export const DEFAULT_USER_CONFIG: UserConfig = {
  search: {
    regex: false,
    migemo: true,
    shellContextMenu: false,
    pageSize: 100,
    debounceMs: 500,
    retriggerDelayMs: 100,
  },
  provider: {
    everythingUrl: 'http://127.0.0.1',
  },
  display: {
    nameWidth: 40,
    pathWidth: 50,
    ellipsis: '...',
  },
};

const PositiveInt = Schema.Int.pipe(Schema.positive());
const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative());

const UserConfigFile = Schema.Struct({
  search: Schema.optional(
    Schema.Struct({
      regex: Schema.optional(Schema.Boolean),
      migemo: Schema.optional(Schema.Boolean),
      shellContextMenu: Schema.optional(Schema.Boolean),
      pageSize: Schema.optional(PositiveInt),
      debounceMs: Schema.optional(NonNegativeInt),
      retriggerDelayMs: Schema.optional(NonNegativeInt),
    })
  ),
  provider: Schema.optional(
    Schema.Struct({
      everythingUrl: Schema.optional(Schema.String),
    })
  ),
  display: Schema.optional(
    Schema.Struct({
      nameWidth: Schema.optional(PositiveInt),
      pathWidth: Schema.optional(PositiveInt),
      ellipsis: Schema.optional(Schema.String),
    })
  ),
});

type UserConfigFile = typeof UserConfigFile.Type;

const CONFIG_FILE_NAME = 'config.toml';

export function getConfigDir(): string {
  const home = process.env.HOME ?? process.env.USERPROFILE;
  const base = process.env.XDG_CONFIG_HOME ?? (home ? path.join(home, '.config') : path.join(process.cwd(), '.config'));
  return path.join(base, 'everyfind');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export function mergeUserConfig(base: UserConfig, overrides?: UserConfigFile): UserConfig {
  if (!overrides) return base;

  return {
    search: {
      regex: overrides.search?.regex ?? base.search.regex,
      migemo: overrides.search?.migemo ?? base.search.migemo,
      shellContextMenu: overrides.search?.shellContextMenu ?? base.search.shellContextMenu,
      pageSize: overrides.search?.pageSize ?? base.search.pageSize,
      debounceMs: overrides.search?.debounceMs ?? base.search.debounceMs,
      retriggerDelayMs: overrides.search?.retriggerDelayMs ?? base.search.retriggerDelayMs,
    },
    provider: {
      everythingUrl: overrides.provider?.everythingUrl ?? base.provider.everythingUrl,
    },
    display: {
      nameWidth: overrides.display?.nameWidth ?? base.display.nameWidth,
      pathWidth: overrides.display?.pathWidth ?? base.display.pathWidth,
      ellipsis: overrides.display?.ellipsis ?? base.display.ellipsis,
    },
  };
}

export function parseUserConfig(source: string): UserConfig {
  const raw = TOML.parse(source);
  const decoded = Schema.decodeUnknownEither(UserConfigFile)(raw);
  if (Either.isLeft(decoded)) {
    throw new Error(`Invalid config: ${decoded.left.message}`);
  }
  return mergeUserConfig(DEFAULT_USER_CONFIG, decoded.right);
}

export function loadUserConfigSync(options?: { configPath?: string }): UserConfig {
  const configPath = options?.configPath ?? getConfigPath();

  if (!fs.existsSync(configPath)) {
    return DEFAULT_USER_CONFIG;
  }

  try {
    return parseUserConfig(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    console.warn('[everyfind] Failed to parse config, using defaults:', error);
    return DEFAULT_USER_CONFIG;
  }
}
