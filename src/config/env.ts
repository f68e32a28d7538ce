// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for the MARIADB_PITR_ environment namespace.
 *
 * All exports are pure Config<A> values; nothing is read until a Config
 * is yielded at the CLI boundary.
 */

import { Config, ConfigProvider, type Option } from "effect";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  REPLAY_MODE_VALUES,
  type ReplayMode,
} from "./field-values";

export const ENV_PREFIX = "MARIADB_PITR";

const namespaced = <A>(config: Config.Config<A>): Config.Config<A> =>
  Config.nested(config, ENV_PREFIX);

/** HOME, for the `~/.config` settings path. */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** Unset is None so the settings file can still supply a value. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = namespaced(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL"))
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = namespaced(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT"))
);

export const ReplayModeOptionConfig: Config.Config<Option.Option<ReplayMode>> = namespaced(
  Config.option(Config.literal(...REPLAY_MODE_VALUES)("REPLAY_MODE"))
);

/** Settings file path. */
export const ConfigPathOptionConfig: Config.Config<Option.Option<string>> = namespaced(
  Config.option(Config.string("CONFIG"))
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = namespaced(
  Config.boolean("DEBUG").pipe(Config.withDefault(false))
);

export interface EnvConfig {
  readonly home: string;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly replayMode: Option.Option<ReplayMode>;
  readonly configPath: Option.Option<string>;
  readonly debug: boolean;
}

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all({
  home: HomeConfig,
  logLevel: LogLevelOptionConfig,
  logFormat: LogFormatOptionConfig,
  replayMode: ReplayModeOptionConfig,
  configPath: ConfigPathOptionConfig,
  debug: DebugModeConfig,
});

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  home: "HOME",
  logLevel: `${ENV_PREFIX}_LOG_LEVEL`,
  logFormat: `${ENV_PREFIX}_LOG_FORMAT`,
  replayMode: `${ENV_PREFIX}_REPLAY_MODE`,
  configPath: `${ENV_PREFIX}_CONFIG`,
  debug: `${ENV_PREFIX}_DEBUG`,
} as const;

export type TestConfigOverrides = Partial<Record<keyof typeof envVarNames, string>>;

/**
 * Deterministic provider for tests. Only HOME is set unless overridden.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = await Effect.runPromise(
 *   Effect.withConfigProvider(EnvConfigSpec, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries = new Map<string, string>([[envVarNames.home, "/home/testuser"]]);
  const keys: readonly (keyof typeof envVarNames)[] = [
    "home",
    "logLevel",
    "logFormat",
    "replayMode",
    "configPath",
    "debug",
  ];
  for (const key of keys) {
    const value = overrides[key];
    if (value !== undefined) {
      entries.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(entries, { pathDelim: "_" });
};
