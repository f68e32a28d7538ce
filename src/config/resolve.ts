// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Precedence for overridable values: CLI flag > environment > settings file.
 * The settings value already carries its default.
 */

import { Option, pipe } from "effect";
import type { EnvConfig } from "./env";
import type { LogFormat, LogLevel, ReplayMode } from "./field-values";
import type { Settings } from "./schema";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly file: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.file)
  );

export interface LoggingFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** `--verbose`, `--debug` and MARIADB_PITR_DEBUG force debug. */
export const resolveLogLevel = (flags: LoggingFlags, env: EnvConfig, settings: Settings): LogLevel =>
  flags.verbose || flags.debug || env.debug
    ? "debug"
    : resolve({ cli: flags.logLevel, env: env.logLevel, file: settings.logging.level });

/** `--json` wins over `--format`. */
export const resolveLogFormat = (flags: LoggingFlags, env: EnvConfig, settings: Settings): LogFormat =>
  resolve<LogFormat>({
    cli: flags.json ? Option.some("json" as const) : flags.format,
    env: env.logFormat,
    file: settings.logging.format,
  });

export const resolveReplayMode = (
  cli: Option.Option<ReplayMode>,
  env: EnvConfig,
  settings: Settings
): ReplayMode => resolve({ cli, env: env.replayMode, file: settings.restore.replayMode });
