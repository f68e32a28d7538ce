// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML settings loading with fail-fast validation. Files are parsed and
 * validated in a single pass; syntax errors and schema violations are
 * reported with the file path. Default locations are searched in order,
 * but an explicit path fails on any error to catch typos.
 */

import { Effect, Option, type Schema, pipe } from "effect";
import { parse } from "smol-toml";
import { ConfigError, ErrorCode, type SystemError, causeProps, errorMessage } from "../lib/errors";
import { toAbsolutePathEffect } from "../lib/paths";
import { decodeToEffect } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { fileExists, readFile } from "../system/fs";
import { DEFAULT_SETTINGS, type Settings, settingsSchema } from "./schema";

export const loadTomlFile = <A, I = A>(
  filePath: AbsolutePath,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError> =>
  Effect.gen(function* () {
    yield* pipe(
      fileExists(filePath),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* readFile(filePath);

    const parsed = yield* Effect.try({
      try: (): unknown => parse(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeProps(e),
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

/** Lookup order when no path is given. The first existing file wins. */
export const defaultSettingsPaths = (home: string): readonly string[] => [
  "./mariadb-pitr.toml",
  `${home}/.config/mariadb-pitr/config.toml`,
  "/etc/mariadb-pitr/config.toml",
];

const tryLoadPath = (p: string): Effect.Effect<Settings, ConfigError | SystemError> =>
  pipe(
    toAbsolutePathEffect(p),
    Effect.flatMap((absPath) => loadTomlFile(absPath, settingsSchema))
  );

/**
 * An explicit path must exist and be valid. Otherwise the first default
 * location that exists is loaded, and a broken file there is still an
 * error; with no file anywhere, defaults apply.
 */
export const loadSettingsWithHome = (
  configPath: Option.Option<string>,
  home: string
): Effect.Effect<Settings, ConfigError | SystemError> =>
  Option.match(configPath, {
    onSome: tryLoadPath,
    onNone: (): Effect.Effect<Settings, ConfigError | SystemError> =>
      Effect.gen(function* () {
        for (const candidate of defaultSettingsPaths(home)) {
          const absPath = yield* toAbsolutePathEffect(candidate);
          if (yield* fileExists(absPath)) {
            yield* Effect.logDebug(`Loading settings from ${absPath}`);
            return yield* loadTomlFile(absPath, settingsSchema);
          }
        }
        return DEFAULT_SETTINGS;
      }),
  });
