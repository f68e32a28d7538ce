// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared helpers for command handlers: argument validation, key file
 * resolution and human-readable sizes and durations.
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import type { Settings } from "../../config/schema";
import { type ConfigError, ErrorCode, GeneralError } from "../../lib/errors";
import { toAbsolutePathEffect } from "../../lib/paths";
import { type AbsolutePath, type DatabaseName, decodeDatabaseName } from "../../lib/types";

export const invalidArgs = (message: string): GeneralError =>
  new GeneralError({ code: ErrorCode.INVALID_ARGS, message });

/** `--key` wins over `[paths] keyFile`. */
export const resolveKeyFile = (
  cli: Option.Option<string>,
  settings: Settings
): Effect.Effect<AbsolutePath, ConfigError> =>
  toAbsolutePathEffect(Option.getOrElse(cli, () => settings.paths.keyFile));

export const resolveOptionalPath = (
  cli: Option.Option<string>
): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
  Option.match(cli, {
    onNone: (): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
      Effect.succeed(Option.none()),
    onSome: (p): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
      Effect.map(toAbsolutePathEffect(p), Option.some),
  });

export const parseDatabaseArg = (name: string): Effect.Effect<DatabaseName, GeneralError> =>
  Effect.mapError(decodeDatabaseName(name), () =>
    invalidArgs(`Invalid database name: '${name}'`)
  );

export const parseOptionalDatabase = (
  name: Option.Option<string>
): Effect.Effect<Option.Option<DatabaseName>, GeneralError> =>
  Option.match(name, {
    onNone: (): Effect.Effect<Option.Option<DatabaseName>, GeneralError> =>
      Effect.succeed(Option.none()),
    onSome: (n): Effect.Effect<Option.Option<DatabaseName>, GeneralError> =>
      Effect.map(parseDatabaseArg(n), Option.some),
  });

/** Exactly one of two flags; `what` names the pair in the error. */
export const exactlyOne = <A>(
  first: Option.Option<A>,
  second: Option.Option<A>,
  what: string
): Effect.Effect<A, GeneralError> => {
  if (Option.isSome(first) && Option.isNone(second)) {
    return Effect.succeed(first.value);
  }
  if (Option.isNone(first) && Option.isSome(second)) {
    return Effect.succeed(second.value);
  }
  return Effect.fail(invalidArgs(`Specify exactly one of ${what}`));
};

// ============================================================================
// Formatting
// ============================================================================

interface ThresholdEntry {
  readonly threshold: number;
  readonly format: (value: number) => string;
}

/** Duration thresholds (descending order) */
const DURATION_THRESHOLDS: readonly ThresholdEntry[] = [
  {
    threshold: 60000,
    format: (ms): string => {
      const minutes = Math.floor(ms / 60000);
      const seconds = Math.floor((ms % 60000) / 1000);
      return `${minutes}m ${seconds}s`;
    },
  },
  { threshold: 1000, format: (ms): string => `${(ms / 1000).toFixed(1)}s` },
];

export const formatDuration = (ms: number): string =>
  pipe(
    DURATION_THRESHOLDS,
    Arr.findFirst((t) => ms >= t.threshold),
    Option.match({
      onNone: (): string => `${ms}ms`,
      onSome: (t): string => t.format(ms),
    })
  );

const BYTE_THRESHOLDS: readonly ThresholdEntry[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

export const formatBytes = (bytes: number): string =>
  pipe(
    BYTE_THRESHOLDS,
    Arr.findFirst((t) => bytes >= t.threshold),
    Option.match({
      onNone: (): string => `${bytes} B`,
      onSome: (t): string => t.format(bytes),
    })
  );

/** Left-aligned columns, two spaces apart. */
export const formatTable = (rows: readonly (readonly string[])[]): readonly string[] => {
  const widths = rows.reduce<number[]>(
    (acc, row) => row.map((cell, i) => Math.max(acc[i] ?? 0, cell.length)),
    []
  );
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join("  ")
  );
};
