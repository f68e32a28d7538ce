// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `restore`. Argument handling and the interactive picker live here; the
 * pitr module only ever sees a resolved target.
 */

import { Prompt } from "@effect/cli";
import { Array as Arr, Effect, Match, Option, Order, pipe } from "effect";
import type { EnvConfig } from "../../config/env";
import type { LogFormat, ReplayMode } from "../../config/field-values";
import { resolveReplayMode } from "../../config/resolve";
import type { Settings } from "../../config/schema";
import { type AppError, ErrorCode, GeneralError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import { type BackupTimestamp, parseTargetTimestamp } from "../../lib/timestamp";
import type { AbsolutePath } from "../../lib/types";
import {
  type Artifact,
  ArtifactOrder,
  artifactsOf,
  databasesWithFulls,
  listArtifacts,
} from "../../pitr/artifacts";
import type { DatabaseClient } from "../../pitr/client";
import { BackupPaths, type PitrContext } from "../../pitr/context";
import {
  type RestoreSummary,
  RestoreOutcome,
  RestoreTarget,
  databaseFromBackupFile,
  restoreFailure,
  runRestore,
} from "../../pitr/restore";
import {
  formatBytes,
  formatDuration,
  invalidArgs,
  parseDatabaseArg,
  resolveKeyFile,
  resolveOptionalPath,
} from "./utils";

export interface RestoreCommandOptions {
  readonly database: Option.Option<string>;
  readonly backupFile: Option.Option<string>;
  readonly last: boolean;
  readonly toTimestamp: Option.Option<string>;
  readonly fullOnly: boolean;
  readonly strict: boolean;
  readonly lenient: boolean;
  readonly interactive: boolean;
  readonly key: Option.Option<string>;
  readonly format: LogFormat;
  readonly settings: Settings;
  readonly env: EnvConfig;
}

const ALL_DATABASES = "ALL";
const LATEST = "LATEST";

interface Selection {
  readonly target: RestoreTarget;
  readonly backupFile: Option.Option<AbsolutePath>;
}

// ============================================================================
// Argument resolution
// ============================================================================

export const parseReplayFlags = (
  strict: boolean,
  lenient: boolean
): Effect.Effect<Option.Option<ReplayMode>, GeneralError> =>
  strict && lenient
    ? Effect.fail(invalidArgs("--strict and --lenient are mutually exclusive"))
    : Effect.succeed(
        strict
          ? Option.some<ReplayMode>("strict")
          : lenient
            ? Option.some<ReplayMode>("lenient")
            : Option.none()
      );

export const parseToTimestamp = (
  raw: Option.Option<string>
): Effect.Effect<Option.Option<BackupTimestamp>, GeneralError> =>
  Option.match(raw, {
    onNone: (): Effect.Effect<Option.Option<BackupTimestamp>, GeneralError> =>
      Effect.succeed(Option.none()),
    onSome: (s): Effect.Effect<Option.Option<BackupTimestamp>, GeneralError> =>
      Option.match(parseTargetTimestamp(s), {
        onNone: () =>
          Effect.fail(invalidArgs(`Invalid --to-timestamp '${s}'; expected "YYYY-MM-DD HH:MM:SS"`)),
        onSome: (ts) => Effect.succeed(Option.some(ts)),
      }),
  });

/** `--last` and `--backup-file LATEST` both mean the newest full backup. */
const resolveBackupFile = (
  options: RestoreCommandOptions
): Effect.Effect<Option.Option<AbsolutePath>, AppError> =>
  options.last
    ? Effect.succeed(Option.none())
    : resolveOptionalPath(Option.filter(options.backupFile, (f) => f !== LATEST));

/** The selection given on the command line, or None when only a prompt can supply it. */
export const selectionFromArgs = (
  database: Option.Option<string>,
  backupFile: Option.Option<AbsolutePath>
): Effect.Effect<Option.Option<Selection>, GeneralError> =>
  Option.match(database, {
    onSome: (name): Effect.Effect<Option.Option<Selection>, GeneralError> =>
      name === ALL_DATABASES
        ? Option.isSome(backupFile)
          ? Effect.fail(invalidArgs("--backup-file cannot be combined with --database ALL"))
          : Effect.succeed(Option.some({ target: RestoreTarget.All(), backupFile }))
        : Effect.map(parseDatabaseArg(name), (db) =>
            Option.some({ target: RestoreTarget.Database({ database: db }), backupFile })
          ),
    onNone: (): Effect.Effect<Option.Option<Selection>, GeneralError> =>
      Option.match(backupFile, {
        onNone: () => Effect.succeed(Option.none()),
        onSome: (file) =>
          Option.match(databaseFromBackupFile(file), {
            onNone: () =>
              Effect.fail(
                invalidArgs(`Cannot tell the database from ${file}; pass --database`)
              ),
            onSome: (db) =>
              Effect.succeed(
                Option.some({ target: RestoreTarget.Database({ database: db }), backupFile })
              ),
          }),
      }),
  });

// ============================================================================
// Interactive selection
// ============================================================================

const cancelled = new GeneralError({
  code: ErrorCode.GENERAL_ERROR,
  message: "Restore cancelled",
});

const pickBackup = (fulls: readonly Artifact[]): Effect.Effect<Artifact, GeneralError, Prompt.Prompt.Environment> =>
  Option.match(Arr.head(fulls), {
    onNone: () => Effect.fail(invalidArgs("No full backups to choose from")),
    onSome: (newest) =>
      fulls.length === 1
        ? Effect.succeed(newest)
        : pipe(
            Prompt.select({
              message: "Backup to restore",
              choices: fulls.map((a, i) => ({
                title: i === 0 ? `${a.timestamp} (latest)` : a.timestamp,
                value: a,
              })),
            }),
            Prompt.run,
            Effect.mapError(() => cancelled)
          ),
  });

/** Database first (entry 1 restores every database), then a backup, newest first. */
const promptSelection: Effect.Effect<Selection, AppError, BackupPaths | Prompt.Prompt.Environment> = Effect.gen(
  function* () {
    const layout = yield* BackupPaths;
    const artifacts = yield* listArtifacts(layout);
    const databases = databasesWithFulls(artifacts);
    if (databases.length === 0) {
      return yield* Effect.fail(invalidArgs("No full backups to choose from"));
    }

    const choice = yield* pipe(
      Prompt.select({
        message: "Database to restore",
        choices: [
          { title: "All databases", value: Option.none<string>() },
          ...databases.map((db) => ({ title: db, value: Option.some<string>(db) })),
        ],
      }),
      Prompt.run,
      Effect.mapError(() => cancelled)
    );

    if (Option.isNone(choice)) {
      return { target: RestoreTarget.All(), backupFile: Option.none() };
    }
    const database = yield* parseDatabaseArg(choice.value);
    const fulls = Arr.sort(artifactsOf(artifacts, database, "full"), Order.reverse(ArtifactOrder));
    const picked = yield* pickBackup(fulls);
    return {
      target: RestoreTarget.Database({ database }),
      backupFile: Option.some(picked.path),
    };
  }
);

// ============================================================================
// Output
// ============================================================================

const outcomeLine = RestoreOutcome.$match({
  Restored: ({ database, artifact, artifactBytes, replay }): string =>
    `  ✓ ${database}: ${artifact} (${formatBytes(artifactBytes)}), ${replay.applied} binlog(s) applied` +
    (replay.failed > 0 ? `, ${replay.failed} failed` : ""),
  Failed: ({ database, message }): string => `  ✗ ${database}: ${message}`,
});

export const renderRestoreSummary = (summary: RestoreSummary): readonly string[] => [
  Option.match(summary.toTimestamp, {
    onNone: () => `Restore finished in ${formatDuration(summary.durationMs)}`,
    onSome: (ts) => `Restore to ${ts} finished in ${formatDuration(summary.durationMs)}`,
  }),
  ...summary.outcomes.map(outcomeLine),
];

export const restoreSummaryJson = (summary: RestoreSummary): unknown => ({
  toTimestamp: Option.getOrNull(summary.toTimestamp),
  durationMs: summary.durationMs,
  databases: summary.outcomes.map(
    RestoreOutcome.$match({
      Restored: ({ database, artifact, artifactBytes, replay }) => ({
        database,
        status: "restored",
        file: artifact,
        size: artifactBytes,
        replay,
      }),
      Failed: ({ database, code, message }) => ({ database, status: "failed", code, message }),
    })
  ),
});

/**
 * With nothing on the command line that selects a backup, a terminal gets
 * the prompt. `--last` alone never prompts.
 */
export const shouldPrompt = (options: {
  readonly interactive: boolean;
  readonly last: boolean;
  readonly stdinIsTty: boolean;
}): boolean => options.interactive || (!options.last && options.stdinIsTty);

export const executeRestore = (
  options: RestoreCommandOptions
): Effect.Effect<void, AppError, PitrContext | DatabaseClient | Prompt.Prompt.Environment> =>
  Effect.gen(function* () {
    const cliReplayMode = yield* parseReplayFlags(options.strict, options.lenient);
    const toTimestamp = yield* parseToTimestamp(options.toTimestamp);
    const keyFile = yield* resolveKeyFile(options.key, options.settings);
    const backupFile = yield* resolveBackupFile(options);

    const fromArgs = yield* selectionFromArgs(options.database, backupFile);
    const selection = yield* Option.match(fromArgs, {
      onSome: (s): Effect.Effect<Selection, AppError, BackupPaths | Prompt.Prompt.Environment> => Effect.succeed(s),
      onNone: (): Effect.Effect<Selection, AppError, BackupPaths | Prompt.Prompt.Environment> =>
        shouldPrompt({
          interactive: options.interactive,
          last: options.last,
          stdinIsTty: process.stdin.isTTY === true,
        })
          ? promptSelection
          : Effect.fail(invalidArgs("--database is required (or use --interactive)")),
    });

    const summary = yield* runRestore({
      target: selection.target,
      backupFile: selection.backupFile,
      toTimestamp,
      fullOnly: options.fullOnly,
      replayMode: resolveReplayMode(cliReplayMode, options.env, options.settings),
      keyFile,
    });

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeJson(restoreSummaryJson(summary))),
      Match.when("pretty", () => writeOutput(renderRestoreSummary(summary).join("\n"))),
      Match.exhaustive
    );

    yield* Option.match(restoreFailure(summary), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (e): Effect.Effect<never, AppError> => Effect.fail(e),
    });
  });
