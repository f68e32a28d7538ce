// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `backup --full | --incremental`. Runs the backup, prints a summary and
 * fails with BACKUP_FAILED when any database failed.
 */

import { Effect, Match, Option, pipe } from "effect";
import type { BackupMode, LogFormat } from "../../config/field-values";
import type { Settings } from "../../config/schema";
import type { AppError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import type { DatabaseClient } from "../../pitr/client";
import type { PitrContext } from "../../pitr/context";
import { formatCoordinate } from "../../pitr/coordinate";
import { type BackupSummary, DatabaseOutcome, backupFailure, runBackup } from "../../pitr/backup";
import {
  exactlyOne,
  formatBytes,
  formatDuration,
  parseOptionalDatabase,
  resolveKeyFile,
} from "./utils";

export interface BackupCommandOptions {
  readonly full: boolean;
  readonly incremental: boolean;
  readonly database: Option.Option<string>;
  readonly includeEmpty: boolean;
  readonly key: Option.Option<string>;
  readonly noCompress: boolean;
  readonly noChecksums: boolean;
  readonly format: LogFormat;
  readonly settings: Settings;
}

const outcomeLine = DatabaseOutcome.$match({
  Succeeded: ({ database, artifact }): string =>
    `  ✓ ${database}: ${artifact.fileName} (${formatBytes(artifact.size)})`,
  Skipped: ({ database, reason }): string => `  - ${database}: skipped, ${reason}`,
  Failed: ({ database, message }): string => `  ✗ ${database}: ${message}`,
});

export const renderBackupSummary = (summary: BackupSummary): readonly string[] => [
  `${summary.mode} backup ${summary.timestamp} finished in ${formatDuration(summary.durationMs)}`,
  ...summary.outcomes.map(outcomeLine),
  ...Option.match(summary.staging, {
    onNone: (): string[] => [],
    onSome: (s): string[] => [
      `  binlogs: ${s.staged.length} staged, ${s.skipped.length} skipped, ${s.alreadyStaged} already staged`,
    ],
  }),
];

/** Plain JSON view; Options become null. */
export const backupSummaryJson = (summary: BackupSummary): unknown => ({
  mode: summary.mode,
  timestamp: summary.timestamp,
  durationMs: summary.durationMs,
  databases: summary.outcomes.map(
    DatabaseOutcome.$match({
      Succeeded: ({ database, artifact }) => ({
        database,
        status: "succeeded",
        file: artifact.fileName,
        size: artifact.size,
        coordinate: Option.getOrNull(Option.map(artifact.coordinate, formatCoordinate)),
      }),
      Skipped: ({ database, reason }) => ({ database, status: "skipped", reason }),
      Failed: ({ database, code, message }) => ({ database, status: "failed", code, message }),
    })
  ),
  binlogs: Option.getOrNull(summary.staging),
});

export const executeBackup = (
  options: BackupCommandOptions
): Effect.Effect<void, AppError, PitrContext | DatabaseClient> =>
  Effect.gen(function* () {
    const mode = yield* exactlyOne<BackupMode>(
      options.full ? Option.some("full" as const) : Option.none(),
      options.incremental ? Option.some("incremental" as const) : Option.none(),
      "--full or --incremental"
    );
    const database = yield* parseOptionalDatabase(options.database);
    const keyFile = yield* resolveKeyFile(options.key, options.settings);

    const summary = yield* runBackup({
      mode,
      database,
      includeEmpty: options.includeEmpty,
      keyFile,
      compress: options.settings.backup.compress && !options.noCompress,
      checksums: options.settings.backup.checksums && !options.noChecksums,
    });

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeJson(backupSummaryJson(summary))),
      Match.when("pretty", () => writeOutput(renderBackupSummary(summary).join("\n"))),
      Match.exhaustive
    );

    yield* Option.match(backupFailure(summary), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (e): Effect.Effect<never, AppError> => Effect.fail(e),
    });
  });
