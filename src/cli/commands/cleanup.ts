// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { AppError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import type { DatabaseClient } from "../../pitr/client";
import type { PitrContext } from "../../pitr/context";
import { formatCoordinate } from "../../pitr/coordinate";
import {
  type BinlogCleanupReport,
  type CleanupReport,
  cleanupBackups,
  cleanupBinlogs,
} from "../../pitr/retention";
import { formatBytes, invalidArgs } from "./utils";

export interface CleanupCommandOptions {
  readonly keep: Option.Option<number>;
  /** `[retention]` value used when `--keep` is absent. */
  readonly defaultKeep: number;
  readonly dryRun: boolean;
  readonly format: LogFormat;
}

export const resolveKeep = (options: CleanupCommandOptions): Effect.Effect<number, AppError> => {
  const keep = Option.getOrElse(options.keep, () => options.defaultKeep);
  return keep < 1 ? Effect.fail(invalidArgs(`--keep must be at least 1, got ${keep}`)) : Effect.succeed(keep);
};

export const renderCleanupReport = (report: CleanupReport): readonly string[] => {
  const verb = report.dryRun ? "Would delete" : "Deleted";
  return [
    ...report.removed.map((f) => `  ${f.path} (${formatBytes(f.size)})`),
    `${verb} ${report.removed.length} file(s), ${formatBytes(report.freedBytes)}`,
  ];
};

interface CleanupReportJson {
  readonly dryRun: boolean;
  readonly removed: CleanupReport["removed"];
  readonly freedBytes: number;
}

const cleanupReportJson = (report: CleanupReport): CleanupReportJson => ({
  dryRun: report.dryRun,
  removed: report.removed,
  freedBytes: report.freedBytes,
});

const emit = <R extends CleanupReport>(
  format: LogFormat,
  report: R,
  toJson: (r: R) => unknown
): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeJson(toJson(report))),
    Match.when("pretty", () => writeOutput(renderCleanupReport(report).join("\n"))),
    Match.exhaustive
  );

export const executeCleanupBackups = (
  options: CleanupCommandOptions
): Effect.Effect<void, AppError, PitrContext> =>
  Effect.gen(function* () {
    const keep = yield* resolveKeep(options);
    const report = yield* cleanupBackups({ keep, dryRun: options.dryRun });
    yield* emit(options.format, report, cleanupReportJson);
  });

export const executeCleanupBinlogs = (
  options: CleanupCommandOptions
): Effect.Effect<void, AppError, PitrContext | DatabaseClient> =>
  Effect.gen(function* () {
    const keep = yield* resolveKeep(options);
    const report = yield* cleanupBinlogs({ keep, dryRun: options.dryRun });
    yield* emit(options.format, report, (r: BinlogCleanupReport) => ({
      ...cleanupReportJson(r),
      boundary: Option.getOrNull(Option.map(r.boundary, formatCoordinate)),
    }));
  });
