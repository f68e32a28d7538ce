// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention: expire old generations, then drop staged segments that no
 * retained generation can replay from.
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import type { GeneralError, SystemError } from "../lib/errors";
import { type BackupLayout, checksumPath } from "../lib/paths";
import type { AbsolutePath } from "../lib/types";
import { deleteFile, statFile } from "../system/fs";
import {
  type Artifact,
  type MarkerFile,
  type StagedSegment,
  artifactsOf,
  databasesWithFulls,
  fullMarkerPath,
  generationCoordinate,
  incrementalMarkerPath,
  listArtifacts,
  listMarkers,
  listStagedSegments,
} from "./artifacts";
import { DatabaseClient } from "./client";
import { BackupPaths, type PitrSettings, withStateLock } from "./context";
import {
  type BinlogCoordinate,
  type BinlogSegment,
  CoordinateOrder,
  formatCoordinate,
  sameSegment,
} from "./coordinate";

export interface CleanupOptions {
  readonly keep: number;
  readonly dryRun: boolean;
}

export interface RemovedFile {
  readonly path: AbsolutePath;
  readonly size: number;
}

export interface CleanupReport {
  readonly dryRun: boolean;
  readonly removed: readonly RemovedFile[];
  readonly freedBytes: number;
}

export interface BinlogCleanupReport extends CleanupReport {
  /** Oldest coordinate a retained generation needs; None when nothing is decodable. */
  readonly boundary: Option.Option<BinlogCoordinate>;
}

/** Deletes (or, on a dry run, reports) the files that exist; missing ones are ignored. */
const removeFiles = (
  paths: readonly AbsolutePath[],
  dryRun: boolean
): Effect.Effect<CleanupReport, SystemError> =>
  Effect.gen(function* () {
    const removed = Arr.getSomes(
      yield* Effect.forEach(Arr.dedupe(paths), (path) =>
        Effect.gen(function* () {
          const info = yield* statFile(path);
          if (Option.isNone(info)) {
            return Option.none<RemovedFile>();
          }
          if (dryRun) {
            yield* Effect.logInfo(`Would delete ${path}`);
          } else {
            yield* deleteFile(path);
            yield* Effect.logDebug(`Deleted ${path}`);
          }
          return Option.some({ path, size: info.value.size });
        })
      )
    );
    return {
      dryRun,
      removed,
      freedBytes: removed.reduce((sum, f) => sum + f.size, 0),
    };
  });

// ============================================================================
// Backup cleaner
// ============================================================================

/**
 * Files belonging to the generations beyond the newest `keep` fulls of each
 * database, including incrementals older than the oldest retained full.
 */
export const planBackupCleanup = (
  layout: BackupLayout,
  artifacts: readonly Artifact[],
  markers: readonly MarkerFile[],
  keep: number
): readonly AbsolutePath[] =>
  databasesWithFulls(artifacts).flatMap((database) => {
    const fulls = artifactsOf(artifacts, database, "full");
    const retained = fulls.slice(-keep);
    const oldestRetained = retained[0];
    if (fulls.length <= keep || oldestRetained === undefined) {
      return [];
    }
    const expired = fulls.slice(0, fulls.length - keep);
    const stale = (a: { readonly timestamp: string }): boolean =>
      a.timestamp < oldestRetained.timestamp;

    return [
      ...expired.flatMap((full) => [
        full.path,
        checksumPath(layout, full.fileName),
        fullMarkerPath(layout, database, full.timestamp),
        incrementalMarkerPath(layout, database, full.timestamp),
      ]),
      ...artifactsOf(artifacts, database, "incremental")
        .filter(stale)
        .flatMap((incr) => [incr.path, checksumPath(layout, incr.fileName)]),
      ...markers
        .filter((m) => m.database === database && m.mode === "incremental" && stale(m))
        .map((m) => m.path),
    ];
  });

export const cleanupBackups = (
  options: CleanupOptions
): Effect.Effect<CleanupReport, SystemError | GeneralError, BackupPaths | PitrSettings> =>
  withStateLock(
    Effect.gen(function* () {
      const layout = yield* BackupPaths;
      const artifacts = yield* listArtifacts(layout);
      const markers = yield* listMarkers(layout);
      const plan = planBackupCleanup(layout, artifacts, markers, options.keep);
      if (plan.length === 0) {
        yield* Effect.logInfo(`Nothing to delete; at most ${options.keep} full backup(s) per database`);
      }
      return yield* removeFiles(plan, options.dryRun);
    })
  );

// ============================================================================
// Binlog cleaner
// ============================================================================

/** Marker of full number `max(0, count - keep)` per database, ascending. */
export const requiredCoordinates = (
  layout: BackupLayout,
  artifacts: readonly Artifact[],
  keep: number
): Effect.Effect<readonly BinlogCoordinate[], SystemError> =>
  Effect.map(
    Effect.forEach(databasesWithFulls(artifacts), (database) => {
      const fulls = artifactsOf(artifacts, database, "full");
      const required = fulls[Math.max(0, fulls.length - keep)];
      return required === undefined
        ? Effect.succeed(Option.none<BinlogCoordinate>())
        : generationCoordinate(layout, database, required.timestamp);
    }),
    Arr.getSomes
  );

export const oldestRequired = (
  coordinates: readonly BinlogCoordinate[]
): Option.Option<BinlogCoordinate> => pipe(coordinates, Arr.sort(CoordinateOrder), Arr.head);

/**
 * Staged segments strictly before the boundary segment, same base only.
 * The server's active segment is never included.
 */
export const planBinlogCleanup = (
  staged: readonly StagedSegment[],
  boundary: BinlogCoordinate,
  active: Option.Option<BinlogSegment>
): readonly StagedSegment[] =>
  staged.filter(
    (s) =>
      s.segment.base === boundary.segment.base &&
      s.segment.sequence < boundary.segment.sequence &&
      !Option.exists(active, (a: BinlogSegment) => sameSegment(a, s.segment))
  );

const activeSegment: Effect.Effect<Option.Option<BinlogSegment>, never, DatabaseClient> =
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    return yield* client.masterStatus.pipe(
      Effect.map(Option.map((c: BinlogCoordinate) => c.segment)),
      Effect.catchAll((e) =>
        Effect.logDebug(`Server unreachable, active segment unknown: ${e.message}`).pipe(
          Effect.as(Option.none<BinlogSegment>())
        )
      )
    );
  });

export const cleanupBinlogs = (
  options: CleanupOptions
): Effect.Effect<
  BinlogCleanupReport,
  SystemError | GeneralError,
  BackupPaths | PitrSettings | DatabaseClient
> =>
  withStateLock(
    Effect.gen(function* () {
      const layout = yield* BackupPaths;
      const artifacts = yield* listArtifacts(layout);
      const boundary = oldestRequired(yield* requiredCoordinates(layout, artifacts, options.keep));

      if (Option.isNone(boundary)) {
        yield* Effect.logInfo("No decodable generation marker; no cleanup needed");
        return { dryRun: options.dryRun, removed: [], freedBytes: 0, boundary };
      }

      const staged = yield* listStagedSegments(layout);
      const doomed = planBinlogCleanup(staged, boundary.value, yield* activeSegment);
      yield* Effect.logInfo(
        `Keeping segments from ${formatCoordinate(boundary.value)}; ${doomed.length} older segment(s) to delete`
      );

      const report = yield* removeFiles(
        doomed.flatMap((s) => [s.path, checksumPath(layout, s.fileName)]),
        options.dryRun
      );
      return { ...report, boundary };
    })
  );
