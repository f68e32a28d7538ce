// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Names and listings of everything kept in the backup directory:
 * artifacts, coordinate markers and staged binlog segments.
 */

import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import type { BackupMode } from "../config/field-values";
import type { SystemError } from "../lib/errors";
import { type BackupLayout, checksumPath } from "../lib/paths";
import { type BackupTimestamp, BackupTimestampOrder, parseBackupTimestamp } from "../lib/timestamp";
import { type AbsolutePath, type DatabaseName, isDatabaseName, pathJoin } from "../lib/types";
import { GZIP_SUFFIX } from "../system/compress";
import { ENCRYPTED_SUFFIX } from "../system/encryption";
import { listDirectory, statFile } from "../system/fs";
import { type BinlogCoordinate, type BinlogSegment, SegmentOrder, parseSegmentName } from "./coordinate";
import { type MarkerContent, readMarker } from "./marker";

// ============================================================================
// Artifacts
// ============================================================================

export interface ArtifactId {
  readonly database: DatabaseName;
  readonly mode: BackupMode;
  readonly timestamp: BackupTimestamp;
}

export interface Artifact extends ArtifactId {
  readonly fileName: string;
  readonly path: AbsolutePath;
  readonly compressed: boolean;
}

const SQL_SUFFIX = ".sql";

/** `<db>_<mode>_<YYYY-MM-DD_HH-MM-SS>.sql[.gz].enc` */
export const artifactFileName = (id: ArtifactId, compressed: boolean): string =>
  `${id.database}_${id.mode}_${id.timestamp}${SQL_SUFFIX}${compressed ? GZIP_SUFFIX : ""}${ENCRYPTED_SUFFIX}`;

const ARTIFACT_PATTERN =
  /^(.+)_(full|incremental)_(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})\.sql(\.gz)?\.enc$/;

export const parseArtifactName = (dir: AbsolutePath, fileName: string): Option.Option<Artifact> =>
  pipe(
    Option.fromNullable(ARTIFACT_PATTERN.exec(fileName)),
    Option.flatMap(([, database, mode, ts, gz]) =>
      Option.all({
        database: Option.liftPredicate(database, isDatabaseName),
        mode: Option.liftPredicate(mode, (m): m is BackupMode => m === "full" || m === "incremental"),
        timestamp: parseBackupTimestamp(ts ?? ""),
      }).pipe(
        Option.map(
          (id): Artifact => ({
            ...id,
            fileName,
            path: pathJoin(dir, fileName),
            compressed: gz !== undefined,
          })
        )
      )
    )
  );

/** Oldest first; ties broken by name so listings are stable. */
export const ArtifactOrder: Order.Order<Artifact> = Order.combine(
  Order.mapInput(BackupTimestampOrder, (a: Artifact) => a.timestamp),
  Order.mapInput(Order.string, (a: Artifact) => a.fileName)
);

export const listArtifacts = (layout: BackupLayout): Effect.Effect<readonly Artifact[], SystemError> =>
  pipe(
    listDirectory(layout.root),
    Effect.map((names) =>
      pipe(
        names,
        Arr.filterMap((name: string) => parseArtifactName(layout.root, name)),
        Arr.sort(ArtifactOrder)
      )
    )
  );

export const artifactsOf = (
  artifacts: readonly Artifact[],
  database: DatabaseName,
  mode: BackupMode
): readonly Artifact[] => artifacts.filter((a) => a.database === database && a.mode === mode);

/** Distinct databases that have at least one full artifact, sorted. */
export const databasesWithFulls = (artifacts: readonly Artifact[]): readonly DatabaseName[] =>
  pipe(
    artifacts,
    Arr.filter((a) => a.mode === "full"),
    Arr.map((a) => a.database),
    Arr.dedupe,
    Arr.sort(Order.string)
  );

export const artifactChecksumPath = (layout: BackupLayout, artifact: Artifact): AbsolutePath =>
  checksumPath(layout, artifact.fileName);

// ============================================================================
// Markers
// ============================================================================

export const fullMarkerPath = (
  layout: BackupLayout,
  database: DatabaseName,
  timestamp: BackupTimestamp
): AbsolutePath => pathJoin(layout.binlogInfo, `last_binlog_info_${database}_${timestamp}.txt`);

export const incrementalMarkerPath = (
  layout: BackupLayout,
  database: DatabaseName,
  timestamp: BackupTimestamp
): AbsolutePath => pathJoin(layout.incrInfo, `last_binlog_info_${database}_${timestamp}_incr.txt`);

export interface MarkerFile {
  readonly database: DatabaseName;
  readonly timestamp: BackupTimestamp;
  readonly mode: BackupMode;
  readonly path: AbsolutePath;
}

const MARKER_PATTERN = /^last_binlog_info_(.+)_(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})(_incr)?\.txt$/;

export const parseMarkerName = (dir: AbsolutePath, fileName: string): Option.Option<MarkerFile> =>
  pipe(
    Option.fromNullable(MARKER_PATTERN.exec(fileName)),
    Option.flatMap(([, database, ts, incr]) =>
      Option.all({
        database: Option.liftPredicate(database, isDatabaseName),
        timestamp: parseBackupTimestamp(ts ?? ""),
      }).pipe(
        Option.map(
          (id): MarkerFile => ({
            ...id,
            mode: incr === undefined ? "full" : "incremental",
            path: pathJoin(dir, fileName),
          })
        )
      )
    )
  );

const listMarkersIn = (dir: AbsolutePath): Effect.Effect<readonly MarkerFile[], SystemError> =>
  Effect.map(listDirectory(dir), Arr.filterMap((name: string) => parseMarkerName(dir, name)));

/** Markers of both kinds, oldest first. */
export const listMarkers = (layout: BackupLayout): Effect.Effect<readonly MarkerFile[], SystemError> =>
  pipe(
    Effect.all([listMarkersIn(layout.binlogInfo), listMarkersIn(layout.incrInfo)]),
    Effect.map(([full, incr]) =>
      pipe(
        [...full, ...incr],
        Arr.sort(Order.mapInput(BackupTimestampOrder, (m: MarkerFile) => m.timestamp))
      )
    )
  );

/** Newest marker of `database` across `binlog_info/` and `incr/`. */
export const newestMarker = (
  layout: BackupLayout,
  database: DatabaseName
): Effect.Effect<Option.Option<MarkerContent>, SystemError> =>
  Effect.gen(function* () {
    const markers = (yield* listMarkers(layout)).filter((m) => m.database === database);
    return yield* pipe(
      Arr.last(markers),
      Option.match({
        onNone: (): Effect.Effect<Option.Option<MarkerContent>, SystemError> =>
          Effect.succeed(Option.none()),
        onSome: (m): Effect.Effect<Option.Option<MarkerContent>, SystemError> => readMarker(m.path),
      })
    );
  });

/** The marker of a generation: `binlog_info/` first, then `incr/`. */
export const generationMarker = (
  layout: BackupLayout,
  database: DatabaseName,
  timestamp: BackupTimestamp
): Effect.Effect<Option.Option<MarkerContent>, SystemError> =>
  pipe(
    readMarker(fullMarkerPath(layout, database, timestamp)),
    Effect.flatMap((found) =>
      Option.isSome(found)
        ? Effect.succeed(found)
        : readMarker(incrementalMarkerPath(layout, database, timestamp))
    )
  );

/** Decoded coordinate of a generation, if any. */
export const generationCoordinate = (
  layout: BackupLayout,
  database: DatabaseName,
  timestamp: BackupTimestamp
): Effect.Effect<Option.Option<BinlogCoordinate>, SystemError> =>
  Effect.map(
    generationMarker(layout, database, timestamp),
    Option.flatMap((m) => m.coordinate)
  );

// ============================================================================
// Staged segments
// ============================================================================

export interface StagedSegment {
  readonly segment: BinlogSegment;
  readonly fileName: string;
  readonly path: AbsolutePath;
  readonly size: number;
}

/** Segments in `BINLOG_DIR`, ascending. Index files and strays are ignored. */
export const listStagedSegments = (
  layout: BackupLayout
): Effect.Effect<readonly StagedSegment[], SystemError> =>
  Effect.gen(function* () {
    const names = yield* listDirectory(layout.binlogs);
    const parsed = Arr.filterMap(names, (fileName) =>
      Option.map(parseSegmentName(fileName), (segment) => ({ segment, fileName }))
    );
    const staged = yield* Effect.forEach(parsed, ({ segment, fileName }) => {
      const path = pathJoin(layout.binlogs, fileName);
      return Effect.map(
        statFile(path),
        (info): StagedSegment => ({
          segment,
          fileName,
          path,
          size: Option.match(info, { onNone: () => 0, onSome: (i) => i.size }),
        })
      );
    });
    return Arr.sort(staged, Order.mapInput(SegmentOrder, (s: StagedSegment) => s.segment));
  });

export const segmentChecksumPath = (layout: BackupLayout, fileName: string): AbsolutePath =>
  checksumPath(layout, fileName);
