// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup coordinator. Full mode dumps every target and records the binlog
 * coordinate of each dump; incremental mode extracts the events between the
 * newest recorded coordinate and the server's current one.
 *
 * Per-database failures are collected into the summary; only connectivity,
 * configuration and target resolution abort the run.
 */

import { Array as Arr, Clock, Data, Effect, Option, Order, type Scope, pipe } from "effect";
import type { BackupMode } from "../config/field-values";
import {
  BackupError,
  type ConfigError,
  type CryptoError,
  DatabaseError,
  ErrorCode,
  type GeneralError,
  type SystemError,
} from "../lib/errors";
import { logFail, withDatabase } from "../lib/log";
import { CONTAINER_PATHS, type BackupLayout, checksumPath, layoutDirectories } from "../lib/paths";
import { type BackupTimestamp, formatBackupTimestamp } from "../lib/timestamp";
import {
  type AbsolutePath,
  type DatabaseName,
  isDatabaseName,
  pathDirname,
  pathJoin,
  pathWithSuffix,
} from "../lib/types";
import { writeChecksum } from "../system/checksum";
import { GZIP_SUFFIX, gzipFile } from "../system/compress";
import { type EncryptionKey, encryptFile, loadOrCreateKey } from "../system/encryption";
import {
  deleteFile,
  ensureDirectory,
  fileSize,
  renameFile,
  scopedTempDirectory,
} from "../system/fs";
import {
  type ArtifactId,
  artifactFileName,
  fullMarkerPath,
  incrementalMarkerPath,
  listStagedSegments,
  newestMarker,
} from "./artifacts";
import { fileContainsEvents } from "./binlog-events";
import { type BinlogRange, DatabaseClient } from "./client";
import { BackupPaths, Connection, PitrSettings, withStateLock } from "./context";
import {
  type BinlogCoordinate,
  type BinlogSegment,
  SegmentOrder,
  coordinate,
  formatCoordinate,
  sameCoordinate,
  sameSegment,
  segmentName,
} from "./coordinate";
import { findDumpCoordinate, writeMarker } from "./marker";
import { type StagingResult, stageBinlogsQuietly } from "./staging";

// ============================================================================
// Types
// ============================================================================

export interface BackupOptions {
  readonly mode: BackupMode;
  readonly database: Option.Option<DatabaseName>;
  readonly includeEmpty: boolean;
  readonly keyFile: AbsolutePath;
  readonly compress: boolean;
  readonly checksums: boolean;
}

export interface ArtifactInfo {
  readonly fileName: string;
  readonly path: AbsolutePath;
  readonly size: number;
  readonly coordinate: Option.Option<BinlogCoordinate>;
}

export type DatabaseOutcome = Data.TaggedEnum<{
  Succeeded: { readonly database: DatabaseName; readonly artifact: ArtifactInfo };
  Skipped: { readonly database: DatabaseName; readonly reason: string };
  Failed: { readonly database: DatabaseName; readonly code: number; readonly message: string };
}>;

export const DatabaseOutcome = Data.taggedEnum<DatabaseOutcome>();

export interface BackupSummary {
  readonly mode: BackupMode;
  readonly timestamp: BackupTimestamp;
  readonly outcomes: readonly DatabaseOutcome[];
  readonly staging: Option.Option<StagingResult>;
  readonly durationMs: number;
}

type RunError = DatabaseError | SystemError | CryptoError | BackupError | GeneralError;

type BackupContext = DatabaseClient | BackupPaths | PitrSettings | Connection;

export interface RunContext {
  readonly layout: BackupLayout;
  readonly scratch: AbsolutePath;
  readonly key: EncryptionKey;
  readonly timestamp: BackupTimestamp;
  readonly compress: boolean;
  readonly checksums: boolean;
}

// ============================================================================
// Targets
// ============================================================================

export const SYSTEM_DATABASES: ReadonlySet<string> = new Set([
  "information_schema",
  "performance_schema",
  "mysql",
  "sys",
  "binlogs",
]);

/** Drops system schemas and names that cannot appear in an artifact name. */
export const userDatabases = (names: readonly string[]): readonly DatabaseName[] =>
  names.filter((n) => !SYSTEM_DATABASES.has(n)).filter(isDatabaseName);

const discoverTargets = (
  includeEmpty: boolean
): Effect.Effect<readonly DatabaseName[], DatabaseError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const candidates = userDatabases(yield* client.listDatabases);
    if (includeEmpty) {
      return candidates;
    }
    const counted = yield* Effect.forEach(candidates, (db) =>
      Effect.map(client.tableCount(db), (tables) => ({ db, tables }))
    );
    const empty = counted.filter((c) => c.tables === 0).map((c) => c.db);
    if (empty.length > 0) {
      yield* Effect.logInfo(`Skipping empty database(s): ${empty.join(", ")}`);
    }
    return counted.filter((c) => c.tables > 0).map((c) => c.db);
  });

export const resolveTargets = (
  explicit: Option.Option<DatabaseName>,
  includeEmpty: boolean
): Effect.Effect<readonly DatabaseName[], DatabaseError | BackupError, DatabaseClient | Connection> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const connection = yield* Connection;

    const targets = yield* Option.match(explicit, {
      onSome: (db): Effect.Effect<readonly DatabaseName[], DatabaseError> =>
        Effect.flatMap(client.listDatabases, (all) =>
          all.includes(db)
            ? Effect.succeed([db])
            : Effect.fail(
                new DatabaseError({
                  code: ErrorCode.DATABASE_NOT_FOUND,
                  message: `Database '${db}' does not exist`,
                  database: db,
                })
              )
        ),
      onNone: (): Effect.Effect<readonly DatabaseName[], never, DatabaseClient> =>
        discoverTargets(includeEmpty).pipe(
          Effect.catchAll((e) =>
            Effect.logWarning(
              `Database discovery failed (${e.message}), using configured database list`
            ).pipe(Effect.as(connection.fallbackDatabases))
          )
        ),
    });

    if (targets.length === 0) {
      return yield* Effect.fail(
        new BackupError({ code: ErrorCode.BACKUP_FAILED, message: "No databases to back up" })
      );
    }
    return targets;
  });

// ============================================================================
// Artifacts
// ============================================================================

/** Compress, encrypt and checksum `plain`, then move the result into the backup root. */
const packArtifact = (
  plain: AbsolutePath,
  id: ArtifactId,
  ctx: RunContext
): Effect.Effect<Omit<ArtifactInfo, "coordinate">, CryptoError | SystemError> =>
  Effect.gen(function* () {
    const fileName = artifactFileName(id, ctx.compress);
    const staged = pathJoin(ctx.scratch, fileName);
    const gzipped = pathWithSuffix(plain, GZIP_SUFFIX);

    if (ctx.compress) {
      yield* gzipFile(plain, gzipped);
      yield* deleteFile(plain);
    }
    yield* encryptFile(ctx.compress ? gzipped : plain, staged, ctx.key);
    yield* deleteFile(ctx.compress ? gzipped : plain);

    if (ctx.checksums) {
      yield* writeChecksum(staged, checksumPath(ctx.layout, fileName));
    }
    const path = pathJoin(ctx.layout.root, fileName);
    yield* renameFile(staged, path);
    const size = yield* fileSize(path);
    yield* Effect.logDebug(`Wrote ${fileName} (${size} bytes)`);
    return { fileName, path, size };
  });

const recordFailure =
  (database: DatabaseName) =>
  (e: RunError): Effect.Effect<DatabaseOutcome> =>
    logFail(e.message).pipe(
      Effect.as(DatabaseOutcome.Failed({ database, code: e.code, message: e.message }))
    );

// ============================================================================
// Full mode
// ============================================================================

const dumpWithFallback = (
  database: DatabaseName,
  dest: AbsolutePath
): Effect.Effect<void, DatabaseError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    yield* client.dump(database, dest, { masterData: true }).pipe(
      Effect.catchAll((e) =>
        Effect.logWarning(`Dump with --master-data failed, retrying without: ${e.message}`).pipe(
          Effect.zipRight(client.dump(database, dest, { masterData: false }))
        )
      )
    );
  });

/** Dump header first, then the live master status, then nothing. */
const dumpCoordinate = (
  dumpPath: AbsolutePath
): Effect.Effect<Option.Option<BinlogCoordinate>, SystemError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const embedded = yield* findDumpCoordinate(dumpPath);
    if (Option.isSome(embedded)) {
      return embedded;
    }
    return yield* client.masterStatus.pipe(
      Effect.catchAll((e) =>
        Effect.logWarning(`Master status unavailable: ${e.message}`).pipe(
          Effect.as(Option.none<BinlogCoordinate>())
        )
      )
    );
  });

export const backupFull = (
  database: DatabaseName,
  ctx: RunContext
): Effect.Effect<ArtifactInfo, RunError, DatabaseClient> =>
  Effect.gen(function* () {
    const dumpPath = pathJoin(ctx.scratch, `${database}_full.sql`);
    yield* Effect.logInfo("Dumping");
    yield* dumpWithFallback(database, dumpPath);

    const found = yield* dumpCoordinate(dumpPath);
    if (Option.isNone(found)) {
      yield* Effect.logWarning("No binlog coordinate available; marker records unknown");
    }

    const artifact = yield* packArtifact(
      dumpPath,
      { database, mode: "full", timestamp: ctx.timestamp },
      ctx
    );
    yield* writeMarker(fullMarkerPath(ctx.layout, database, ctx.timestamp), found);
    return { ...artifact, coordinate: found };
  });

// ============================================================================
// Incremental mode
// ============================================================================

/** Master status, falling back to the newest staged segment at its full size. */
export const currentCoordinate: Effect.Effect<
  BinlogCoordinate,
  DatabaseError | SystemError,
  DatabaseClient | BackupPaths
> = Effect.gen(function* () {
  const client = yield* DatabaseClient;
  const layout = yield* BackupPaths;

  const status = yield* client.masterStatus.pipe(
    Effect.catchAll((e) =>
      Effect.logWarning(`Master status query failed: ${e.message}`).pipe(
        Effect.as(Option.none<BinlogCoordinate>())
      )
    )
  );
  if (Option.isSome(status)) {
    return status.value;
  }

  const newest = Arr.last(yield* listStagedSegments(layout));
  if (Option.isSome(newest)) {
    yield* Effect.logWarning(`Using newest staged segment ${newest.value.fileName} as current position`);
    return coordinate(newest.value.segment, newest.value.size);
  }
  return yield* Effect.fail(
    new DatabaseError({
      code: ErrorCode.STATUS_QUERY_FAILED,
      message: "Cannot determine the current binlog coordinate",
    })
  );
});

/** Server segments from `from` through `to`, inclusive, in order. */
export const segmentsBetween = <T extends { readonly segment: BinlogSegment }>(
  logs: readonly T[],
  from: BinlogSegment,
  to: BinlogSegment
): readonly T[] =>
  pipe(
    logs,
    Arr.filter((l) => Order.between(SegmentOrder)(l.segment, { minimum: from, maximum: to })),
    Arr.sort(Order.mapInput(SegmentOrder, (l: T) => l.segment))
  );

export const backupIncremental = (
  database: DatabaseName,
  current: BinlogCoordinate,
  ctx: RunContext
): Effect.Effect<Option.Option<ArtifactInfo>, RunError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;

    const marker = yield* newestMarker(ctx.layout, database);
    const last = yield* pipe(
      marker,
      Option.flatMap((m) => m.coordinate),
      Option.match({
        onNone: (): Effect.Effect<BinlogCoordinate, BackupError> =>
          Effect.fail(
            new BackupError({
              code: ErrorCode.MARKER_NOT_FOUND,
              message: `No binlog coordinate recorded for ${database}; run a full backup first`,
              database,
            })
          ),
        onSome: (c): Effect.Effect<BinlogCoordinate> => Effect.succeed(c),
      })
    );

    if (sameCoordinate(last, current)) {
      yield* Effect.logInfo(`No new binlog events since ${formatCoordinate(last)}`);
      return Option.none();
    }

    const logs = yield* client.binaryLogs;
    if (!logs.some((l) => sameSegment(l.segment, last.segment))) {
      return yield* Effect.fail(
        new DatabaseError({
          code: ErrorCode.BINLOG_COPY_FAILED,
          message: `Start segment ${segmentName(last.segment)} is no longer on the server`,
          database,
        })
      );
    }

    const serverDir = Option.match(yield* client.binlogBasename, {
      onNone: (): string => CONTAINER_PATHS.dataDir,
      onSome: (b): string => pathDirname(b),
    });
    const selected = segmentsBetween(logs, last.segment, current.segment);
    const range: BinlogRange = {
      database,
      startPosition: Option.some(last.position),
      stopPosition: Option.some(current.position),
      stopDatetime: Option.none(),
    };
    yield* Effect.logInfo(
      `Extracting ${formatCoordinate(last)} -> ${formatCoordinate(current)} (${selected.length} segment(s))`
    );

    const extractPath = pathJoin(ctx.scratch, `${database}_incremental.sql`);
    yield* client.extractEvents(
      selected.map((l) => pathJoin(serverDir, segmentName(l.segment))),
      range,
      extractPath
    );

    if (!(yield* fileContainsEvents(extractPath))) {
      yield* Effect.logInfo("No events for this database in range");
      yield* deleteFile(extractPath);
      return Option.none();
    }

    const artifact = yield* packArtifact(
      extractPath,
      { database, mode: "incremental", timestamp: ctx.timestamp },
      ctx
    );
    yield* writeMarker(
      incrementalMarkerPath(ctx.layout, database, ctx.timestamp),
      Option.some(current)
    );
    return Option.some({ ...artifact, coordinate: Option.some(current) });
  });

// ============================================================================
// Coordinator
// ============================================================================

const runFull = (
  targets: readonly DatabaseName[],
  ctx: RunContext
): Effect.Effect<
  { readonly outcomes: readonly DatabaseOutcome[]; readonly staging: Option.Option<StagingResult> },
  DatabaseError,
  BackupContext
> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const settings = yield* PitrSettings;

    let staging = Option.none<StagingResult>();
    if (yield* client.binlogEnabled) {
      yield* client.flushBinaryLogs;
      staging = yield* stageBinlogsQuietly({ checksums: ctx.checksums });
    } else {
      yield* Effect.logWarning("Binary logging is disabled; point-in-time recovery will not be possible");
    }

    const outcomes = yield* Effect.forEach(
      targets,
      (database) =>
        backupFull(database, ctx).pipe(
          Effect.map((artifact) => DatabaseOutcome.Succeeded({ database, artifact })),
          Effect.catchAll(recordFailure(database)),
          withDatabase(database)
        ),
      { concurrency: settings.backup.parallelism }
    );
    return { outcomes, staging };
  });

const runIncremental = (
  targets: readonly DatabaseName[],
  ctx: RunContext
): Effect.Effect<
  { readonly outcomes: readonly DatabaseOutcome[]; readonly staging: Option.Option<StagingResult> },
  DatabaseError | SystemError,
  BackupContext
> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;

    if (yield* client.binlogEnabled) {
      yield* client.flushBinaryLogs;
    }
    const current = yield* currentCoordinate;
    yield* Effect.logDebug(`Current binlog coordinate: ${formatCoordinate(current)}`);

    const outcomes = yield* Effect.forEach(targets, (database) =>
      backupIncremental(database, current, ctx).pipe(
        Effect.map(
          Option.match({
            onNone: () => DatabaseOutcome.Skipped({ database, reason: "no new events" }),
            onSome: (artifact) => DatabaseOutcome.Succeeded({ database, artifact }),
          })
        ),
        Effect.catchAll(recordFailure(database)),
        withDatabase(database)
      )
    );

    const staging = yield* stageBinlogsQuietly({ checksums: ctx.checksums });
    return { outcomes, staging };
  });

const prepareRun = (
  options: BackupOptions,
  timestamp: BackupTimestamp
): Effect.Effect<RunContext, SystemError | CryptoError | ConfigError, BackupPaths | Scope.Scope> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const key = yield* loadOrCreateKey(options.keyFile);
    const scratch = yield* scopedTempDirectory(layout.root, ".work-");
    return {
      layout,
      scratch,
      key,
      timestamp,
      compress: options.compress,
      checksums: options.checksums,
    };
  });

export const runBackup = (
  options: BackupOptions
): Effect.Effect<BackupSummary, RunError | ConfigError, BackupContext> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const started = yield* Clock.currentTimeMillis;
    const timestamp = formatBackupTimestamp(new Date(started));

    yield* Effect.forEach(layoutDirectories(layout), (dir) => ensureDirectory(dir), {
      discard: true,
    });

    const result = yield* withStateLock(
      Effect.gen(function* () {
        const client = yield* DatabaseClient;
        yield* client.ping;
        const targets = yield* resolveTargets(options.database, options.includeEmpty);
        yield* Effect.logInfo(
          `Starting ${options.mode} backup of ${targets.length} database(s): ${targets.join(", ")}`
        );
        const ctx = yield* prepareRun(options, timestamp);
        return options.mode === "full"
          ? yield* runFull(targets, ctx)
          : yield* runIncremental(targets, ctx);
      }).pipe(Effect.scoped)
    );

    const finished = yield* Clock.currentTimeMillis;
    return {
      mode: options.mode,
      timestamp,
      outcomes: result.outcomes,
      staging: result.staging,
      durationMs: finished - started,
    };
  });

/** BACKUP_FAILED naming every failed database, if any failed. */
export const backupFailure = (summary: BackupSummary): Option.Option<BackupError> => {
  const failed = summary.outcomes.filter(DatabaseOutcome.$is("Failed"));
  return failed.length === 0
    ? Option.none()
    : Option.some(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `Backup failed for ${failed.length} database(s): ${failed.map((f) => f.database).join(", ")}`,
        })
      );
};
