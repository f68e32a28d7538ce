// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore coordinator: verify, decrypt and import a full artifact, then
 * replay staged binlog segments from the generation's recorded coordinate.
 */

import { Array as Arr, Clock, Data, Effect, Option, Order, type Scope, pipe } from "effect";
import type { ReplayMode } from "../config/field-values";
import {
  BackupError,
  type ConfigError,
  type CryptoError,
  DatabaseError,
  ErrorCode,
  type GeneralError,
  type SystemError,
} from "../lib/errors";
import { createStepCounter, logFail, logSuccess, withDatabase } from "../lib/log";
import type { BackupLayout } from "../lib/paths";
import { type BackupTimestamp, BackupTimestampOrder, toDatetimeArg } from "../lib/timestamp";
import {
  type AbsolutePath,
  type DatabaseName,
  pathBasename,
  pathDirname,
  pathJoin,
} from "../lib/types";
import { verifyChecksum } from "../system/checksum";
import { type EncryptionKey, decryptFile, decryptedName, loadKey } from "../system/encryption";
import {
  deleteFile,
  ensureDirectory,
  fileExists,
  fileSize,
  scopedTempDirectory,
} from "../system/fs";
import {
  type Artifact,
  type StagedSegment,
  artifactChecksumPath,
  artifactsOf,
  databasesWithFulls,
  generationCoordinate,
  listArtifacts,
  listStagedSegments,
  parseArtifactName,
  segmentChecksumPath,
} from "./artifacts";
import { type BinlogRange, DatabaseClient } from "./client";
import { BackupPaths, type Connection, type PitrSettings, withStateLock } from "./context";
import { type BinlogCoordinate, formatCoordinate, sameSegment } from "./coordinate";

// ============================================================================
// Types
// ============================================================================

export type RestoreTarget = Data.TaggedEnum<{
  All: object;
  Database: { readonly database: DatabaseName };
}>;

export const RestoreTarget = Data.taggedEnum<RestoreTarget>();

export interface RestoreOptions {
  readonly target: RestoreTarget;
  /** None selects the newest full artifact. */
  readonly backupFile: Option.Option<AbsolutePath>;
  readonly toTimestamp: Option.Option<BackupTimestamp>;
  readonly fullOnly: boolean;
  readonly replayMode: ReplayMode;
  readonly keyFile: AbsolutePath;
}

export interface ReplayStats {
  readonly applied: number;
  readonly failed: number;
  readonly skipped: number;
  readonly bytes: number;
}

const NO_REPLAY: ReplayStats = { applied: 0, failed: 0, skipped: 0, bytes: 0 };

export type RestoreOutcome = Data.TaggedEnum<{
  Restored: {
    readonly database: DatabaseName;
    readonly artifact: string;
    readonly artifactBytes: number;
    readonly replay: ReplayStats;
  };
  Failed: { readonly database: DatabaseName; readonly code: number; readonly message: string };
}>;

export const RestoreOutcome = Data.taggedEnum<RestoreOutcome>();

export interface RestoreSummary {
  readonly toTimestamp: Option.Option<BackupTimestamp>;
  readonly outcomes: readonly RestoreOutcome[];
  readonly durationMs: number;
}

type RunError = DatabaseError | SystemError | CryptoError | BackupError | GeneralError;

export interface RestoreContext {
  readonly layout: BackupLayout;
  readonly scratch: AbsolutePath;
  readonly key: EncryptionKey;
  readonly artifacts: readonly Artifact[];
}

// ============================================================================
// Artifact selection
// ============================================================================

/** Database named by an artifact path such as `/b/shop_full_2024-01-15_10-30-00.sql.gz.enc`. */
export const databaseFromBackupFile = (file: AbsolutePath): Option.Option<DatabaseName> =>
  Option.map(parseArtifactName(pathDirname(file), pathBasename(file)), (a) => a.database);

const notFound = (database: DatabaseName, message: string): BackupError =>
  new BackupError({ code: ErrorCode.BACKUP_NOT_FOUND, message, database });

export const selectArtifact = (
  artifacts: readonly Artifact[],
  database: DatabaseName,
  explicit: Option.Option<AbsolutePath>
): Effect.Effect<Artifact, BackupError> =>
  Option.match(explicit, {
    onNone: (): Effect.Effect<Artifact, BackupError> =>
      Option.match(Arr.last(artifactsOf(artifacts, database, "full")), {
        onNone: () => Effect.fail(notFound(database, `No full backup found for ${database}`)),
        onSome: (a) => Effect.succeed(a),
      }),
    onSome: (file): Effect.Effect<Artifact, BackupError> =>
      Effect.gen(function* () {
        const parsed = pipe(
          parseArtifactName(pathDirname(file), pathBasename(file)),
          Option.filter((a) => a.mode === "full" && a.database === database)
        );
        if (Option.isNone(parsed)) {
          return yield* Effect.fail(
            notFound(database, `${file} is not a full backup of ${database}`)
          );
        }
        if (!(yield* fileExists(file))) {
          return yield* Effect.fail(notFound(database, `Backup file not found: ${file}`));
        }
        return parsed.value;
      }),
  });

// ============================================================================
// Replay planning
// ============================================================================

export interface ReplayStep {
  readonly segment: StagedSegment;
  readonly range: BinlogRange;
}

export interface ReplayPlan {
  readonly steps: readonly ReplayStep[];
  /** Candidates left out by the end bound or the target timestamp. */
  readonly skipped: number;
}

export interface ReplayInput {
  readonly database: DatabaseName;
  readonly backupTimestamp: BackupTimestamp;
  readonly marker: BinlogCoordinate;
  readonly staged: readonly StagedSegment[];
  /** Marker of the next full generation, if any. */
  readonly endBound: Option.Option<BinlogCoordinate>;
  readonly toTimestamp: Option.Option<BackupTimestamp>;
}

const segmentAtOrAfter = (s: StagedSegment, marker: BinlogCoordinate): boolean =>
  s.segment.base === marker.segment.base && s.segment.sequence >= marker.segment.sequence;

export const targetPrecedesBackup = (
  toTimestamp: Option.Option<BackupTimestamp>,
  backupTimestamp: BackupTimestamp
): boolean =>
  Option.exists(toTimestamp, (t: BackupTimestamp) =>
    Order.lessThan(BackupTimestampOrder)(t, backupTimestamp)
  );

export const planReplay = (input: ReplayInput): ReplayPlan => {
  const candidates = input.staged.filter((s) => segmentAtOrAfter(s, input.marker));
  if (targetPrecedesBackup(input.toTimestamp, input.backupTimestamp)) {
    return { steps: [], skipped: candidates.length };
  }

  const within = Option.match(input.endBound, {
    onNone: () => candidates,
    onSome: (end) =>
      candidates.filter(
        (s) => s.segment.base !== end.segment.base || s.segment.sequence <= end.segment.sequence
      ),
  });

  const stopDatetime = Option.map(input.toTimestamp, toDatetimeArg);
  const steps = within.map(
    (segment): ReplayStep => ({
      segment,
      range: {
        database: input.database,
        startPosition: sameSegment(segment.segment, input.marker.segment)
          ? Option.some(input.marker.position)
          : Option.none(),
        stopPosition: pipe(
          input.endBound,
          Option.filter((end) => sameSegment(segment.segment, end.segment)),
          Option.map((end) => end.position)
        ),
        stopDatetime,
      },
    })
  );
  return { steps, skipped: candidates.length - within.length };
};

// ============================================================================
// Replay
// ============================================================================

const replayStep = (
  step: ReplayStep,
  mode: ReplayMode
): Effect.Effect<boolean, DatabaseError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    return yield* client.replaySegment(step.segment.path, step.range).pipe(
      Effect.zipRight(Effect.logDebug(`Applied ${step.segment.fileName}`)),
      Effect.as(true),
      Effect.catchAll((e) =>
        mode === "strict"
          ? Effect.fail(
              new DatabaseError({
                code: ErrorCode.BINLOG_REPLAY_FAILED,
                message: `Replay of ${step.segment.fileName} failed: ${e.message}`,
                database: step.range.database,
                cause: e,
              })
            )
          : Effect.logWarning(
              `Replay of ${step.segment.fileName} failed, continuing: ${e.message}`
            ).pipe(Effect.as(false))
      )
    );
  });

/** Every planned segment is checked before the first one is replayed. */
const verifySegments = (
  layout: BackupLayout,
  steps: readonly ReplayStep[]
): Effect.Effect<void, CryptoError | SystemError> =>
  Effect.forEach(
    steps,
    ({ segment }) =>
      Effect.flatMap(
        verifyChecksum(segment.path, segmentChecksumPath(layout, segment.fileName)),
        (status) =>
          status === "missing"
            ? Effect.logWarning(`No checksum recorded for ${segment.fileName}`)
            : Effect.void
      ),
    { discard: true }
  );

export const replayBinlogs = (
  artifact: Artifact,
  options: RestoreOptions,
  ctx: RestoreContext
): Effect.Effect<ReplayStats, DatabaseError | CryptoError | SystemError, DatabaseClient> =>
  Effect.gen(function* () {
    const database = artifact.database;
    const marker = yield* generationCoordinate(ctx.layout, database, artifact.timestamp);
    if (Option.isNone(marker)) {
      yield* Effect.logWarning(
        "No usable binlog coordinate for this backup; only the full backup was restored"
      );
      return NO_REPLAY;
    }

    const newer = artifactsOf(ctx.artifacts, database, "full").find((a) =>
      Order.greaterThan(BackupTimestampOrder)(a.timestamp, artifact.timestamp)
    );
    const endBound =
      newer === undefined
        ? Option.none<BinlogCoordinate>()
        : yield* generationCoordinate(ctx.layout, database, newer.timestamp);

    if (targetPrecedesBackup(options.toTimestamp, artifact.timestamp)) {
      yield* Effect.logInfo(
        `Target ${Option.getOrElse(Option.map(options.toTimestamp, toDatetimeArg), () => "")} is earlier than the backup; no binlog segments apply`
      );
    }

    const plan = planReplay({
      database,
      backupTimestamp: artifact.timestamp,
      marker: marker.value,
      staged: yield* listStagedSegments(ctx.layout),
      endBound,
      toTimestamp: options.toTimestamp,
    });
    if (plan.steps.length > 0) {
      yield* Effect.logInfo(
        `Replaying ${plan.steps.length} binlog segment(s) from ${formatCoordinate(marker.value)}`
      );
    }

    yield* verifySegments(ctx.layout, plan.steps);
    const results = yield* Effect.forEach(plan.steps, (step) => replayStep(step, options.replayMode));
    const applied = results.filter((ok) => ok).length;
    return {
      applied,
      failed: results.length - applied,
      skipped: plan.skipped,
      bytes: plan.steps.reduce((sum, step) => sum + step.segment.size, 0),
    };
  });

// ============================================================================
// Per database
// ============================================================================

export const restoreDatabase = (
  database: DatabaseName,
  options: RestoreOptions,
  ctx: RestoreContext
): Effect.Effect<RestoreOutcome, RunError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const artifact = yield* selectArtifact(ctx.artifacts, database, options.backupFile);
    const steps = yield* createStepCounter(options.fullOnly ? 2 : 3);
    yield* steps.next(`Verifying ${artifact.fileName}`);

    const checksum = yield* verifyChecksum(artifact.path, artifactChecksumPath(ctx.layout, artifact));
    if (checksum === "missing") {
      yield* Effect.logWarning(`No checksum recorded for ${artifact.fileName}`);
    }

    const plain = pathJoin(ctx.scratch, decryptedName(artifact.fileName));
    yield* steps.next(`Importing ${artifact.fileName}`);
    yield* pipe(
      decryptFile(artifact.path, plain, ctx.key),
      Effect.zipRight(client.createDatabase(database)),
      Effect.zipRight(client.importSql(database, plain, { gunzip: artifact.compressed })),
      Effect.ensuring(deleteFile(plain).pipe(Effect.ignore))
    );
    yield* logSuccess(`Imported ${artifact.fileName}`);

    const replay = options.fullOnly
      ? NO_REPLAY
      : yield* pipe(
          steps.next("Replaying binlogs"),
          Effect.zipRight(replayBinlogs(artifact, options, ctx))
        );

    const artifactBytes = yield* fileSize(artifact.path);
    return RestoreOutcome.Restored({
      database,
      artifact: artifact.fileName,
      artifactBytes,
      replay,
    });
  });

// ============================================================================
// Coordinator
// ============================================================================

const prepareRestore = (
  options: RestoreOptions
): Effect.Effect<RestoreContext, SystemError | ConfigError, BackupPaths | Scope.Scope> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const key = yield* loadKey(options.keyFile);
    const artifacts = yield* listArtifacts(layout);
    const scratch = yield* scopedTempDirectory(layout.root, ".work-");
    return { layout, scratch, key, artifacts };
  });

const targetDatabases = (
  target: RestoreTarget,
  artifacts: readonly Artifact[]
): Effect.Effect<readonly DatabaseName[], BackupError> =>
  RestoreTarget.$match(target, {
    Database: ({ database }) => Effect.succeed([database]),
    All: () => {
      const found = databasesWithFulls(artifacts);
      return found.length === 0
        ? Effect.fail(
            new BackupError({
              code: ErrorCode.BACKUP_NOT_FOUND,
              message: "No full backups found",
            })
          )
        : Effect.succeed(found);
    },
  });

export const runRestore = (
  options: RestoreOptions
): Effect.Effect<
  RestoreSummary,
  RunError | ConfigError,
  DatabaseClient | BackupPaths | PitrSettings | Connection
> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const started = yield* Clock.currentTimeMillis;
    yield* ensureDirectory(layout.root);

    const outcomes = yield* withStateLock(
      Effect.gen(function* () {
        const client = yield* DatabaseClient;
        yield* client.ping;
        const ctx = yield* prepareRestore(options);
        const databases = yield* targetDatabases(options.target, ctx.artifacts);
        yield* Effect.logInfo(`Restoring ${databases.length} database(s): ${databases.join(", ")}`);

        return yield* Effect.forEach(databases, (database) =>
          restoreDatabase(database, options, ctx).pipe(
            Effect.catchAll((e) =>
              logFail(e.message).pipe(
                Effect.as(RestoreOutcome.Failed({ database, code: e.code, message: e.message }))
              )
            ),
            withDatabase(database)
          )
        );
      }).pipe(Effect.scoped)
    );

    const finished = yield* Clock.currentTimeMillis;
    return { toTimestamp: options.toTimestamp, outcomes, durationMs: finished - started };
  });

/** RESTORE_FAILED naming every failed database, if any failed. */
export const restoreFailure = (summary: RestoreSummary): Option.Option<BackupError> => {
  const failed = summary.outcomes.filter(RestoreOutcome.$is("Failed"));
  return failed.length === 0
    ? Option.none()
    : Option.some(
        new BackupError({
          code: ErrorCode.RESTORE_FAILED,
          message: `Restore failed for ${failed.length} database(s): ${failed.map((f) => f.database).join(", ")}`,
        })
      );
};
