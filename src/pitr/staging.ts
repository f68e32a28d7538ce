// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Copies closed binlog segments out of the container into BINLOG_DIR.
 * The open segment (last in SHOW BINARY LOGS) is never staged.
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import type { DatabaseError, SystemError } from "../lib/errors";
import { CONTAINER_PATHS } from "../lib/paths";
import { type AbsolutePath, pathDirname, pathJoin } from "../lib/types";
import { writeChecksum } from "../system/checksum";
import { deleteFile, ensureDirectory, renameFile, tempSibling } from "../system/fs";
import { listStagedSegments, segmentChecksumPath } from "./artifacts";
import { BackupPaths, PitrSettings } from "./context";
import { DatabaseClient } from "./client";
import { segmentName } from "./coordinate";

export interface StagingResult {
  readonly staged: readonly string[];
  /** Segments that could not be found or copied. */
  readonly skipped: readonly string[];
  readonly alreadyStaged: number;
}

export interface StagingOptions {
  readonly checksums: boolean;
}

/** Basename directory first, then the configured search paths, without repeats. */
export const candidateDirectories = (
  basename: Option.Option<string>,
  searchPaths: readonly string[]
): readonly string[] =>
  Arr.dedupe([...Option.toArray(Option.map(basename, (b) => pathDirname(b))), ...searchPaths]);

/** Copies into a temporary sibling so a failed copy never looks staged. */
const copyInto = (
  containerPath: string,
  dest: AbsolutePath
): Effect.Effect<boolean, DatabaseError | SystemError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const temp = tempSibling(dest);
    const copied = yield* client
      .copyFromContainer(containerPath, temp)
      .pipe(Effect.tapError(() => deleteFile(temp).pipe(Effect.ignore)));
    if (!copied) {
      yield* deleteFile(temp);
      return false;
    }
    yield* renameFile(temp, dest);
    return true;
  });

const locateAndCopy = (
  name: string,
  dirs: readonly string[],
  dest: AbsolutePath
): Effect.Effect<boolean, DatabaseError | SystemError, DatabaseClient> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    for (const dir of dirs) {
      if (yield* copyInto(pathJoin(dir, name), dest)) {
        return true;
      }
    }
    const found = yield* client.findInContainer(CONTAINER_PATHS.dataDir, name);
    return Option.isSome(found) ? yield* copyInto(found.value, dest) : false;
  });

export const stageBinlogs = (
  options: StagingOptions
): Effect.Effect<StagingResult, DatabaseError | SystemError, DatabaseClient | BackupPaths | PitrSettings> =>
  Effect.gen(function* () {
    const client = yield* DatabaseClient;
    const layout = yield* BackupPaths;
    const settings = yield* PitrSettings;

    const logs = yield* client.binaryLogs;
    const closed = Arr.dropRight(logs, 1).map((log) => segmentName(log.segment));
    const present = new Set((yield* listStagedSegments(layout)).map((s) => s.fileName));
    const pending = closed.filter((name) => !present.has(name));

    if (pending.length === 0) {
      yield* Effect.logDebug(`No new binlog segments to stage (${closed.length} closed)`);
      return { staged: [], skipped: [], alreadyStaged: closed.length };
    }

    const dirs = candidateDirectories(yield* client.binlogBasename, settings.backup.binlogSearchPaths);
    yield* ensureDirectory(layout.binlogs);
    if (options.checksums) {
      yield* ensureDirectory(layout.checksums);
    }

    const outcomes = yield* Effect.forEach(pending, (name) =>
      Effect.gen(function* () {
        const dest = pathJoin(layout.binlogs, name);
        const copied = yield* locateAndCopy(name, dirs, dest).pipe(
          Effect.catchAll((e) =>
            Effect.logWarning(`Could not copy ${name}: ${e.message}`).pipe(Effect.as(false))
          )
        );
        if (!copied) {
          yield* Effect.logWarning(`Binlog segment ${name} could not be staged, skipped`);
          return Option.none<string>();
        }
        if (options.checksums) {
          yield* writeChecksum(dest, segmentChecksumPath(layout, name));
        }
        yield* Effect.logDebug(`Staged ${name}`);
        return Option.some(name);
      })
    );

    const staged = Arr.getSomes(outcomes);
    const skipped = pending.filter((name) => !staged.includes(name));
    yield* Effect.logInfo(
      `Staged ${staged.length} binlog segment(s)${skipped.length > 0 ? `, ${skipped.length} skipped` : ""}`
    );
    return { staged, skipped, alreadyStaged: closed.length - pending.length };
  });

/** Runs staging without letting a staging failure fail the caller. */
export const stageBinlogsQuietly = (
  options: StagingOptions
): Effect.Effect<Option.Option<StagingResult>, never, DatabaseClient | BackupPaths | PitrSettings> =>
  pipe(
    stageBinlogs(options),
    Effect.map(Option.some),
    Effect.catchAll((e) =>
      Effect.logWarning(`Binlog staging failed: ${e.message}`).pipe(Effect.as(Option.none()))
    )
  );
