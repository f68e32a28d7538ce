// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * File-based locking for critical sections.
 * Uses O_EXCL (via writeFileExclusive) for atomic lock acquisition.
 */

import { Data, Duration, Effect, Option, Schedule, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin, pathWithSuffix } from "../lib/types";
import {
  deleteFile,
  ensureDirectory,
  readFileOption,
  renameFile,
  writeFile,
  writeFileExclusive,
} from "./fs";

export interface LockOptions {
  readonly lockDir: AbsolutePath;
  readonly maxWaitMs?: number;
  readonly retryIntervalMs?: number;
  /** Locks older than this are taken over even if their owner is alive. */
  readonly staleAfterMs?: number;
}

const DEFAULT_MAX_WAIT_MS = 5000;
const DEFAULT_RETRY_INTERVAL_MS = 100;
const DEFAULT_STALE_AFTER_MS = 6 * 60 * 60 * 1000;

/** Internal retry signal; never escapes withLock. */
class LockBusy extends Data.TaggedError("LockBusy")<object> {}

const isValidResourceName = (name: string): boolean =>
  name.length > 0 &&
  !(name.includes("/") || name.includes("\\") || name.includes("..") || name.includes("\x00"));

interface LockInfo {
  readonly pid: number;
  readonly timestamp: number;
}

/** None for unreadable content, which counts as stale. */
export const parseLockContent = (content: string): Option.Option<LockInfo> => {
  const lines = content.trim().split("\n");
  const pid = Number.parseInt(lines[0] ?? "", 10);
  const timestamp = Number.parseInt(lines[1] ?? "", 10);
  return Number.isNaN(pid) || Number.isNaN(timestamp) ? Option.none() : Option.some({ pid, timestamp });
};

const lockContent = (): string => `${process.pid}\n${Date.now()}\n`;

/** Signal 0 only probes. EPERM means the process exists under another user. */
const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return typeof e === "object" && e !== null && "code" in e && e.code === "EPERM";
  }
};

const isInfoStale =
  (staleAfterMs: number) =>
  (info: LockInfo): boolean =>
    Date.now() - info.timestamp > staleAfterMs || !isProcessAlive(info.pid);

const isContentStale = (content: Option.Option<string>, staleAfterMs: number): boolean =>
  pipe(
    content,
    Option.flatMap(parseLockContent),
    Option.map(isInfoStale(staleAfterMs)),
    Option.getOrElse(() => true)
  );

/**
 * Write our PID to a temp file, re-check that the lock is still stale,
 * then rename over it. `false` means the lock changed underneath us.
 */
const takeoverStaleLock = (
  lockPath: AbsolutePath,
  staleAfterMs: number
): Effect.Effect<boolean, SystemError> => {
  const tempPath = pathWithSuffix(lockPath, `.${process.pid}.tmp`);
  const cleanup = deleteFile(tempPath).pipe(Effect.ignore);

  return Effect.gen(function* () {
    yield* writeFile(tempPath, lockContent());
    const current = yield* readFileOption(lockPath);
    if (Option.isNone(current) || !isContentStale(current, staleAfterMs)) {
      yield* cleanup;
      return false;
    }
    return yield* renameFile(tempPath, lockPath).pipe(
      Effect.as(true),
      Effect.catchAll(() => cleanup.pipe(Effect.as(false)))
    );
  });
};

const tryAcquireLock = (
  lockPath: AbsolutePath,
  staleAfterMs: number
): Effect.Effect<void, SystemError | LockBusy> =>
  Effect.gen(function* () {
    if (yield* writeFileExclusive(lockPath, lockContent())) {
      return;
    }
    const current = yield* readFileOption(lockPath);
    if (isContentStale(current, staleAfterMs)) {
      const took = yield* takeoverStaleLock(lockPath, staleAfterMs);
      if (took) {
        yield* Effect.logDebug(`Took over stale lock ${lockPath}`);
        return;
      }
    }
    return yield* Effect.fail(new LockBusy());
  });

export const lockFilePath = (lockDir: AbsolutePath, resourceName: string): AbsolutePath =>
  pathJoin(lockDir, `${resourceName}.lock`);

/**
 * Run `effect` while holding an exclusive lock on `resourceName`.
 * Acquisition polls until `maxWaitMs`; the lock is released on success,
 * failure and interruption.
 */
export const withLock = <A, E, R>(
  resourceName: string,
  effect: Effect.Effect<A, E, R>,
  options: LockOptions
): Effect.Effect<A, E | GeneralError | SystemError, R> => {
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  const staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;

  if (!isValidResourceName(resourceName)) {
    return Effect.fail(
      new GeneralError({
        code: ErrorCode.INVALID_ARGS,
        message: `Invalid lock resource name: ${resourceName}. Must not contain path separators or traversal sequences.`,
      })
    );
  }

  const lockPath = lockFilePath(options.lockDir, resourceName);
  const attempts = Math.max(0, Math.ceil(maxWaitMs / retryIntervalMs));

  const acquire = pipe(
    ensureDirectory(options.lockDir),
    Effect.zipRight(tryAcquireLock(lockPath, staleAfterMs)),
    Effect.retry({
      schedule: Schedule.spaced(Duration.millis(retryIntervalMs)),
      times: attempts,
      while: (e) => e._tag === "LockBusy",
    }),
    Effect.catchTag("LockBusy", () =>
      Effect.fail(
        new GeneralError({
          code: ErrorCode.LOCK_BUSY,
          message: `Timeout acquiring lock '${resourceName}' after ${maxWaitMs}ms. Another backup, restore or cleanup may be running.`,
        })
      )
    )
  );

  return Effect.acquireUseRelease(
    acquire,
    () => effect,
    () => deleteFile(lockPath).pipe(Effect.ignore)
  );
};
