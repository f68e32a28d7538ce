// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Health checks. Each check reports ok, warn or fail; any fail makes the
 * command exit with HEALTH_CHECK_FAILED.
 */

import { Array as Arr, Clock, Effect, Option } from "effect";
import type { HealthStatus } from "../config/field-values";
import { ErrorCode, GeneralError, type SystemError } from "../lib/errors";
import { type BackupTimestamp, timestampToDate } from "../lib/timestamp";
import type { AbsolutePath } from "../lib/types";
import { KEY_FILE_MODE } from "../system/encryption";
import { directoryWritable, statFile } from "../system/fs";
import { artifactsOf, databasesWithFulls, listArtifacts } from "./artifacts";
import { DatabaseClient } from "./client";
import { BackupPaths, PitrSettings } from "./context";

export interface HealthCheck {
  readonly name: string;
  readonly status: HealthStatus;
  readonly detail: string;
}

export interface HealthReport {
  readonly checks: readonly HealthCheck[];
  readonly healthy: boolean;
}

const check = (name: string, status: HealthStatus, detail: string): HealthCheck => ({
  name,
  status,
  detail,
});

const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days between a backup timestamp and `nowMs`. */
export const ageInDays = (timestamp: BackupTimestamp, nowMs: number): number =>
  Math.floor((nowMs - timestampToDate(timestamp).getTime()) / DAY_MS);

const serverChecks: Effect.Effect<readonly HealthCheck[], never, DatabaseClient> = Effect.gen(
  function* () {
    const client = yield* DatabaseClient;
    const reachable = yield* Effect.either(client.ping);
    if (reachable._tag === "Left") {
      return [check("connectivity", "fail", reachable.left.message)];
    }

    const enabled = yield* Effect.either(client.binlogEnabled);
    const binlog =
      enabled._tag === "Left"
        ? check("binary logging", "fail", enabled.left.message)
        : enabled.right
          ? check("binary logging", "ok", "enabled")
          : check("binary logging", "fail", "disabled; point-in-time recovery is not possible");

    const format = yield* Effect.either(client.binlogFormat);
    const formatCheck =
      format._tag === "Left"
        ? check("binlog format", "warn", format.left.message)
        : format.right.toUpperCase() === "ROW"
          ? check("binlog format", "ok", "ROW")
          : check("binlog format", "warn", `${format.right} (ROW recommended)`);

    return [check("connectivity", "ok", "server reachable"), binlog, formatCheck];
  }
);

const directoryCheck = (name: string, path: AbsolutePath): Effect.Effect<HealthCheck> =>
  Effect.map(directoryWritable(path), (ok) =>
    ok ? check(name, "ok", path) : check(name, "fail", `${path} is missing or not writable`)
  );

export const keyFileCheck = (
  keyFile: AbsolutePath,
  minBytes: number
): Effect.Effect<HealthCheck, SystemError> =>
  Effect.map(
    statFile(keyFile),
    Option.match({
      onNone: () => check("encryption key", "fail", `${keyFile} not found`),
      onSome: (info) =>
        info.size < minBytes
          ? check("encryption key", "fail", `${keyFile} is ${info.size} bytes, expected at least ${minBytes}`)
          : info.mode !== KEY_FILE_MODE
            ? check("encryption key", "warn", `${keyFile} has mode ${info.mode.toString(8)}, expected 600`)
            : check("encryption key", "ok", keyFile),
    })
  );

const freshnessChecks = (
  maxAgeDays: number
): Effect.Effect<readonly HealthCheck[], SystemError, BackupPaths> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const now = yield* Clock.currentTimeMillis;
    const artifacts = yield* listArtifacts(layout);
    const databases = databasesWithFulls(artifacts);
    if (databases.length === 0) {
      return [check("backup age", "warn", "no full backups yet")];
    }
    return databases.flatMap((database) =>
      Option.toArray(
        Option.map(Arr.last(artifactsOf(artifacts, database, "full")), (newest) => {
          const age = ageInDays(newest.timestamp, now);
          return age > maxAgeDays
            ? check(`backup age: ${database}`, "fail", `newest full backup is ${age} day(s) old`)
            : check(`backup age: ${database}`, "ok", `newest full backup ${newest.timestamp}`);
        })
      )
    );
  });

export const runHealthChecks = (
  keyFile: AbsolutePath
): Effect.Effect<HealthReport, SystemError, DatabaseClient | BackupPaths | PitrSettings> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const settings = yield* PitrSettings;

    const checks = [
      ...(yield* serverChecks),
      yield* directoryCheck("backup directory", layout.root),
      yield* directoryCheck("binlog directory", layout.binlogs),
      yield* keyFileCheck(keyFile, settings.health.minKeyBytes),
      ...(yield* freshnessChecks(settings.health.maxBackupAgeDays)),
    ];
    return { checks, healthy: checks.every((c) => c.status !== "fail") };
  });

export const healthFailure = (report: HealthReport): Option.Option<GeneralError> => {
  const failed = report.checks.filter((c) => c.status === "fail");
  return failed.length === 0
    ? Option.none()
    : Option.some(
        new GeneralError({
          code: ErrorCode.HEALTH_CHECK_FAILED,
          message: `${failed.length} health check(s) failed: ${failed.map((c) => c.name).join(", ")}`,
        })
      );
};
