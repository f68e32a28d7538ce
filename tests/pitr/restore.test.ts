// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { appendFile, rm } from "node:fs/promises";
import { Cause, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { ReplayMode } from "../../src/config/field-values.ts";
import { ErrorCode } from "../../src/lib/errors.ts";
import { type BackupTimestamp, parseBackupTimestamp } from "../../src/lib/timestamp.ts";
import { type AbsolutePath, databaseName, path, pathJoin } from "../../src/lib/types.ts";
import { listDirectory } from "../../src/system/fs.ts";
import { type BackupOptions, runBackup } from "../../src/pitr/backup.ts";
import type { StagedSegment } from "../../src/pitr/artifacts.ts";
import { coordinate, segment, segmentName } from "../../src/pitr/coordinate.ts";
import {
  type RestoreOptions,
  type RestoreSummary,
  RestoreTarget,
  databaseFromBackupFile,
  planReplay,
  restoreFailure,
  runRestore,
} from "../../src/pitr/restore.ts";
import { FakeDatabaseServer } from "../helpers/fake-client.ts";
import {
  type PitrFixture,
  createTempDirectory,
  removeTempDirectory,
  runPitr,
  runPitrExit,
  runTest,
  testConnection,
} from "../helpers/layers.ts";

const ts = (s: string): BackupTimestamp => Option.getOrThrow(parseBackupTimestamp(s));
const shop = databaseName("shop");

const staged = (...sequences: number[]): StagedSegment[] =>
  sequences.map((n) => {
    const seg = segment("mysql-bin", n);
    return {
      segment: seg,
      fileName: segmentName(seg),
      path: pathJoin(path("/backups/binlogs"), segmentName(seg)),
      size: 100,
    };
  });

describe("planReplay", () => {
  const base = {
    database: shop,
    backupTimestamp: ts("2024-01-15_10-00-00"),
    marker: coordinate(segment("mysql-bin", 5), 1024),
    staged: staged(3, 4, 5, 6, 7),
    endBound: Option.none(),
    toTimestamp: Option.none(),
  };

  test("starts at the marker position and replays every later segment", () => {
    const plan = planReplay(base);

    expect(plan.skipped).toBe(0);
    expect(plan.steps.map((s) => s.segment.fileName)).toEqual([
      "mysql-bin.000005",
      "mysql-bin.000006",
      "mysql-bin.000007",
    ]);
    expect(plan.steps.map((s) => s.range.startPosition)).toEqual([
      Option.some(1024),
      Option.none(),
      Option.none(),
    ]);
    expect(plan.steps.every((s) => Option.isNone(s.range.stopPosition))).toBe(true);
  });

  test("stops at the next full generation's coordinate", () => {
    const plan = planReplay({
      ...base,
      endBound: Option.some(coordinate(segment("mysql-bin", 6), 300)),
    });

    expect(plan.steps.map((s) => s.segment.fileName)).toEqual([
      "mysql-bin.000005",
      "mysql-bin.000006",
    ]);
    expect(plan.steps.map((s) => s.range.stopPosition)).toEqual([Option.none(), Option.some(300)]);
    expect(plan.skipped).toBe(1);
  });

  test("passes the target time to every step", () => {
    const plan = planReplay({ ...base, toTimestamp: Option.some(ts("2024-01-15_12-30-00")) });

    expect(plan.steps.map((s) => s.range.stopDatetime)).toEqual([
      Option.some("2024-01-15 12:30:00"),
      Option.some("2024-01-15 12:30:00"),
      Option.some("2024-01-15 12:30:00"),
    ]);
  });

  test("a target earlier than the backup replays nothing", () => {
    const plan = planReplay({ ...base, toTimestamp: Option.some(ts("2024-01-15_09-00-00")) });

    expect(plan).toEqual({ steps: [], skipped: 3 });
  });

  test("ignores segments of another base name", () => {
    const other = segment("other-bin", 9);
    const plan = planReplay({
      ...base,
      staged: [
        ...staged(5),
        { segment: other, fileName: segmentName(other), path: path("/x/other-bin.000009"), size: 1 },
      ],
    });

    expect(plan.steps.map((s) => s.segment.fileName)).toEqual(["mysql-bin.000005"]);
  });
});

test("databaseFromBackupFile reads the database from the file name", () => {
  expect(databaseFromBackupFile(path("/b/shop_full_2024-01-15_10-30-00.sql.gz.enc"))).toEqual(
    Option.some("shop")
  );
  expect(Option.isNone(databaseFromBackupFile(path("/b/notes.txt")))).toBe(true);
});

describe("runRestore", () => {
  let dir: AbsolutePath;
  let root: AbsolutePath;
  let keyFile: AbsolutePath;
  let server: FakeDatabaseServer;
  let fixture: PitrFixture;
  let fullName: string;

  const backupOptions = (mode: BackupOptions["mode"]): BackupOptions => ({
    mode,
    database: Option.none(),
    includeEmpty: false,
    keyFile,
    compress: true,
    checksums: true,
  });

  const restoreOptions = (overrides: Partial<RestoreOptions> = {}): RestoreOptions => ({
    target: RestoreTarget.Database({ database: shop }),
    backupFile: Option.none(),
    toTimestamp: Option.none(),
    fullOnly: false,
    replayMode: "lenient",
    keyFile,
    ...overrides,
  });

  const restore = (overrides: Partial<RestoreOptions> = {}): Promise<RestoreSummary> =>
    runPitr(fixture, runRestore(restoreOptions(overrides)));

  const withReplayMode = (replayMode: ReplayMode): Promise<RestoreSummary> => restore({ replayMode });

  beforeEach(async () => {
    dir = await createTempDirectory("restore");
    root = pathJoin(dir, "backups");
    keyFile = pathJoin(dir, "backup.key");
    server = new FakeDatabaseServer();
    server.databases.set("shop", 3);
    server.eventDatabases.add("shop");
    server.setBinlogs(4, 5, 1024);
    fixture = { connection: testConnection(root), client: server.client };

    const full = await runPitr(fixture, runBackup(backupOptions("full")));
    fullName = `shop_full_${full.timestamp}.sql.gz.enc`;
    server.setBinlogs(4, 7, 512);
    await runPitr(fixture, runBackup(backupOptions("incremental")));
  });

  afterEach(async () => {
    await removeTempDirectory(dir);
  });

  test("imports the dump and replays staged segments from the marker", async () => {
    const summary = await restore();

    expect(server.created).toEqual(["shop"]);
    expect(server.imports).toEqual([
      {
        database: "shop",
        content: [
          "-- MariaDB dump of shop",
          "-- CHANGE MASTER TO MASTER_LOG_FILE='mysql-bin.000005', MASTER_LOG_POS=1024;",
          "CREATE TABLE orders (id INT);",
          "",
        ].join("\n"),
      },
    ]);
    expect(server.replays.map((r) => [r.file, r.range.startPosition])).toEqual([
      [pathJoin(root, "binlogs", "mysql-bin.000005"), Option.some(1024)],
      [pathJoin(root, "binlogs", "mysql-bin.000006"), Option.none()],
    ]);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Restored",
      database: "shop",
      artifact: fullName,
      replay: { applied: 2, failed: 0, skipped: 0, bytes: 48 },
    });
    expect(Option.isNone(restoreFailure(summary))).toBe(true);
  });

  test("leaves no decrypted files behind", async () => {
    await restore();

    expect((await runTest(listDirectory(root))).every((f) => f.endsWith(".enc"))).toBe(true);
  });

  test("a target before the backup restores the full backup only", async () => {
    const summary = await restore({ toTimestamp: Option.some(ts("2000-01-01_00-00-00")) });

    expect(server.imports).toHaveLength(1);
    expect(server.replays).toHaveLength(0);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Restored",
      replay: { applied: 0, failed: 0, skipped: 2, bytes: 0 },
    });
  });

  test("a later target bounds every replayed segment by time", async () => {
    await restore({ toTimestamp: Option.some(ts("2999-01-01_00-00-00")) });

    expect(server.replays.map((r) => r.range.stopDatetime)).toEqual([
      Option.some("2999-01-01 00:00:00"),
      Option.some("2999-01-01 00:00:00"),
    ]);
  });

  test("full-only skips binlog replay", async () => {
    const summary = await restore({ fullOnly: true });

    expect(server.replays).toHaveLength(0);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Restored",
      replay: { applied: 0, failed: 0, skipped: 0, bytes: 0 },
    });
  });

  test("a corrupted artifact is never imported", async () => {
    await appendFile(pathJoin(root, fullName), "corruption");
    const summary = await restore();

    expect(server.created).toEqual([]);
    expect(server.imports).toEqual([]);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      database: "shop",
      code: ErrorCode.CHECKSUM_MISMATCH,
    });
    expect(Option.map(restoreFailure(summary), (e) => [e.code, e.message])).toEqual(
      Option.some([ErrorCode.RESTORE_FAILED, "Restore failed for 1 database(s): shop"])
    );
  });

  test("a corrupted staged segment fails the database before any replay", async () => {
    const segmentPath = pathJoin(root, "binlogs", "mysql-bin.000005");
    await appendFile(segmentPath, "corruption");
    const summary = await restore();

    expect(server.imports).toHaveLength(1);
    expect(server.replays).toEqual([]);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      database: "shop",
      code: ErrorCode.CHECKSUM_MISMATCH,
    });
    const [outcome] = summary.outcomes;
    expect(outcome?._tag === "Failed" ? outcome.message : "").toMatch(
      /^Checksum mismatch for .*mysql-bin\.000005: expected [0-9a-f]{64}, got [0-9a-f]{64}$/
    );
  });

  test("a staged segment without a checksum is still replayed", async () => {
    await rm(pathJoin(root, "checksums", "mysql-bin.000006.sha256"));
    const summary = await restore();

    expect(server.replays).toHaveLength(2);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Restored",
      replay: { applied: 2, failed: 0 },
    });
  });

  test("lenient replay counts a failed segment and carries on", async () => {
    server.failReplays.add("mysql-bin.000005");
    const summary = await withReplayMode("lenient");

    expect(server.replays).toHaveLength(2);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Restored",
      replay: { applied: 1, failed: 1, skipped: 0, bytes: 48 },
    });
  });

  test("strict replay fails the database on the first failed segment", async () => {
    server.failReplays.add("mysql-bin.000005");
    const summary = await withReplayMode("strict");

    expect(server.replays).toHaveLength(1);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      code: ErrorCode.BINLOG_REPLAY_FAILED,
      message: "Replay of mysql-bin.000005 failed: mariadb-binlog failed on mysql-bin.000005",
    });
  });

  test("rejects an explicit file that is not a full backup of the database", async () => {
    const incremental = (await runTest(listDirectory(root))).find((f) => f.includes("_incremental_"));
    const file = pathJoin(root, incremental ?? "missing");
    const summary = await restore({ backupFile: Option.some(file) });

    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      code: ErrorCode.BACKUP_NOT_FOUND,
      message: `${file} is not a full backup of shop`,
    });
  });

  test("restoring every database with no backups fails", async () => {
    await removeTempDirectory(root);
    const exit = await runPitrExit(fixture, runRestore(restoreOptions({ target: RestoreTarget.All() })));

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      expect(Option.map(Cause.failureOption(exit.cause), (e) => e.message)).toEqual(
        Option.some("No full backups found")
      );
    }
  });
});
