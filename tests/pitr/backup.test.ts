// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { BackupMode } from "../../src/config/field-values.ts";
import { ErrorCode } from "../../src/lib/errors.ts";
import { type AbsolutePath, databaseName, pathJoin } from "../../src/lib/types.ts";
import { fileExists, listDirectory, readFile } from "../../src/system/fs.ts";
import {
  type BackupOptions,
  type BackupSummary,
  backupFailure,
  runBackup,
  segmentsBetween,
  userDatabases,
} from "../../src/pitr/backup.ts";
import { segment } from "../../src/pitr/coordinate.ts";
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

let base: AbsolutePath;
let root: AbsolutePath;
let keyFile: AbsolutePath;
let server: FakeDatabaseServer;
let fixture: PitrFixture;

const options = (mode: BackupMode, overrides: Partial<BackupOptions> = {}): BackupOptions => ({
  mode,
  database: Option.none(),
  includeEmpty: false,
  keyFile,
  compress: true,
  checksums: true,
  ...overrides,
});

const backup = (mode: BackupMode, overrides: Partial<BackupOptions> = {}): Promise<BackupSummary> =>
  runPitr(fixture, runBackup(options(mode, overrides)));

const read = (relative: string): Promise<string> => runTest(readFile(pathJoin(root, relative)));

beforeEach(async () => {
  base = await createTempDirectory("backup");
  root = pathJoin(base, "backups");
  keyFile = pathJoin(base, "backup.key");
  server = new FakeDatabaseServer();
  server.databases.set("shop", 3);
  server.setBinlogs(4, 5, 1024);
  fixture = { connection: testConnection(root), client: server.client };
});

afterEach(async () => {
  await removeTempDirectory(base);
});

describe("target helpers", () => {
  test("userDatabases drops system schemas", () => {
    expect(
      userDatabases(["information_schema", "mysql", "performance_schema", "sys", "binlogs", "shop"])
    ).toEqual(["shop"]);
  });

  test("segmentsBetween is inclusive and ordered", () => {
    const logs = [7, 4, 5, 6].map((n) => ({ segment: segment("mysql-bin", n) }));
    expect(
      segmentsBetween(logs, segment("mysql-bin", 5), segment("mysql-bin", 7)).map(
        (l) => l.segment.sequence
      )
    ).toEqual([5, 6, 7]);
  });
});

describe("full backup", () => {
  test("writes the artifact, checksum and coordinate marker", async () => {
    const summary = await backup("full");
    const fileName = `shop_full_${summary.timestamp}.sql.gz.enc`;

    expect(summary.outcomes).toHaveLength(1);
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Succeeded",
      database: "shop",
      artifact: { fileName },
    });
    expect(await runTest(listDirectory(root))).toEqual([fileName]);
    expect(await read(`binlog_info/last_binlog_info_shop_${summary.timestamp}.txt`)).toBe(
      "mysql-bin.000005 1024\n"
    );
    expect(await runTest(fileExists(pathJoin(root, "checksums", `${fileName}.sha256`)))).toBe(true);
    expect(await runTest(fileExists(keyFile))).toBe(true);
    expect(Option.isNone(backupFailure(summary))).toBe(true);
  });

  test("flushes and stages the closed segments", async () => {
    const summary = await backup("full");

    expect(server.flushes).toBe(1);
    expect(server.dumps).toEqual([{ database: "shop", masterData: true }]);
    expect(summary.staging).toEqual(
      Option.some({ staged: ["mysql-bin.000004"], skipped: [], alreadyStaged: 0 })
    );
  });

  test("skips empty databases unless asked", async () => {
    server.databases.set("empty_db", 0);

    const skipped = await backup("full");
    expect(skipped.outcomes.map((o) => o.database)).toEqual(["shop"]);

    const included = await backup("full", { includeEmpty: true });
    expect(included.outcomes.map((o) => o.database)).toEqual(["shop", "empty_db"]);
  });

  test("records unknown when binary logging is off", async () => {
    server.binlogEnabled = false;
    const summary = await backup("full");

    expect(server.flushes).toBe(0);
    expect(Option.isNone(summary.staging)).toBe(true);
    expect(await read(`binlog_info/last_binlog_info_shop_${summary.timestamp}.txt`)).toBe(
      "unknown 0\n"
    );
  });

  test("a failed dump fails only that database", async () => {
    server.databases.set("blog", 2);
    server.failDumps.add("blog");
    const summary = await backup("full");

    expect(server.dumps.filter((d) => d.database === "blog")).toEqual([
      { database: "blog", masterData: true },
      { database: "blog", masterData: false },
    ]);
    expect(summary.outcomes.find((o) => o.database === "blog")).toMatchObject({
      _tag: "Failed",
      code: ErrorCode.DUMP_FAILED,
      message: "mariadb-dump failed for blog",
    });
    expect(summary.outcomes.find((o) => o.database === "shop")?._tag).toBe("Succeeded");
    expect(Option.map(backupFailure(summary), (e) => [e.code, e.message])).toEqual(
      Option.some([ErrorCode.BACKUP_FAILED, "Backup failed for 1 database(s): blog"])
    );
  });

  test("an unknown explicit database aborts the run", async () => {
    const exit = await runPitrExit(
      fixture,
      runBackup(options("full", { database: Option.some(databaseName("ghost")) }))
    );

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      expect(Option.map(Cause.failureOption(exit.cause), (e) => [e.code, e.message])).toEqual(
        Option.some([ErrorCode.DATABASE_NOT_FOUND, "Database 'ghost' does not exist"])
      );
    }
  });

  test("a server without user databases has nothing to back up", async () => {
    server.databases.clear();
    const exit = await runPitrExit(fixture, runBackup(options("full")));

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      expect(Option.map(Cause.failureOption(exit.cause), (e) => e.message)).toEqual(
        Option.some("No databases to back up")
      );
    }
  });
});

describe("incremental backup", () => {
  test("extracts events between the recorded and current coordinates", async () => {
    await backup("full");
    server.setBinlogs(4, 7, 512);
    server.eventDatabases.add("shop");

    const summary = await backup("incremental");
    const fileName = `shop_incremental_${summary.timestamp}.sql.gz.enc`;

    expect(server.extracts).toHaveLength(1);
    expect(server.extracts[0]?.segmentPaths).toEqual([
      "/var/lib/mysql/mysql-bin.000005",
      "/var/lib/mysql/mysql-bin.000006",
      "/var/lib/mysql/mysql-bin.000007",
    ]);
    expect(server.extracts[0]?.range).toEqual({
      database: "shop",
      startPosition: Option.some(1024),
      stopPosition: Option.some(512),
      stopDatetime: Option.none(),
    });
    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Succeeded",
      artifact: { fileName },
    });
    expect(await read(`incr/last_binlog_info_shop_${summary.timestamp}_incr.txt`)).toBe(
      "mysql-bin.000007 512\n"
    );
    expect(await runTest(listDirectory(root))).toContain(fileName);
    expect(summary.staging).toEqual(
      Option.some({
        staged: ["mysql-bin.000005", "mysql-bin.000006"],
        skipped: [],
        alreadyStaged: 1,
      })
    );
  });

  test("skips when the coordinate has not moved", async () => {
    await backup("full");
    const summary = await backup("incremental");

    expect(summary.outcomes[0]).toMatchObject({ _tag: "Skipped", reason: "no new events" });
    expect(server.extracts).toHaveLength(0);
  });

  test("skips without advancing the marker when the range has no events", async () => {
    await backup("full");
    server.setBinlogs(4, 6, 200);
    const summary = await backup("incremental");

    expect(server.extracts).toHaveLength(1);
    expect(server.extracts[0]?.segmentPaths).toEqual([
      "/var/lib/mysql/mysql-bin.000005",
      "/var/lib/mysql/mysql-bin.000006",
    ]);
    expect(summary.outcomes[0]).toMatchObject({ _tag: "Skipped", reason: "no new events" });
    expect(await runTest(listDirectory(pathJoin(root, "incr")))).toEqual([]);
    expect((await runTest(listDirectory(root))).some((f) => f.includes("_incremental_"))).toBe(
      false
    );
  });

  test("fails a database that has never had a full backup", async () => {
    const summary = await backup("incremental");

    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      code: ErrorCode.MARKER_NOT_FOUND,
      message: "No binlog coordinate recorded for shop; run a full backup first",
    });
    expect(Option.map(backupFailure(summary), (e) => e.message)).toEqual(
      Option.some("Backup failed for 1 database(s): shop")
    );
  });

  test("fails when the recorded segment has been purged", async () => {
    await backup("full");
    server.setBinlogs(6, 7, 64);
    const summary = await backup("incremental");

    expect(summary.outcomes[0]).toMatchObject({
      _tag: "Failed",
      code: ErrorCode.BINLOG_COPY_FAILED,
      message: "Start segment mysql-bin.000005 is no longer on the server",
    });
  });
});
