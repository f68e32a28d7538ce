// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors.ts";
import {
  type BackupTimestamp,
  formatBackupTimestamp,
  parseBackupTimestamp,
  timestampToDate,
} from "../../src/lib/timestamp.ts";
import { type AbsolutePath, pathJoin } from "../../src/lib/types.ts";
import { loadOrCreateKey } from "../../src/system/encryption.ts";
import { chmod, ensureDirectory, writeFile } from "../../src/system/fs.ts";
import {
  type HealthReport,
  ageInDays,
  healthFailure,
  keyFileCheck,
  runHealthChecks,
} from "../../src/pitr/health.ts";
import { FakeDatabaseServer } from "../helpers/fake-client.ts";
import {
  type PitrFixture,
  createTempDirectory,
  removeTempDirectory,
  runPitr,
  runTest,
  testConnection,
} from "../helpers/layers.ts";

const ts = (s: string): BackupTimestamp => Option.getOrThrow(parseBackupTimestamp(s));

let dir: AbsolutePath;
let root: AbsolutePath;
let keyFile: AbsolutePath;
let server: FakeDatabaseServer;
let fixture: PitrFixture;

const detail = (report: HealthReport, name: string): string | undefined =>
  report.checks.find((c) => c.name === name)?.detail;

const status = (report: HealthReport, name: string): string | undefined =>
  report.checks.find((c) => c.name === name)?.status;

beforeEach(async () => {
  dir = await createTempDirectory("health");
  root = pathJoin(dir, "backups");
  keyFile = pathJoin(dir, "backup.key");
  await runTest(ensureDirectory(pathJoin(root, "binlogs")));
  await runTest(loadOrCreateKey(keyFile));
  server = new FakeDatabaseServer();
  server.setBinlogs(1, 2, 4);
  fixture = { connection: testConnection(root), client: server.client };
});

afterEach(async () => {
  await removeTempDirectory(dir);
});

describe("runHealthChecks", () => {
  test("reports every check in order for a healthy setup", async () => {
    const now = formatBackupTimestamp(new Date());
    await runTest(writeFile(pathJoin(root, `shop_full_${now}.sql.gz.enc`), "x"));
    const report = await runPitr(fixture, runHealthChecks(keyFile));

    expect(report.checks).toEqual([
      { name: "connectivity", status: "ok", detail: "server reachable" },
      { name: "binary logging", status: "ok", detail: "enabled" },
      { name: "binlog format", status: "ok", detail: "ROW" },
      { name: "backup directory", status: "ok", detail: root },
      { name: "binlog directory", status: "ok", detail: pathJoin(root, "binlogs") },
      { name: "encryption key", status: "ok", detail: keyFile },
      { name: "backup age: shop", status: "ok", detail: `newest full backup ${now}` },
    ]);
    expect(report.healthy).toBe(true);
    expect(Option.isNone(healthFailure(report))).toBe(true);
  });

  test("an unreachable server fails connectivity and skips server checks", async () => {
    server.reachable = false;
    const report = await runPitr(fixture, runHealthChecks(keyFile));

    expect(report.checks[0]).toEqual({
      name: "connectivity",
      status: "fail",
      detail: "Cannot connect to MariaDB",
    });
    expect(status(report, "binary logging")).toBeUndefined();
    expect(detail(report, "backup age")).toBe("no full backups yet");
    expect(Option.map(healthFailure(report), (e) => [e.code, e.message])).toEqual(
      Option.some([ErrorCode.HEALTH_CHECK_FAILED, "1 health check(s) failed: connectivity"])
    );
  });

  test("disabled binary logging fails and a statement format warns", async () => {
    server.binlogEnabled = false;
    server.binlogFormat = "STATEMENT";
    const report = await runPitr(fixture, runHealthChecks(keyFile));

    expect(status(report, "binary logging")).toBe("fail");
    expect(report.checks.find((c) => c.name === "binlog format")).toEqual({
      name: "binlog format",
      status: "warn",
      detail: "STATEMENT (ROW recommended)",
    });
    expect(report.healthy).toBe(false);
  });

  test("a stale newest full backup fails", async () => {
    await runTest(writeFile(pathJoin(root, "shop_full_2020-01-01_00-00-00.sql.gz.enc"), "x"));
    const report = await runPitr(fixture, runHealthChecks(keyFile));

    expect(status(report, "backup age: shop")).toBe("fail");
    expect(detail(report, "backup age: shop")).toMatch(/^newest full backup is \d+ day\(s\) old$/);
  });

  test("a missing binlog directory fails", async () => {
    await removeTempDirectory(pathJoin(root, "binlogs"));
    const report = await runPitr(fixture, runHealthChecks(keyFile));

    expect(detail(report, "binlog directory")).toBe(
      `${pathJoin(root, "binlogs")} is missing or not writable`
    );
  });
});

describe("keyFileCheck", () => {
  test("a missing key fails", async () => {
    const missing = pathJoin(dir, "none.key");
    expect(await runTest(keyFileCheck(missing, 20))).toEqual({
      name: "encryption key",
      status: "fail",
      detail: `${missing} not found`,
    });
  });

  test("a short key fails", async () => {
    const short = pathJoin(dir, "short.key");
    await runTest(writeFile(short, "short"));
    await runTest(chmod(short, 0o600));
    expect((await runTest(keyFileCheck(short, 20))).detail).toBe(
      `${short} is 5 bytes, expected at least 20`
    );
  });

  test("a readable-by-others key warns", async () => {
    await runTest(chmod(keyFile, 0o644));
    expect(await runTest(keyFileCheck(keyFile, 20))).toEqual({
      name: "encryption key",
      status: "warn",
      detail: `${keyFile} has mode 644, expected 600`,
    });
  });
});

test("ageInDays counts whole days", () => {
  const now = timestampToDate(ts("2024-01-17_12-00-00")).getTime();
  expect(ageInDays(ts("2024-01-10_00-00-00"), now)).toBe(7);
  expect(ageInDays(ts("2024-01-17_00-00-00"), now)).toBe(0);
});
