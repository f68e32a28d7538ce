// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { type BackupTimestamp, parseBackupTimestamp } from "../../src/lib/timestamp.ts";
import { databaseName, path } from "../../src/lib/types.ts";
import { DatabaseOutcome } from "../../src/pitr/backup.ts";
import { coordinate, segment } from "../../src/pitr/coordinate.ts";
import { RestoreOutcome } from "../../src/pitr/restore.ts";
import { backupSummaryJson, renderBackupSummary } from "../../src/cli/commands/backup.ts";
import { renderCleanupReport } from "../../src/cli/commands/cleanup.ts";
import { renderHealthReport } from "../../src/cli/commands/health.ts";
import { listingJson, renderListing } from "../../src/cli/commands/list.ts";
import { renderRestoreSummary } from "../../src/cli/commands/restore.ts";

const ts = (s: string): BackupTimestamp => Option.getOrThrow(parseBackupTimestamp(s));
const FULL = "shop_full_2024-01-15_10-30-00.sql.gz.enc";

const backupSummary = {
  mode: "full" as const,
  timestamp: ts("2024-01-15_10-30-00"),
  outcomes: [
    DatabaseOutcome.Succeeded({
      database: databaseName("shop"),
      artifact: {
        fileName: FULL,
        path: path(`/backups/${FULL}`),
        size: 1536,
        coordinate: Option.some(coordinate(segment("mysql-bin", 5), 1024)),
      },
    }),
    DatabaseOutcome.Skipped({ database: databaseName("blog"), reason: "no new events" }),
    DatabaseOutcome.Failed({ database: databaseName("logs"), code: 32, message: "boom" }),
  ],
  staging: Option.some({ staged: ["mysql-bin.000004"], skipped: [], alreadyStaged: 2 }),
  durationMs: 1500,
};

describe("backup output", () => {
  test("renders one line per database plus staging", () => {
    expect(renderBackupSummary(backupSummary)).toEqual([
      "full backup 2024-01-15_10-30-00 finished in 1.5s",
      `  ✓ shop: ${FULL} (1.50 KB)`,
      "  - blog: skipped, no new events",
      "  ✗ logs: boom",
      "  binlogs: 1 staged, 0 skipped, 2 already staged",
    ]);
  });

  test("json replaces Options with plain values", () => {
    expect(backupSummaryJson({ ...backupSummary, staging: Option.none() })).toEqual({
      mode: "full",
      timestamp: "2024-01-15_10-30-00",
      durationMs: 1500,
      databases: [
        {
          database: "shop",
          status: "succeeded",
          file: FULL,
          size: 1536,
          coordinate: "mysql-bin.000005 1024",
        },
        { database: "blog", status: "skipped", reason: "no new events" },
        { database: "logs", status: "failed", code: 32, message: "boom" },
      ],
      binlogs: null,
    });
  });
});

test("restore output counts applied and failed segments", () => {
  expect(
    renderRestoreSummary({
      toTimestamp: Option.some(ts("2024-01-15_12-00-00")),
      durationMs: 500,
      outcomes: [
        RestoreOutcome.Restored({
          database: databaseName("shop"),
          artifact: FULL,
          artifactBytes: 512,
          replay: { applied: 2, failed: 1, skipped: 0, bytes: 100 },
        }),
        RestoreOutcome.Failed({ database: databaseName("blog"), code: 42, message: "bad checksum" }),
      ],
    })
  ).toEqual([
    "Restore to 2024-01-15_12-00-00 finished in 500ms",
    `  ✓ shop: ${FULL} (512 B), 2 binlog(s) applied, 1 failed`,
    "  ✗ blog: bad checksum",
  ]);
});

test("cleanup output names the verb for dry runs", () => {
  expect(
    renderCleanupReport({
      dryRun: true,
      removed: [{ path: path("/backups/old.enc"), size: 2048 }],
      freedBytes: 2048,
    })
  ).toEqual(["  /backups/old.enc (2.00 KB)", "Would delete 1 file(s), 2.00 KB"]);
});

describe("list output", () => {
  test("an empty listing says so", () => {
    expect(renderListing({ databases: [], segments: [] })).toEqual(["No backups found"]);
  });

  const listing = {
    databases: [
      {
        database: databaseName("shop"),
        generations: [
          {
            mode: "full" as const,
            timestamp: ts("2024-01-15_10-30-00"),
            fileName: FULL,
            size: 1536,
            coordinate: Option.some("mysql-bin.000005 1024"),
            checksum: true,
          },
          {
            mode: "incremental" as const,
            timestamp: ts("2024-01-15_12-00-00"),
            fileName: "shop_incremental_2024-01-15_12-00-00.sql.gz.enc",
            size: 512,
            coordinate: Option.none(),
            checksum: false,
          },
        ],
      },
    ],
    segments: [{ name: "mysql-bin.000004", size: 1024 }],
  };

  test("renders a table per database", () => {
    expect(renderListing(listing)).toEqual([
      "shop:",
      "  full         2024-01-15_10-30-00  1.50 KB  mysql-bin.000005 1024  sha256",
      "  incremental  2024-01-15_12-00-00  512 B    -",
      "binlogs: 1 staged segment(s), 1.00 KB",
    ]);
  });

  test("json uses null for a missing coordinate", () => {
    expect(listingJson(listing)).toEqual({
      databases: [
        {
          database: "shop",
          generations: [
            { ...listing.databases[0]?.generations[0], coordinate: "mysql-bin.000005 1024" },
            { ...listing.databases[0]?.generations[1], coordinate: null },
          ],
        },
      ],
      segments: [{ name: "mysql-bin.000004", size: 1024 }],
    });
  });
});

test("health output marks each check and ends with the verdict", () => {
  expect(
    renderHealthReport({
      checks: [
        { name: "connectivity", status: "ok", detail: "server reachable" },
        { name: "encryption key", status: "fail", detail: "/k not found" },
      ],
      healthy: false,
    })
  ).toEqual(["✓  connectivity    server reachable", "✗  encryption key  /k not found", "Unhealthy"]);
});
