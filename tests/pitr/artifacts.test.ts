// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { backupLayout, layoutDirectories } from "../../src/lib/paths.ts";
import { type BackupTimestamp, parseBackupTimestamp } from "../../src/lib/timestamp.ts";
import { type AbsolutePath, databaseName, path, pathJoin } from "../../src/lib/types.ts";
import { ensureDirectory, writeFile } from "../../src/system/fs.ts";
import {
  artifactFileName,
  databasesWithFulls,
  fullMarkerPath,
  generationCoordinate,
  incrementalMarkerPath,
  listArtifacts,
  listMarkers,
  listStagedSegments,
  newestMarker,
  parseArtifactName,
  parseMarkerName,
} from "../../src/pitr/artifacts.ts";
import { coordinate, segment } from "../../src/pitr/coordinate.ts";
import { createTempDirectory, removeTempDirectory, runTest } from "../helpers/layers.ts";

const ts = (s: string): BackupTimestamp => Option.getOrThrow(parseBackupTimestamp(s));
const shop = databaseName("shop");

let root: AbsolutePath;

describe("artifact names", () => {
  test("artifactFileName", () => {
    const id = { database: shop, mode: "full" as const, timestamp: ts("2024-01-15_10-30-00") };
    expect(artifactFileName(id, true)).toBe("shop_full_2024-01-15_10-30-00.sql.gz.enc");
    expect(artifactFileName({ ...id, mode: "incremental" }, false)).toBe(
      "shop_incremental_2024-01-15_10-30-00.sql.enc"
    );
  });

  test("parseArtifactName reads every field", () => {
    expect(parseArtifactName(path("/b"), "my_shop_full_2024-01-15_10-30-00.sql.gz.enc")).toEqual(
      Option.some({
        database: "my_shop",
        mode: "full",
        timestamp: "2024-01-15_10-30-00",
        fileName: "my_shop_full_2024-01-15_10-30-00.sql.gz.enc",
        path: "/b/my_shop_full_2024-01-15_10-30-00.sql.gz.enc",
        compressed: true,
      })
    );
  });

  test("parseArtifactName ignores other files", () => {
    expect(Option.isNone(parseArtifactName(path("/b"), "shop_full_2024-01-15_10-30-00.sql"))).toBe(true);
    expect(Option.isNone(parseArtifactName(path("/b"), "shop_weekly_2024-01-15_10-30-00.sql.enc"))).toBe(
      true
    );
    expect(Option.isNone(parseArtifactName(path("/b"), "shop_full_2024-13-15_10-30-00.sql.enc"))).toBe(
      true
    );
  });

  test("parseMarkerName distinguishes full and incremental markers", () => {
    expect(
      Option.map(parseMarkerName(path("/b/incr"), "last_binlog_info_shop_2024-01-15_10-30-00_incr.txt"), (m) => [
        m.database,
        m.mode,
        m.timestamp,
      ])
    ).toEqual(Option.some(["shop", "incremental", "2024-01-15_10-30-00"]));
    expect(
      Option.map(parseMarkerName(path("/b/binlog_info"), "last_binlog_info_shop_2024-01-15_10-30-00.txt"), (m) => m.mode)
    ).toEqual(Option.some("full"));
  });
});

describe("backup directory listings", () => {
  beforeEach(async () => {
    root = await createTempDirectory("artifacts");
  });

  afterEach(async () => {
    await removeTempDirectory(root);
  });

  const prepare = async (files: readonly [string, string][]): Promise<void> => {
    const layout = backupLayout(root);
    for (const dir of layoutDirectories(layout)) {
      await runTest(ensureDirectory(dir));
    }
    for (const [name, content] of files) {
      await runTest(writeFile(pathJoin(root, name), content));
    }
  };

  test("listArtifacts sorts oldest first and skips strays", async () => {
    await prepare([
      ["shop_full_2024-01-16_00-00-00.sql.gz.enc", ""],
      ["blog_full_2024-01-15_00-00-00.sql.gz.enc", ""],
      ["shop_incremental_2024-01-16_06-00-00.sql.gz.enc", ""],
      ["README.txt", ""],
    ]);
    const artifacts = await runTest(listArtifacts(backupLayout(root)));
    expect(artifacts.map((a) => a.fileName)).toEqual([
      "blog_full_2024-01-15_00-00-00.sql.gz.enc",
      "shop_full_2024-01-16_00-00-00.sql.gz.enc",
      "shop_incremental_2024-01-16_06-00-00.sql.gz.enc",
    ]);
    expect(databasesWithFulls(artifacts)).toEqual(["blog", "shop"]);
  });

  test("newestMarker looks across full and incremental markers", async () => {
    await prepare([
      ["binlog_info/last_binlog_info_shop_2024-01-15_00-00-00.txt", "mysql-bin.000005 1024\n"],
      ["incr/last_binlog_info_shop_2024-01-15_06-00-00_incr.txt", "mysql-bin.000007 512\n"],
      ["incr/last_binlog_info_blog_2024-01-16_06-00-00_incr.txt", "mysql-bin.000009 4\n"],
    ]);
    const layout = backupLayout(root);
    const newest = await runTest(newestMarker(layout, shop));
    expect(Option.flatMap(newest, (m) => m.coordinate)).toEqual(
      Option.some(coordinate(segment("mysql-bin", 7), 512))
    );
    expect((await runTest(listMarkers(layout))).map((m) => m.timestamp)).toEqual([
      "2024-01-15_00-00-00",
      "2024-01-15_06-00-00",
      "2024-01-16_06-00-00",
    ]);
  });

  test("generationCoordinate prefers the full marker and treats unknown as none", async () => {
    await prepare([
      ["binlog_info/last_binlog_info_shop_2024-01-15_00-00-00.txt", "unknown 0\n"],
      ["incr/last_binlog_info_shop_2024-01-15_06-00-00_incr.txt", "mysql-bin.000007 512\n"],
    ]);
    const layout = backupLayout(root);
    expect(
      Option.isNone(await runTest(generationCoordinate(layout, shop, ts("2024-01-15_00-00-00"))))
    ).toBe(true);
    expect(await runTest(generationCoordinate(layout, shop, ts("2024-01-15_06-00-00")))).toEqual(
      Option.some(coordinate(segment("mysql-bin", 7), 512))
    );
    expect(fullMarkerPath(layout, shop, ts("2024-01-15_00-00-00"))).toBe(
      `${root}/binlog_info/last_binlog_info_shop_2024-01-15_00-00-00.txt`
    );
    expect(incrementalMarkerPath(layout, shop, ts("2024-01-15_06-00-00"))).toBe(
      `${root}/incr/last_binlog_info_shop_2024-01-15_06-00-00_incr.txt`
    );
  });

  test("listStagedSegments orders numerically and ignores the index", async () => {
    await prepare([
      ["binlogs/mysql-bin.1000000", "abc"],
      ["binlogs/mysql-bin.999999", "ab"],
      ["binlogs/mysql-bin.index", "x"],
    ]);
    const staged = await runTest(listStagedSegments(backupLayout(root)));
    expect(staged.map((s) => [s.fileName, s.size])).toEqual([
      ["mysql-bin.999999", 2],
      ["mysql-bin.1000000", 3],
    ]);
  });
});
