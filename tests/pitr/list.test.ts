// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { backupLayout, layoutDirectories } from "../../src/lib/paths.ts";
import { type AbsolutePath, databaseName, pathJoin } from "../../src/lib/types.ts";
import { ensureDirectory, writeFile } from "../../src/system/fs.ts";
import { listBackups } from "../../src/pitr/list.ts";
import { FakeDatabaseServer } from "../helpers/fake-client.ts";
import {
  type PitrFixture,
  createTempDirectory,
  removeTempDirectory,
  runPitr,
  runTest,
  testConnection,
} from "../helpers/layers.ts";

let root: AbsolutePath;
let fixture: PitrFixture;

const put = (relative: string, content: string): Promise<void> =>
  runTest(writeFile(pathJoin(root, relative), content));

beforeEach(async () => {
  root = await createTempDirectory("list");
  for (const dir of layoutDirectories(backupLayout(root))) {
    await runTest(ensureDirectory(dir));
  }
  fixture = { connection: testConnection(root), client: new FakeDatabaseServer().client };

  await put("shop_full_2024-01-10_00-00-00.sql.gz.enc", "AAAA");
  await put("checksums/shop_full_2024-01-10_00-00-00.sql.gz.enc.sha256", "c");
  await put("binlog_info/last_binlog_info_shop_2024-01-10_00-00-00.txt", "mysql-bin.000002 100\n");
  await put("shop_incremental_2024-01-10_12-00-00.sql.gz.enc", "II");
  await put("incr/last_binlog_info_shop_2024-01-10_12-00-00_incr.txt", "mysql-bin.000003 50\n");
  await put("blog_full_2024-01-09_00-00-00.sql.enc", "BBB");
  await put("binlog_info/last_binlog_info_blog_2024-01-09_00-00-00.txt", "unknown 0\n");
  await put("binlogs/mysql-bin.000002", "segment");
  await put("binlogs/mysql-bin.000003", "seg");
});

afterEach(async () => {
  await removeTempDirectory(root);
});

describe("listBackups", () => {
  test("groups generations by database, newest first", async () => {
    const listing = await runPitr(fixture, listBackups(Option.none()));

    expect(listing.databases.map((d) => d.database)).toEqual(["blog", "shop"]);
    expect(listing.databases[1]?.generations).toEqual([
      {
        mode: "incremental",
        timestamp: "2024-01-10_12-00-00",
        fileName: "shop_incremental_2024-01-10_12-00-00.sql.gz.enc",
        size: 2,
        coordinate: Option.some("mysql-bin.000003 50"),
        checksum: false,
      },
      {
        mode: "full",
        timestamp: "2024-01-10_00-00-00",
        fileName: "shop_full_2024-01-10_00-00-00.sql.gz.enc",
        size: 4,
        coordinate: Option.some("mysql-bin.000002 100"),
        checksum: true,
      },
    ]);
    expect(listing.databases[0]?.generations[0]?.coordinate).toEqual(Option.none());
    expect(listing.segments).toEqual([
      { name: "mysql-bin.000002", size: 7 },
      { name: "mysql-bin.000003", size: 3 },
    ]);
  });

  test("filters to one database", async () => {
    const listing = await runPitr(fixture, listBackups(Option.some(databaseName("blog"))));

    expect(listing.databases).toHaveLength(1);
    expect(listing.databases[0]?.generations.map((g) => g.fileName)).toEqual([
      "blog_full_2024-01-09_00-00-00.sql.enc",
    ]);
  });

  test("an empty directory lists nothing", async () => {
    await removeTempDirectory(root);
    const listing = await runPitr(fixture, listBackups(Option.none()));

    expect(listing).toEqual({ databases: [], segments: [] });
  });
});
