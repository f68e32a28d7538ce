// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";
import { coordinate, segment } from "../../src/pitr/coordinate.ts";
import {
  BinaryLogRow,
  CountRow,
  MasterStatusRow,
  SingleColumnRow,
  decodeRows,
  splitRows,
  toBinaryLogs,
  toMasterStatus,
} from "../../src/pitr/rows.ts";

describe("batch rows", () => {
  test("splitRows drops blank lines and carriage returns", () => {
    expect(splitRows("a\tb\r\n\nc\td\n")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  test("SHOW MASTER STATUS", async () => {
    const rows = await Effect.runPromise(
      decodeRows(MasterStatusRow, "mysql-bin.000007\t512\t\t\n", "SHOW MASTER STATUS")
    );
    expect(toMasterStatus(rows)).toEqual(Option.some(coordinate(segment("mysql-bin", 7), 512)));
  });

  test("empty master status means binary logging is off", async () => {
    const rows = await Effect.runPromise(decodeRows(MasterStatusRow, "", "SHOW MASTER STATUS"));
    expect(Option.isNone(toMasterStatus(rows))).toBe(true);
  });

  test("SHOW BINARY LOGS with and without the Encrypted column", async () => {
    const rows = await Effect.runPromise(
      decodeRows(
        BinaryLogRow,
        "mysql-bin.000005\t4096\nmysql-bin.000006\t512\tNo\n",
        "SHOW BINARY LOGS"
      )
    );
    expect(toBinaryLogs(rows)).toEqual([
      { segment: segment("mysql-bin", 5), size: 4096 },
      { segment: segment("mysql-bin", 6), size: 512 },
    ]);
  });

  test("single column and count rows", async () => {
    const dbs = await Effect.runPromise(decodeRows(SingleColumnRow, "mysql\nshop\n", "SHOW DATABASES"));
    expect(dbs.map(([name]) => name)).toEqual(["mysql", "shop"]);
    const count = await Effect.runPromise(decodeRows(CountRow, "12\n", "SELECT COUNT(*)"));
    expect(count).toEqual([[12]]);
  });

  test("undecodable output fails the query", async () => {
    const exit = await Effect.runPromiseExit(
      decodeRows(MasterStatusRow, "garbage\tx\n", "SHOW MASTER STATUS")
    );
    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error.code).toBe(34);
      expect(exit.cause.error.message.startsWith("Unexpected output from SHOW MASTER STATUS:")).toBe(
        true
      );
    }
  });
});
