// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, Order } from "effect";
import { describe, expect, test } from "vitest";
import {
  type BackupTimestamp,
  BackupTimestampOrder,
  formatBackupTimestamp,
  parseBackupTimestamp,
  parseTargetTimestamp,
  timestampToDate,
  toDatetimeArg,
} from "../../src/lib/timestamp.ts";

const ts = (s: string): BackupTimestamp => Option.getOrThrow(parseBackupTimestamp(s));

describe("timestamp", () => {
  test("formatBackupTimestamp renders local time with zero padding", () => {
    expect(formatBackupTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe("2024-01-05_09-03-07");
  });

  describe("parseBackupTimestamp", () => {
    test("accepts the filename form", () => {
      expect(parseBackupTimestamp("2024-01-15_10-30-00")).toEqual(
        Option.some("2024-01-15_10-30-00")
      );
    });

    test("rejects impossible dates", () => {
      expect(Option.isNone(parseBackupTimestamp("2024-02-30_10-30-00"))).toBe(true);
      expect(Option.isNone(parseBackupTimestamp("2024-13-01_10-30-00"))).toBe(true);
    });

    test("rejects the target form", () => {
      expect(Option.isNone(parseBackupTimestamp("2024-01-15 10:30:00"))).toBe(true);
    });
  });

  describe("parseTargetTimestamp", () => {
    test("accepts a space or T separator", () => {
      expect(parseTargetTimestamp("2024-01-15 10:30:00")).toEqual(Option.some("2024-01-15_10-30-00"));
      expect(parseTargetTimestamp("2024-01-15T10:30:00")).toEqual(Option.some("2024-01-15_10-30-00"));
    });

    test("rejects a date without time", () => {
      expect(Option.isNone(parseTargetTimestamp("2024-01-15"))).toBe(true);
    });
  });

  test("toDatetimeArg renders the --stop-datetime form", () => {
    expect(toDatetimeArg(ts("2024-01-15_10-30-00"))).toBe("2024-01-15 10:30:00");
  });

  test("timestampToDate inverts formatBackupTimestamp", () => {
    const date = new Date(2024, 5, 1, 12, 0, 30);
    expect(timestampToDate(formatBackupTimestamp(date)).getTime()).toBe(date.getTime());
  });

  test("string order is chronological order", () => {
    expect(
      Order.lessThan(BackupTimestampOrder)(ts("2024-01-15_09-59-59"), ts("2024-01-15_10-00-00"))
    ).toBe(true);
  });
});
