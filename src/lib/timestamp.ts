// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup timestamps in the filename form `YYYY-MM-DD_HH-MM-SS` (local time).
 * The form is fixed width, so ordering by string is ordering by time.
 */

import { type Brand, Option, Order, pipe } from "effect";

export type BackupTimestamp = string & Brand.Brand<"BackupTimestamp">;

const FILENAME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})$/;
const TARGET_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

export const formatBackupTimestamp = (date: Date): BackupTimestamp =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}` as BackupTimestamp;

interface DateParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const toParts = (match: RegExpExecArray): Option.Option<DateParts> => {
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return year !== undefined &&
    month !== undefined &&
    day !== undefined &&
    hour !== undefined &&
    minute !== undefined &&
    second !== undefined
    ? Option.some({ year, month, day, hour, minute, second })
    : Option.none();
};

/** Rejects impossible calendar values such as month 13 or February 30. */
const isRealDate = (p: DateParts): boolean => {
  const d = new Date(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return (
    d.getFullYear() === p.year &&
    d.getMonth() === p.month - 1 &&
    d.getDate() === p.day &&
    d.getHours() === p.hour &&
    d.getMinutes() === p.minute &&
    d.getSeconds() === p.second
  );
};

const partsToTimestamp = (p: DateParts): BackupTimestamp =>
  `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}_${pad(p.hour)}-${pad(p.minute)}-${pad(p.second)}` as BackupTimestamp;

const parseWith =
  (pattern: RegExp) =>
  (s: string): Option.Option<BackupTimestamp> =>
    pipe(
      Option.fromNullable(pattern.exec(s.trim())),
      Option.flatMap(toParts),
      Option.filter(isRealDate),
      Option.map(partsToTimestamp)
    );

/** `2024-01-15_10-30-00` */
export const parseBackupTimestamp: (s: string) => Option.Option<BackupTimestamp> =
  parseWith(FILENAME_PATTERN);

/** `2024-01-15 10:30:00`, the form accepted by `--to-timestamp`. */
export const parseTargetTimestamp: (s: string) => Option.Option<BackupTimestamp> =
  parseWith(TARGET_PATTERN);

/** `YYYY-MM-DD HH:MM:SS`, as `mariadb-binlog --stop-datetime` expects it. */
export const toDatetimeArg = (ts: BackupTimestamp): string => {
  const [date = "", time = ""] = ts.split("_");
  return `${date} ${time.replaceAll("-", ":")}`;
};

export const timestampToDate = (ts: BackupTimestamp): Date => {
  const [date = "", time = ""] = ts.split("_");
  const [y = 0, mo = 1, d = 1] = date.split("-").map(Number);
  const [h = 0, mi = 0, s = 0] = time.split("-").map(Number);
  return new Date(y, mo - 1, d, h, mi, s);
};

export const BackupTimestampOrder: Order.Order<BackupTimestamp> = Order.string;
