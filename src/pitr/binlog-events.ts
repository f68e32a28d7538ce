// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Decides whether `mariadb-binlog` output carries any change for the
 * filtered database, or only the decoder's own framing.
 *
 * Framing: comments, `DELIMITER`, `SET`, `/*!` hints, `BEGIN`, `use`,
 * `COMMIT`, `ROLLBACK`, and the format description that opens every
 * decoded file: a `BINLOG '...'` block right after the `Start: binlog`
 * header comment. Any other `BINLOG` block is a row event.
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { Effect } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

const FRAMING_PREFIXES: readonly string[] = [
  "#",
  "/*!",
  "DELIMITER",
  "SET ",
  "SET@",
  "BEGIN",
  "COMMIT",
  "ROLLBACK",
  "use ",
  "START TRANSACTION",
];

export const isFramingLine = (line: string): boolean => {
  const upper = line.trim().toUpperCase();
  return upper.length === 0 || FRAMING_PREFIXES.some((p) => upper.startsWith(p.toUpperCase()));
};

/** Incremental scanner; feed lines in order, read `found` at any point. */
export interface EventScanner {
  readonly push: (line: string) => void;
  readonly found: () => boolean;
}

/** The header comment `mariadb-binlog` prints before each file's format description. */
const isFormatDescriptionHeader = (line: string): boolean =>
  line.startsWith("#") && line.includes("Start: binlog");

const closesBlock = (text: string): boolean => text.endsWith("'/*!*/;") || text.endsWith("';");

export const createEventScanner = (): EventScanner => {
  let descriptionPending = false;
  let inBlock = false;
  let found = false;

  return {
    push: (line: string): void => {
      if (found) {
        return;
      }
      const trimmed = line.trim();
      if (inBlock) {
        inBlock = !closesBlock(trimmed);
        return;
      }
      if (isFormatDescriptionHeader(trimmed)) {
        descriptionPending = true;
        return;
      }
      if (trimmed.startsWith("BINLOG '")) {
        if (!descriptionPending) {
          found = true;
          return;
        }
        descriptionPending = false;
        inBlock = !closesBlock(trimmed.slice("BINLOG '".length));
        return;
      }
      found = !isFramingLine(trimmed);
    },
    found: (): boolean => found,
  };
};

export const containsEvents = (lines: Iterable<string>): boolean => {
  const scanner = createEventScanner();
  for (const line of lines) {
    scanner.push(line);
    if (scanner.found()) {
      return true;
    }
  }
  return false;
};

/** Streams the file and stops at the first event. */
export const fileContainsEvents = (path: AbsolutePath): Effect.Effect<boolean, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<boolean> => {
      const input = createReadStream(path, { encoding: "utf-8" });
      const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
      const scanner = createEventScanner();
      try {
        for await (const line of lines) {
          scanner.push(line);
          if (scanner.found()) {
            return true;
          }
        }
        return false;
      } finally {
        lines.close();
        input.destroy();
      }
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.FILE_READ_FAILED,
        message: `Failed to read binlog extract ${path}: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  });
