// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Coordinate marker files: `"<segment> <position>\n"`, or `"unknown 0\n"`
 * when the server reported no coordinate.
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import { parseNat } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { atomicWrite, readFileOption } from "../system/fs";
import {
  type BinlogCoordinate,
  coordinate,
  formatCoordinate,
  parseCoordinate,
  parseSegmentReference,
} from "./coordinate";

export const UNKNOWN_MARKER = "unknown 0";

export const encodeMarker = (c: Option.Option<BinlogCoordinate>): string =>
  `${Option.match(c, { onNone: () => UNKNOWN_MARKER, onSome: formatCoordinate })}\n`;

/** None for `unknown 0`, empty files and anything unparseable. */
export const decodeMarker = (content: string): Option.Option<BinlogCoordinate> =>
  parseCoordinate(content);

export const writeMarker = (
  path: AbsolutePath,
  c: Option.Option<BinlogCoordinate>
): Effect.Effect<void, SystemError> => atomicWrite(path, encodeMarker(c));

export interface MarkerContent {
  readonly path: AbsolutePath;
  readonly coordinate: Option.Option<BinlogCoordinate>;
}

/** None when the file does not exist. */
export const readMarker = (
  path: AbsolutePath
): Effect.Effect<Option.Option<MarkerContent>, SystemError> =>
  pipe(
    readFileOption(path),
    Effect.map(Option.map((content) => ({ path, coordinate: decodeMarker(content) })))
  );

// ============================================================================
// Coordinates embedded in dumps
// ============================================================================

const CHANGE_MASTER_PATTERN = /MASTER_LOG_FILE='([^']+)',\s*MASTER_LOG_POS=(\d+)/;

/** `-- CHANGE MASTER TO MASTER_LOG_FILE='mysql-bin.000005', MASTER_LOG_POS=1024;` */
export const parseChangeMasterLine = (line: string): Option.Option<BinlogCoordinate> =>
  pipe(
    Option.fromNullable(CHANGE_MASTER_PATTERN.exec(line)),
    Option.flatMap(([, file, pos]) =>
      Option.all([parseSegmentReference(file ?? ""), parseNat(pos ?? "")])
    ),
    Option.map(([seg, pos]) => coordinate(seg, pos))
  );

/** The coordinate sits in the dump header; only the first lines are read. */
const DUMP_HEADER_LINES = 100;

export const findDumpCoordinate = (
  dumpPath: AbsolutePath
): Effect.Effect<Option.Option<BinlogCoordinate>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<BinlogCoordinate>> => {
      const input = createReadStream(dumpPath, { encoding: "utf-8" });
      const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
      try {
        let seen = 0;
        for await (const line of lines) {
          if (line.includes("CHANGE MASTER TO")) {
            return parseChangeMasterLine(line);
          }
          seen += 1;
          if (seen >= DUMP_HEADER_LINES) {
            break;
          }
        }
        return Option.none();
      } finally {
        lines.close();
        input.destroy();
      }
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.FILE_READ_FAILED,
        message: `Failed to read dump header ${dumpPath}: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  });
