// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Typed rows from the client's batch mode (`-N -B`): one row per line,
 * columns separated by tabs, no header. Each query has a tuple schema;
 * a row that does not decode fails the query instead of being guessed at.
 */

import { Effect, Option, ParseResult, Schema, pipe } from "effect";
import { DatabaseError, ErrorCode } from "../lib/errors";
import {
  type BinlogCoordinate,
  type BinlogSegment,
  coordinate,
  parseSegmentReference,
} from "./coordinate";

const SegmentFromString: Schema.Schema<BinlogSegment, string> = Schema.transformOrFail(
  Schema.String,
  Schema.Struct({ base: Schema.String, sequence: Schema.Number, width: Schema.Number }),
  {
    strict: true,
    decode: (s, _, ast) =>
      Option.match(parseSegmentReference(s), {
        onNone: () => ParseResult.fail(new ParseResult.Type(ast, s, `Not a binlog segment: ${s}`)),
        onSome: ParseResult.succeed,
      }),
    encode: (seg, _, ast) =>
      ParseResult.fail(new ParseResult.Forbidden(ast, seg, "Segments are never encoded")),
  }
);

const Offset = Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative());

/** SHOW MASTER STATUS: File, Position, Binlog_Do_DB, Binlog_Ignore_DB. */
export const MasterStatusRow = Schema.Tuple([SegmentFromString, Offset], Schema.String);

/** SHOW BINARY LOGS: Log_name, File_size (newer servers add Encrypted). */
export const BinaryLogRow = Schema.Tuple([SegmentFromString, Offset], Schema.String);

/** SHOW DATABASES, or any single-column query. */
export const SingleColumnRow = Schema.Tuple(Schema.String);

/** SELECT COUNT(*) ... */
export const CountRow = Schema.Tuple(Schema.NumberFromString.pipe(Schema.int()));

export interface BinaryLog {
  readonly segment: BinlogSegment;
  readonly size: number;
}

export const splitRows = (stdout: string): readonly (readonly string[])[] =>
  stdout
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.length > 0)
    .map((line) => line.split("\t"));

export const decodeRows = <A, I>(
  schema: Schema.Schema<A, I>,
  stdout: string,
  query: string
): Effect.Effect<readonly A[], DatabaseError> =>
  pipe(
    Schema.decodeUnknown(Schema.Array(schema))(splitRows(stdout)),
    Effect.mapError(
      (e) =>
        new DatabaseError({
          code: ErrorCode.STATUS_QUERY_FAILED,
          message: `Unexpected output from ${query}:\n${ParseResult.TreeFormatter.formatErrorSync(e)}`,
        })
    )
  );

export const toMasterStatus = (
  rows: readonly (typeof MasterStatusRow.Type)[]
): Option.Option<BinlogCoordinate> =>
  Option.map(Option.fromNullable(rows[0]), ([seg, pos]) => coordinate(seg, pos));

export const toBinaryLogs = (rows: readonly (typeof BinaryLogRow.Type)[]): readonly BinaryLog[] =>
  rows.map(([segment, size]) => ({ segment, size }));
