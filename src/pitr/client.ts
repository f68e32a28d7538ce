// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Everything the coordinators need from the database server, behind one
 * service so the container runtime can be swapped for an in-process fake.
 * Uses Context.GenericTag for isolatedDeclarations: true compatibility.
 */

import { Context, type Effect, type Option } from "effect";
import type { DatabaseError } from "../lib/errors";
import type { AbsolutePath, DatabaseName } from "../lib/types";
import type { BinlogCoordinate } from "./coordinate";
import type { BinaryLog } from "./rows";

/** Filters passed to `mariadb-binlog`. */
export interface BinlogRange {
  readonly database: DatabaseName;
  /** Applies to the first segment. */
  readonly startPosition: Option.Option<number>;
  /** Applies to the last segment. */
  readonly stopPosition: Option.Option<number>;
  /** `YYYY-MM-DD HH:MM:SS` */
  readonly stopDatetime: Option.Option<string>;
}

export interface DumpOptions {
  /** Embed the binlog coordinate as a `CHANGE MASTER TO` comment. */
  readonly masterData: boolean;
}

export interface DatabaseClientService {
  /** Connects with the password, then without. CONNECTION_FAILED when neither works. */
  readonly ping: Effect.Effect<void, DatabaseError>;

  readonly listDatabases: Effect.Effect<readonly string[], DatabaseError>;
  readonly tableCount: (database: DatabaseName) => Effect.Effect<number, DatabaseError>;

  readonly binlogEnabled: Effect.Effect<boolean, DatabaseError>;
  /** ROW, STATEMENT or MIXED. */
  readonly binlogFormat: Effect.Effect<string, DatabaseError>;
  /** `@@log_bin_basename`, e.g. `/var/lib/mysql/mysql-bin`. */
  readonly binlogBasename: Effect.Effect<Option.Option<string>, DatabaseError>;
  /** None when binary logging is off. */
  readonly masterStatus: Effect.Effect<Option.Option<BinlogCoordinate>, DatabaseError>;
  /** Oldest first; the last entry is the segment being written. */
  readonly binaryLogs: Effect.Effect<readonly BinaryLog[], DatabaseError>;
  readonly flushBinaryLogs: Effect.Effect<void, DatabaseError>;

  readonly dump: (
    database: DatabaseName,
    dest: AbsolutePath,
    options: DumpOptions
  ) => Effect.Effect<void, DatabaseError>;

  /** `false` when the container has no such file. */
  readonly copyFromContainer: (
    containerPath: string,
    dest: AbsolutePath
  ) => Effect.Effect<boolean, DatabaseError>;
  readonly findInContainer: (
    root: string,
    name: string
  ) => Effect.Effect<Option.Option<string>, DatabaseError>;

  readonly createDatabase: (database: DatabaseName) => Effect.Effect<void, DatabaseError>;
  readonly importSql: (
    database: DatabaseName,
    file: AbsolutePath,
    options: { readonly gunzip: boolean }
  ) => Effect.Effect<void, DatabaseError>;

  /** Decode server-side segments (container paths, in order) into `dest`. */
  readonly extractEvents: (
    segmentPaths: readonly string[],
    range: BinlogRange,
    dest: AbsolutePath
  ) => Effect.Effect<void, DatabaseError>;

  /** Apply one staged segment from the host to `range.database`. */
  readonly replaySegment: (
    file: AbsolutePath,
    range: BinlogRange
  ) => Effect.Effect<void, DatabaseError>;
}

/**
 * DatabaseClient tag identifier type.
 */
export interface DatabaseClient {
  readonly _tag: "DatabaseClient";
}

export const DatabaseClient: Context.Tag<DatabaseClient, DatabaseClientService> =
  Context.GenericTag<DatabaseClient, DatabaseClientService>("mariadb-pitr/DatabaseClient");
