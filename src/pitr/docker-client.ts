// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * DatabaseClient over `docker exec` / `docker cp` (or podman).
 *
 * The password never appears in an argument list: it is handed to the
 * runtime as MYSQL_PWD in the environment and forwarded with a bare
 * `-e MYSQL_PWD`.
 */

import { Array as Arr, Effect, Layer, Option, pipe } from "effect";
import type { ConnectionConfig } from "../config/connection";
import { DatabaseError, ErrorCode, errorMessage } from "../lib/errors";
import { CONTAINER_PATHS } from "../lib/paths";
import { type DatabaseName, pathBasename, pathJoin } from "../lib/types";
import {
  type ExecOptions,
  type ExecResult,
  exec,
  execPiped,
  execToFile,
  execWithInput,
  fileInputStream,
  formatCommand,
} from "../system/exec";
import { type BinlogRange, DatabaseClient, type DatabaseClientService } from "./client";
import {
  BinaryLogRow,
  CountRow,
  MasterStatusRow,
  SingleColumnRow,
  decodeRows,
  toBinaryLogs,
  toMasterStatus,
} from "./rows";

type DatabaseErrorCode = DatabaseError["code"];

export interface Credentials {
  readonly user: string;
  readonly password: Option.Option<string>;
}

export type DumpTool = "mysqldump" | "mariadb-dump";

// ============================================================================
// Argument builders
// ============================================================================

/** `docker exec [-i] [-e MYSQL_PWD] <container>` */
export const runtimeExec = (
  conn: ConnectionConfig,
  options: { readonly interactive: boolean; readonly credentials: Option.Option<Credentials> }
): readonly string[] => [
  conn.runtime,
  "exec",
  ...(options.interactive ? ["-i"] : []),
  ...(Option.exists(options.credentials, (c) => Option.isSome(c.password))
    ? ["-e", "MYSQL_PWD"]
    : []),
  conn.container,
];

export const execOptionsFor = (credentials: Credentials): ExecOptions =>
  Option.match(credentials.password, {
    onNone: (): ExecOptions => ({}),
    onSome: (password): ExecOptions => ({ env: { MYSQL_PWD: password } }),
  });

export const queryCommand = (
  conn: ConnectionConfig,
  credentials: Credentials,
  sql: string
): readonly string[] => [
  ...runtimeExec(conn, { interactive: false, credentials: Option.some(credentials) }),
  "mariadb",
  "-u",
  credentials.user,
  "-N",
  "-B",
  "-e",
  sql,
];

export const dumpCommand = (
  conn: ConnectionConfig,
  credentials: Credentials,
  tool: DumpTool,
  database: DatabaseName,
  masterData: boolean
): readonly string[] => [
  ...runtimeExec(conn, { interactive: false, credentials: Option.some(credentials) }),
  tool,
  "-u",
  credentials.user,
  "--single-transaction",
  ...(masterData ? ["--master-data=2"] : []),
  "--routines",
  "--triggers",
  "--events",
  database,
];

const flag = <A>(name: string, value: Option.Option<A>): readonly string[] =>
  Option.match(value, { onNone: () => [], onSome: (v) => [`--${name}=${v}`] });

export const binlogRangeArgs = (range: BinlogRange): readonly string[] => [
  `--database=${range.database}`,
  ...flag("start-position", range.startPosition),
  ...flag("stop-position", range.stopPosition),
  ...flag("stop-datetime", range.stopDatetime),
];

export const binlogCommand = (
  conn: ConnectionConfig,
  segmentPaths: readonly string[],
  range: BinlogRange
): readonly string[] => [
  ...runtimeExec(conn, { interactive: false, credentials: Option.none() }),
  "mariadb-binlog",
  ...binlogRangeArgs(range),
  ...segmentPaths,
];

export const importCommand = (
  conn: ConnectionConfig,
  credentials: Credentials,
  database: DatabaseName
): readonly string[] => [
  ...runtimeExec(conn, { interactive: true, credentials: Option.some(credentials) }),
  "mariadb",
  "-u",
  credentials.user,
  database,
];

// ============================================================================
// Live layer
// ============================================================================

const databaseError =
  (code: DatabaseErrorCode, what: string, database?: DatabaseName) =>
  (e: unknown): DatabaseError =>
    new DatabaseError({
      code,
      message: `${what}: ${errorMessage(e)}`,
      ...(database === undefined ? {} : { database }),
    });

const failedRun = (
  code: DatabaseErrorCode,
  what: string,
  result: ExecResult,
  database?: DatabaseName
): DatabaseError =>
  new DatabaseError({
    code,
    message: `${what} (exit ${result.exitCode})${result.stderr.trim() ? `: ${result.stderr.trim()}` : ""}`,
    ...(database === undefined ? {} : { database }),
  });

/** Exit 0 or the given database error. */
const requireSuccess =
  (code: DatabaseErrorCode, what: string, database?: DatabaseName) =>
  (result: ExecResult): Effect.Effect<ExecResult, DatabaseError> =>
    result.exitCode === 0
      ? Effect.succeed(result)
      : Effect.fail(failedRun(code, what, result, database));

const makeLive = (conn: ConnectionConfig): Effect.Effect<DatabaseClientService> =>
  Effect.gen(function* () {
    const candidates: readonly Credentials[] = Option.match(conn.password, {
      onNone: () => [{ user: conn.user, password: Option.none() }],
      onSome: (password) => [
        { user: conn.user, password: Option.some(password) },
        { user: conn.user, password: Option.none() },
      ],
    });

    const trySelect = (credentials: Credentials): Effect.Effect<Credentials, DatabaseError> =>
      pipe(
        exec(queryCommand(conn, credentials, "SELECT 1"), execOptionsFor(credentials)),
        Effect.mapError(databaseError(ErrorCode.CONNECTION_FAILED, "Cannot reach the server")),
        Effect.flatMap(
          requireSuccess(ErrorCode.CONNECTION_FAILED, `Cannot connect to ${conn.container}`)
        ),
        Effect.as(credentials)
      );

    const credentials = yield* Effect.cached(
      pipe(
        Effect.firstSuccessOf(candidates.map(trySelect)),
        Effect.tap((c) =>
          Option.isNone(c.password) && Option.isSome(conn.password)
            ? Effect.logWarning("Password rejected; connected without a password")
            : Effect.void
        )
      )
    );

    const query = (sql: string): Effect.Effect<string, DatabaseError> =>
      Effect.gen(function* () {
        const creds = yield* credentials;
        const result = yield* pipe(
          exec(queryCommand(conn, creds, sql), execOptionsFor(creds)),
          Effect.mapError(databaseError(ErrorCode.STATUS_QUERY_FAILED, `Query failed: ${sql}`))
        );
        yield* requireSuccess(ErrorCode.STATUS_QUERY_FAILED, `Query failed: ${sql}`)(result);
        return result.stdout;
      });

    const variable = (name: string): Effect.Effect<Option.Option<string>, DatabaseError> =>
      pipe(
        query(`SELECT @@${name}`),
        Effect.flatMap((out) => decodeRows(SingleColumnRow, out, `@@${name}`)),
        Effect.map((rows) =>
          pipe(
            Arr.head(rows),
            Option.map(([value]) => value),
            Option.filter((value) => value !== "NULL" && value.length > 0)
          )
        )
      );

    const containerExec = (
      args: readonly string[],
      code: DatabaseErrorCode
    ): Effect.Effect<ExecResult, DatabaseError> =>
      pipe(
        exec([...runtimeExec(conn, { interactive: false, credentials: Option.none() }), ...args]),
        Effect.mapError(databaseError(code, formatCommand(args)))
      );

    const dumpTool = yield* Effect.cached(
      pipe(
        containerExec(["which", "mysqldump"], ErrorCode.DUMP_FAILED),
        Effect.map((r): DumpTool => (r.exitCode === 0 ? "mysqldump" : "mariadb-dump")),
        Effect.orElseSucceed((): DumpTool => "mariadb-dump"),
        Effect.tap((tool) => Effect.logDebug(`Using ${tool} for dumps`))
      )
    );

    const service: DatabaseClientService = {
      ping: Effect.asVoid(credentials),

      listDatabases: pipe(
        query("SHOW DATABASES"),
        Effect.flatMap((out) => decodeRows(SingleColumnRow, out, "SHOW DATABASES")),
        Effect.map((rows) => rows.map(([name]) => name))
      ),

      tableCount: (database) =>
        pipe(
          query(`SELECT COUNT(*) FROM information_schema.tables WHERE table_schema='${database}'`),
          Effect.flatMap((out) => decodeRows(CountRow, out, "table count")),
          Effect.map((rows) => Option.getOrElse(Option.map(Arr.head(rows), ([n]) => n), () => 0))
        ),

      binlogEnabled: Effect.map(
        variable("log_bin"),
        Option.exists((v: string) => v === "1" || v.toUpperCase() === "ON")
      ),

      binlogFormat: Effect.map(variable("binlog_format"), Option.getOrElse(() => "")),

      binlogBasename: variable("log_bin_basename"),

      masterStatus: pipe(
        query("SHOW MASTER STATUS"),
        Effect.flatMap((out) => decodeRows(MasterStatusRow, out, "SHOW MASTER STATUS")),
        Effect.map(toMasterStatus)
      ),

      binaryLogs: pipe(
        query("SHOW BINARY LOGS"),
        Effect.flatMap((out) => decodeRows(BinaryLogRow, out, "SHOW BINARY LOGS")),
        Effect.map(toBinaryLogs)
      ),

      flushBinaryLogs: Effect.asVoid(query("FLUSH BINARY LOGS")),

      dump: (database, dest, options) =>
        Effect.gen(function* () {
          const creds = yield* credentials;
          const tool = yield* dumpTool;
          const what = `Dump of ${database} failed`;
          const result = yield* pipe(
            execToFile(
              dumpCommand(conn, creds, tool, database, options.masterData),
              dest,
              execOptionsFor(creds)
            ),
            Effect.mapError(databaseError(ErrorCode.DUMP_FAILED, what, database))
          );
          yield* requireSuccess(ErrorCode.DUMP_FAILED, what, database)(result);
        }),

      copyFromContainer: (containerPath, dest) =>
        pipe(
          exec([conn.runtime, "cp", `${conn.container}:${containerPath}`, dest]),
          Effect.map((r) => r.exitCode === 0),
          Effect.mapError(databaseError(ErrorCode.BINLOG_COPY_FAILED, `Copy of ${containerPath} failed`))
        ),

      findInContainer: (root, name) =>
        pipe(
          containerExec(["find", root, "-name", name], ErrorCode.BINLOG_COPY_FAILED),
          Effect.map((r) =>
            pipe(
              r.stdout.split("\n"),
              Arr.map((line) => line.trim()),
              Arr.findFirst((line) => line.length > 0)
            )
          )
        ),

      createDatabase: (database) =>
        pipe(
          query(`CREATE DATABASE IF NOT EXISTS \`${database}\``),
          Effect.asVoid,
          Effect.mapError(
            (e) =>
              new DatabaseError({ code: ErrorCode.IMPORT_FAILED, message: e.message, database })
          )
        ),

      importSql: (database, file, options) =>
        Effect.gen(function* () {
          const creds = yield* credentials;
          const what = `Import into ${database} failed`;
          const result = yield* pipe(
            execWithInput(
              importCommand(conn, creds, database),
              fileInputStream(file, { gunzip: options.gunzip }),
              execOptionsFor(creds)
            ),
            Effect.mapError(databaseError(ErrorCode.IMPORT_FAILED, what, database))
          );
          yield* requireSuccess(ErrorCode.IMPORT_FAILED, what, database)(result);
        }),

      extractEvents: (segmentPaths, range, dest) =>
        pipe(
          execToFile(binlogCommand(conn, segmentPaths, range), dest),
          Effect.mapError(
            databaseError(ErrorCode.BINLOG_COPY_FAILED, "Binlog extraction failed", range.database)
          ),
          Effect.flatMap(
            requireSuccess(ErrorCode.BINLOG_COPY_FAILED, "Binlog extraction failed", range.database)
          ),
          Effect.asVoid
        ),

      replaySegment: (file, range) =>
        Effect.gen(function* () {
          const creds = yield* credentials;
          const name = pathBasename(file);
          const inContainer = pathJoin(CONTAINER_PATHS.replayDir, name);
          const what = `Replay of ${name} into ${range.database} failed`;

          yield* containerExec(["mkdir", "-p", CONTAINER_PATHS.replayDir], ErrorCode.BINLOG_REPLAY_FAILED);
          const copied = yield* pipe(
            exec([conn.runtime, "cp", file, `${conn.container}:${inContainer}`]),
            Effect.mapError(databaseError(ErrorCode.BINLOG_REPLAY_FAILED, what, range.database))
          );
          yield* requireSuccess(
            ErrorCode.BINLOG_REPLAY_FAILED,
            `Copy of ${name} into the container failed`,
            range.database
          )(copied);

          const piped = yield* pipe(
            execPiped(
              binlogCommand(conn, [inContainer], range),
              importCommand(conn, creds, range.database),
              execOptionsFor(creds)
            ),
            Effect.mapError(databaseError(ErrorCode.BINLOG_REPLAY_FAILED, what, range.database)),
            Effect.ensuring(
              containerExec(["rm", "-f", inContainer], ErrorCode.BINLOG_REPLAY_FAILED).pipe(Effect.ignore)
            )
          );
          yield* requireSuccess(ErrorCode.BINLOG_REPLAY_FAILED, what, range.database)(piped.producer);
          yield* requireSuccess(ErrorCode.BINLOG_REPLAY_FAILED, what, range.database)(piped.consumer);
        }),
    };

    return service;
  });

export const DatabaseClientLive = (conn: ConnectionConfig): Layer.Layer<DatabaseClient> =>
  Layer.effect(DatabaseClient, makeLive(conn));

