// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-process stand-in for the containerized server. State is plain mutable
 * data the test arranges; every call the coordinators make is recorded.
 */

import { readFile, writeFile } from "node:fs/promises";
import { gunzipSync } from "node:zlib";
import { Effect, Option } from "effect";
import { DatabaseError, ErrorCode } from "../../src/lib/errors.ts";
import type { AbsolutePath, DatabaseName } from "../../src/lib/types.ts";
import type { BinlogRange, DatabaseClientService } from "../../src/pitr/client.ts";
import {
  type BinlogCoordinate,
  coordinate,
  segment,
  segmentName,
} from "../../src/pitr/coordinate.ts";
import type { BinaryLog } from "../../src/pitr/rows.ts";

export const BINLOG_BASENAME = "/var/lib/mysql/mysql-bin";

const DECODER_HEADER = ["/*!50530 SET @@SESSION.PSEUDO_SLAVE_MODE=1*/;", "DELIMITER /*!*/;"];
const DECODER_FOOTER = ["DELIMITER ;", "# End of log file"];

/** What the decoder prints at the top of each file it reads. */
export const FORMAT_DESCRIPTION = [
  "# at 4",
  "#240115 12:00:00 server id 1  end_log_pos 256 CRC32 0x0a1b2c3d \tStart: binlog v 4, server v 10.11.6-MariaDB-log created 240115 12:00:00",
  "BINLOG '",
  "AAAAAAAAAAAAAAAA",
  "'/*!*/;",
];

export const EVENT_LINE = "INSERT INTO orders VALUES (1, 'test');";

/** Decoder output for `files` segments, with `events` placed after the last description. */
export const decoderOutput = (files: number, events: readonly string[] = []): readonly string[] => [
  ...DECODER_HEADER,
  ...Array.from({ length: Math.max(files, 1) }, () => FORMAT_DESCRIPTION).flat(),
  ...events,
  ...DECODER_FOOTER,
];

/** Decoder output with no change in it. */
export const FRAMING_ONLY: readonly string[] = decoderOutput(1);

export interface ExtractCall {
  readonly segmentPaths: readonly string[];
  readonly range: BinlogRange;
}

export interface ReplayCall {
  readonly file: AbsolutePath;
  readonly range: BinlogRange;
}

export interface ImportCall {
  readonly database: DatabaseName;
  readonly content: string;
}

export class FakeDatabaseServer {
  reachable = true;
  binlogEnabled = true;
  binlogFormat = "ROW";
  basename: Option.Option<string> = Option.some(BINLOG_BASENAME);
  /** Name to table count. */
  databases = new Map<string, number>();
  /** Oldest first; the last one is open. */
  logs: BinaryLog[] = [];
  position = 4;
  /** Container path to file content. */
  containerFiles = new Map<string, string>();
  /** Databases whose extracts carry events. */
  eventDatabases = new Set<string>();
  failDumps = new Set<string>();
  /** Staged file names whose replay fails. */
  failReplays = new Set<string>();

  flushes = 0;
  readonly dumps: { readonly database: string; readonly masterData: boolean }[] = [];
  readonly created: string[] = [];
  readonly imports: ImportCall[] = [];
  readonly extracts: ExtractCall[] = [];
  readonly replays: ReplayCall[] = [];

  /**
   * Segments `first..open` of `mysql-bin`; closed ones get `closedSize`
   * bytes and a file under the basename directory.
   */
  setBinlogs(first: number, open: number, position: number, closedSize = 4096): void {
    this.logs = [];
    for (let seq = first; seq <= open; seq++) {
      const seg = segment("mysql-bin", seq);
      this.logs.push({ segment: seg, size: seq === open ? position : closedSize });
      this.containerFiles.set(`/var/lib/mysql/${segmentName(seg)}`, `binlog ${segmentName(seg)}\n`);
    }
    this.position = position;
  }

  get current(): Option.Option<BinlogCoordinate> {
    const open = this.logs[this.logs.length - 1];
    return this.binlogEnabled && open !== undefined
      ? Option.some(coordinate(open.segment, this.position))
      : Option.none();
  }

  get client(): DatabaseClientService {
    const unreachable = (): DatabaseError =>
      new DatabaseError({ code: ErrorCode.CONNECTION_FAILED, message: "Cannot connect to MariaDB" });
    const connected = <A>(f: () => A): Effect.Effect<A, DatabaseError> =>
      Effect.suspend(() => (this.reachable ? Effect.sync(f) : Effect.fail(unreachable())));
    const write = (dest: string, content: string): Effect.Effect<void, DatabaseError> =>
      Effect.tryPromise({
        try: () => writeFile(dest, content),
        catch: (e) =>
          new DatabaseError({ code: ErrorCode.DUMP_FAILED, message: String(e) }),
      });

    return {
      ping: connected(() => undefined),
      listDatabases: connected(() => ["information_schema", "mysql", ...this.databases.keys()]),
      tableCount: (database) => connected(() => this.databases.get(database) ?? 0),
      binlogEnabled: connected(() => this.binlogEnabled),
      binlogFormat: connected(() => this.binlogFormat),
      binlogBasename: connected(() => this.basename),
      masterStatus: connected(() => this.current),
      binaryLogs: connected(() => [...this.logs]),
      flushBinaryLogs: connected(() => {
        this.flushes += 1;
      }),

      dump: (database, dest, options) =>
        Effect.suspend(() => {
          this.dumps.push({ database, masterData: options.masterData });
          if (this.failDumps.has(database)) {
            return Effect.fail(
              new DatabaseError({
                code: ErrorCode.DUMP_FAILED,
                message: `mariadb-dump failed for ${database}`,
                database,
              })
            );
          }
          const header = Option.match(options.masterData ? this.current : Option.none(), {
            onNone: () => [],
            onSome: (c) => [
              `-- CHANGE MASTER TO MASTER_LOG_FILE='${segmentName(c.segment)}', MASTER_LOG_POS=${c.position};`,
            ],
          });
          return write(
            dest,
            [`-- MariaDB dump of ${database}`, ...header, "CREATE TABLE orders (id INT);", ""].join(
              "\n"
            )
          );
        }),

      copyFromContainer: (containerPath, dest) =>
        Effect.suspend(() => {
          const content = this.containerFiles.get(containerPath);
          return content === undefined ? Effect.succeed(false) : write(dest, content).pipe(Effect.as(true));
        }),

      findInContainer: (root, name) =>
        Effect.sync(() =>
          Option.fromNullable(
            [...this.containerFiles.keys()].find(
              (p) => p.startsWith(`${root}/`) && p.endsWith(`/${name}`)
            )
          )
        ),

      createDatabase: (database) =>
        Effect.sync(() => {
          this.created.push(database);
        }),

      importSql: (database, file, options) =>
        Effect.promise(() => readFile(file)).pipe(
          Effect.map((bytes) => (options.gunzip ? gunzipSync(bytes) : bytes).toString("utf-8")),
          Effect.map((content) => {
            this.imports.push({ database, content });
          })
        ),

      extractEvents: (segmentPaths, range, dest) =>
        Effect.suspend(() => {
          this.extracts.push({ segmentPaths, range });
          const lines = decoderOutput(
            segmentPaths.length,
            this.eventDatabases.has(range.database) ? ["BEGIN", EVENT_LINE, "COMMIT"] : []
          );
          return write(dest, `${lines.join("\n")}\n`);
        }),

      replaySegment: (file, range) =>
        Effect.suspend(() => {
          this.replays.push({ file, range });
          const name = file.slice(file.lastIndexOf("/") + 1);
          return this.failReplays.has(name)
            ? Effect.fail(
                new DatabaseError({
                  code: ErrorCode.BINLOG_REPLAY_FAILED,
                  message: `mariadb-binlog failed on ${name}`,
                  database: range.database,
                })
              )
            : Effect.void;
        }),
    };
  }
}
