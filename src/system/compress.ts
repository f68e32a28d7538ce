// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Streaming gzip for dumps and binlog extracts. Gzip over zstd so the
 * artifacts stay readable with `gunzip -c` on any host.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import { Effect } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { deleteFile } from "./fs";

/** 0 = no compression, 9 = maximum. Default 6 balances speed and ratio. */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface GzipOptions {
  readonly level?: CompressionLevel;
}

export const GZIP_SUFFIX = ".gz";

const transformFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  transform: () => NodeJS.ReadWriteStream,
  verb: string
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> =>
      pipeline(createReadStream(source), transform(), createWriteStream(dest)),
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.FILE_WRITE_FAILED,
        message: `Failed to ${verb} ${source}: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  }).pipe(Effect.tapError(() => deleteFile(dest).pipe(Effect.ignore)));

export const gzipFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  options: GzipOptions = {}
): Effect.Effect<void, SystemError> =>
  transformFile(source, dest, () => createGzip({ level: options.level ?? 6 }), "compress");

export const gunzipFile = (
  source: AbsolutePath,
  dest: AbsolutePath
): Effect.Effect<void, SystemError> =>
  transformFile(source, dest, () => createGunzip(), "decompress");

export const isGzipName = (name: string): boolean => name.endsWith(GZIP_SUFFIX);
