// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations as Effects over node:fs/promises.
 * Every failure is a SystemError with a FILE_* or DIRECTORY_* code.
 */

import { createHash } from "node:crypto";
import { constants, createReadStream } from "node:fs";
import {
  access,
  chmod as nodeChmod,
  mkdir,
  mkdtemp,
  readFile as nodeReadFile,
  readdir,
  rename,
  rm,
  stat,
  writeFile as nodeWriteFile,
} from "node:fs/promises";
import { Effect, Option, type Scope } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathDirname, pathJoin } from "../lib/types";

const readError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to read ${path}: ${errorMessage(e)}`,
    ...causeProps(e),
  });

const writeError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `Failed to write ${path}: ${errorMessage(e)}`,
    ...causeProps(e),
  });

const hasErrorCode = (e: unknown, code: string): boolean =>
  typeof e === "object" && e !== null && "code" in e && e.code === code;

export const readFile = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<string> => nodeReadFile(path, "utf-8"),
    catch: (e): SystemError =>
      hasErrorCode(e, "ENOENT")
        ? new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `File not found: ${path}`,
            ...causeProps(e),
          })
        : readError(path, e),
  });

/** None when the file does not exist; other read failures still fail. */
export const readFileOption = (
  path: AbsolutePath
): Effect.Effect<Option.Option<string>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<string>> => {
      try {
        return Option.some(await nodeReadFile(path, "utf-8"));
      } catch (e) {
        if (hasErrorCode(e, "ENOENT")) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(path, e),
  });

export interface WriteOptions {
  readonly mode?: number;
}

export const writeFile = (
  path: AbsolutePath,
  content: string | Uint8Array,
  options: WriteOptions = {}
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> =>
      nodeWriteFile(path, content, options.mode === undefined ? {} : { mode: options.mode }),
    catch: (e): SystemError => writeError(path, e),
  });

/**
 * O_EXCL create. Succeeds with `true` when this call created the file and
 * `false` when it already existed. `mode` applies from the moment the file
 * exists.
 */
export const writeFileExclusive = (
  path: AbsolutePath,
  content: string,
  options: { readonly mode?: number } = {}
): Effect.Effect<boolean, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<boolean> => {
      try {
        await nodeWriteFile(
          path,
          content,
          options.mode === undefined ? { flag: "wx" } : { flag: "wx", mode: options.mode }
        );
        return true;
      } catch (e) {
        if (hasErrorCode(e, "EEXIST")) {
          return false;
        }
        throw e;
      }
    },
    catch: (e): SystemError => writeError(path, e),
  });

export const renameFile = (from: AbsolutePath, to: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rename(from, to),
    catch: (e): SystemError => writeError(to, e),
  });

/** Write to `<path>.<pid>.tmp`, then rename over `path`. Readers never see a partial file. */
export const atomicWrite = (
  path: AbsolutePath,
  content: string | Uint8Array,
  options: WriteOptions = {}
): Effect.Effect<void, SystemError> => {
  const tempPath = tempSibling(path);
  return writeFile(tempPath, content, options).pipe(
    Effect.zipRight(renameFile(tempPath, path)),
    Effect.tapError(() => deleteFile(tempPath).pipe(Effect.ignore))
  );
};

export const tempSibling = (path: AbsolutePath): AbsolutePath =>
  pathJoin(pathDirname(path), `.${path.slice(path.lastIndexOf("/") + 1)}.${process.pid}.tmp`);

export const deleteFile = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rm(path, { force: true }),
    catch: (e): SystemError => writeError(path, e),
  });

export const removeDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rm(path, { recursive: true, force: true }),
    catch: (e): SystemError => writeError(path, e),
  });

export const ensureDirectory = (
  path: AbsolutePath,
  mode?: number
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<void> => {
      await mkdir(path, mode === undefined ? { recursive: true } : { recursive: true, mode });
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create directory ${path}: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  });

/** Fresh private directory under `parent`, e.g. `<parent>/.work-abc123`. */
export const createTempDirectory = (
  parent: AbsolutePath,
  prefix: string
): Effect.Effect<AbsolutePath, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<AbsolutePath> => {
      const created = await mkdtemp(pathJoin(parent, prefix));
      return pathJoin(parent, created.slice(created.lastIndexOf("/") + 1));
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create working directory in ${parent}: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  });

/** Scoped scratch directory, removed when the scope closes. */
export const scopedTempDirectory = (
  parent: AbsolutePath,
  prefix: string
): Effect.Effect<AbsolutePath, SystemError, Scope.Scope> =>
  Effect.acquireRelease(createTempDirectory(parent, prefix), (dir) =>
    removeDirectory(dir).pipe(Effect.ignore)
  );

export interface FileInfo {
  readonly size: number;
  readonly mode: number;
  readonly mtimeMs: number;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
}

export const statFile = (path: AbsolutePath): Effect.Effect<Option.Option<FileInfo>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<FileInfo>> => {
      try {
        const s = await stat(path);
        return Option.some({
          size: s.size,
          mode: s.mode & 0o777,
          mtimeMs: s.mtimeMs,
          isFile: s.isFile(),
          isDirectory: s.isDirectory(),
        });
      } catch (e) {
        if (hasErrorCode(e, "ENOENT")) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(path, e),
  });

export const fileExists = (path: AbsolutePath): Effect.Effect<boolean> =>
  statFile(path).pipe(
    Effect.map(Option.exists((info) => info.isFile)),
    Effect.orElseSucceed(() => false)
  );

export const directoryExists = (path: AbsolutePath): Effect.Effect<boolean> =>
  statFile(path).pipe(
    Effect.map(Option.exists((info) => info.isDirectory)),
    Effect.orElseSucceed(() => false)
  );

/** True when `path` is a directory this process may create files in. */
export const directoryWritable = (path: AbsolutePath): Effect.Effect<boolean> =>
  Effect.tryPromise(() => access(path, constants.W_OK)).pipe(
    Effect.zipRight(directoryExists(path)),
    Effect.orElseSucceed(() => false)
  );

/** Size in bytes, 0 for a missing file. */
export const fileSize = (path: AbsolutePath): Effect.Effect<number, SystemError> =>
  statFile(path).pipe(
    Effect.map(
      Option.match({
        onNone: (): number => 0,
        onSome: (info): number => info.size,
      })
    )
  );

/** Entry names of a directory, sorted. A missing directory lists as empty. */
export const listDirectory = (
  path: AbsolutePath
): Effect.Effect<readonly string[], SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<readonly string[]> => {
      try {
        const entries = await readdir(path, { withFileTypes: true });
        return entries
          .filter((entry) => entry.isFile())
          .map((entry) => entry.name)
          .sort();
      } catch (e) {
        if (hasErrorCode(e, "ENOENT")) {
          return [];
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(path, e),
  });

export const chmod = (path: AbsolutePath, mode: number): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeChmod(path, mode),
    catch: (e): SystemError => writeError(path, e),
  });

/** Streaming SHA-256 of a file, lowercase hex. */
export const sha256File = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<string> => {
      const hash = createHash("sha256");
      for await (const chunk of createReadStream(path)) {
        hash.update(chunk);
      }
      return hash.digest("hex");
    },
    catch: (e): SystemError => readError(path, e),
  });
