// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tagged error hierarchy. Every error carries a numeric code from one table;
 * the code doubles as the process exit status (capped at 125).
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly LOCK_BUSY: 3;
  readonly HEALTH_CHECK_FAILED: 5;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly KEY_FILE_MISSING: 13;

  // System (20-29)
  readonly DIRECTORY_CREATE_FAILED: 22;
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;

  // Database (30-39)
  readonly CONNECTION_FAILED: 30;
  readonly DATABASE_NOT_FOUND: 31;
  readonly DUMP_FAILED: 32;
  readonly BINLOG_DISABLED: 33;
  readonly STATUS_QUERY_FAILED: 34;
  readonly IMPORT_FAILED: 35;
  readonly BINLOG_REPLAY_FAILED: 36;
  readonly BINLOG_COPY_FAILED: 37;

  // Encryption (40-49)
  readonly ENCRYPT_FAILED: 40;
  readonly DECRYPT_FAILED: 41;
  readonly CHECKSUM_MISMATCH: 42;
  readonly KEY_GENERATION_FAILED: 43;

  // Backup/Restore (50-59)
  readonly BACKUP_FAILED: 50;
  readonly RESTORE_FAILED: 51;
  readonly BACKUP_NOT_FOUND: 52;
  readonly MARKER_NOT_FOUND: 53;
  readonly CLEANUP_FAILED: 54;
}

export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  LOCK_BUSY: 3,
  HEALTH_CHECK_FAILED: 5,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  KEY_FILE_MISSING: 13,

  DIRECTORY_CREATE_FAILED: 22,
  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  CONNECTION_FAILED: 30,
  DATABASE_NOT_FOUND: 31,
  DUMP_FAILED: 32,
  BINLOG_DISABLED: 33,
  STATUS_QUERY_FAILED: 34,
  IMPORT_FAILED: 35,
  BINLOG_REPLAY_FAILED: 36,
  BINLOG_COPY_FAILED: 37,

  ENCRYPT_FAILED: 40,
  DECRYPT_FAILED: 41,
  CHECKSUM_MISMATCH: 42,
  KEY_GENERATION_FAILED: 43,

  BACKUP_FAILED: 50,
  RESTORE_FAILED: 51,
  BACKUP_NOT_FOUND: 52,
  MARKER_NOT_FOUND: 53,
  CLEANUP_FAILED: 54,
};

type GeneralErrorCode = 1 | 2 | 3 | 5;
type ConfigErrorCode = 10 | 11 | 12 | 13;
type SystemErrorCode = 22 | 26 | 27 | 28;
type DatabaseErrorCode = 30 | 31 | 32 | 33 | 34 | 35 | 36 | 37;
type CryptoErrorCode = 40 | 41 | 42 | 43;
type BackupErrorCode = 50 | 51 | 52 | 53 | 54;

// ============================================================================
// Tagged errors
// ============================================================================

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class DatabaseError extends Data.TaggedError("DatabaseError")<{
  readonly code: DatabaseErrorCode;
  readonly message: string;
  readonly database?: string;
  readonly cause?: Error;
}> {}

export class CryptoError extends Data.TaggedError("CryptoError")<{
  readonly code: CryptoErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: BackupErrorCode;
  readonly message: string;
  readonly database?: string;
  readonly cause?: Error;
}> {}

export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | DatabaseError
  | CryptoError
  | BackupError;

const APP_ERROR_TAGS: ReadonlySet<string> = new Set([
  "GeneralError",
  "ConfigError",
  "SystemError",
  "DatabaseError",
  "CryptoError",
  "BackupError",
]);

export const isAppError = (e: unknown): e is AppError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  APP_ERROR_TAGS.has(e._tag);

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: number): number => Math.min(code, 125);

export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spread into an error constructor: `...causeProps(e)`. */
export const causeProps = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
