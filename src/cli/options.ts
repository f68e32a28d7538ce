// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these keeps naming and
 * descriptions consistent across commands.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import type { Option } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly debug: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly config: Options<Option.Option<string>>;
  readonly envFile: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  debug: O.boolean("debug").pipe(O.withDescription("Debug logging")),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to the TOML settings file"),
    O.optional
  ),
  envFile: O.text("env-file").pipe(
    O.withDescription("Path to the credential file (default: .env)"),
    O.optional
  ),
};

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
  readonly envFile: Option.Option<string>;
}

// Shared per-command options

export const databaseOption: Options<Option.Option<string>> = O.text("database").pipe(
  O.withAlias("d"),
  O.withDescription("Database name"),
  O.optional
);

export const keyFileOption: Options<Option.Option<string>> = O.text("key").pipe(
  O.withDescription("Encryption key file (default: .backup_encryption_key)"),
  O.optional
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show what would be deleted without deleting it")
);

export const keepOption: Options<Option.Option<number>> = O.integer("keep").pipe(
  O.withDescription("Number of generations to keep"),
  O.optional
);

// backup

export const backupOptions: {
  readonly full: Options<boolean>;
  readonly incremental: Options<boolean>;
  readonly includeEmpty: Options<boolean>;
  readonly noCompress: Options<boolean>;
  readonly noChecksums: Options<boolean>;
} = {
  full: O.boolean("full").pipe(O.withDescription("Full backup of every target database")),
  incremental: O.boolean("incremental").pipe(
    O.withDescription("Binlog events since the last recorded coordinate")
  ),
  includeEmpty: O.boolean("include-empty").pipe(
    O.withDescription("Also back up databases without tables")
  ),
  noCompress: O.boolean("no-compress").pipe(O.withDescription("Skip gzip compression")),
  noChecksums: O.boolean("no-checksums").pipe(O.withDescription("Skip sha256 checksum files")),
};

// restore

export const restoreOptions: {
  readonly backupFile: Options<Option.Option<string>>;
  readonly last: Options<boolean>;
  readonly toTimestamp: Options<Option.Option<string>>;
  readonly fullOnly: Options<boolean>;
  readonly strict: Options<boolean>;
  readonly lenient: Options<boolean>;
  readonly interactive: Options<boolean>;
} = {
  backupFile: O.text("backup-file").pipe(
    O.withDescription("Full backup to restore, or LATEST"),
    O.optional
  ),
  last: O.boolean("last").pipe(O.withDescription("Same as --backup-file LATEST")),
  toTimestamp: O.text("to-timestamp").pipe(
    O.withDescription('Replay binlogs up to "YYYY-MM-DD HH:MM:SS"'),
    O.optional
  ),
  fullOnly: O.boolean("full-only").pipe(O.withDescription("Skip binlog replay")),
  strict: O.boolean("strict").pipe(O.withDescription("Fail the database on a replay error")),
  lenient: O.boolean("lenient").pipe(O.withDescription("Warn and continue on a replay error")),
  interactive: O.boolean("interactive").pipe(
    O.withAlias("i"),
    O.withDescription("Choose the database and backup interactively (default on a terminal)")
  ),
};

// encrypt

export const encryptOptions: {
  readonly encrypt: Options<Option.Option<string>>;
  readonly decrypt: Options<Option.Option<string>>;
  readonly output: Options<Option.Option<string>>;
} = {
  encrypt: O.text("encrypt").pipe(O.withDescription("File to encrypt"), O.optional),
  decrypt: O.text("decrypt").pipe(O.withDescription("File to decrypt"), O.optional),
  output: O.text("output").pipe(
    O.withAlias("o"),
    O.withDescription("Output file"),
    O.optional
  ),
};
