// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for the settings file (`mariadb-pitr.toml`).
 * Every field is optional in the file; decoding fills in the defaults, so
 * an empty document decodes to a complete {@link Settings}.
 */

import { Schema } from "effect";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  REPLAY_MODE_DEFAULT,
  REPLAY_MODE_VALUES,
  type ReplayMode,
} from "./field-values";

const PositiveInt = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(1));
const NonNegativeInt = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0));
const NonEmptyString = Schema.String.pipe(Schema.minLength(1));

// ============================================================================
// [logging]
// ============================================================================

export interface LoggingSettings {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface LoggingSettingsInput {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
}

const loggingDefaults: LoggingSettings = {
  level: LOG_LEVEL_DEFAULT,
  format: LOG_FORMAT_DEFAULT,
};

export const loggingSettingsSchema: Schema.Schema<LoggingSettings, LoggingSettingsInput> =
  Schema.Struct({
    level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
      default: (): LogLevel => LOG_LEVEL_DEFAULT,
    }),
    format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
      default: (): LogFormat => LOG_FORMAT_DEFAULT,
    }),
  });

// ============================================================================
// [backup]
// ============================================================================

export interface BackupSettings {
  /** Concurrent full dumps. */
  readonly parallelism: number;
  readonly compress: boolean;
  readonly checksums: boolean;
  /** Container directories searched for closed binlog segments. */
  readonly binlogSearchPaths: readonly string[];
}

export interface BackupSettingsInput {
  readonly parallelism?: number | undefined;
  readonly compress?: boolean | undefined;
  readonly checksums?: boolean | undefined;
  readonly binlogSearchPaths?: readonly string[] | undefined;
}

const DEFAULT_BINLOG_SEARCH_PATHS: readonly string[] = ["/var/lib/mysql/binlogs", "/var/lib/mysql"];

const backupDefaults: BackupSettings = {
  parallelism: 3,
  compress: true,
  checksums: true,
  binlogSearchPaths: DEFAULT_BINLOG_SEARCH_PATHS,
};

export const backupSettingsSchema: Schema.Schema<BackupSettings, BackupSettingsInput> =
  Schema.Struct({
    parallelism: Schema.optionalWith(Schema.Number.pipe(Schema.int(), Schema.between(1, 16)), {
      default: (): number => backupDefaults.parallelism,
    }),
    compress: Schema.optionalWith(Schema.Boolean, { default: (): boolean => true }),
    checksums: Schema.optionalWith(Schema.Boolean, { default: (): boolean => true }),
    binlogSearchPaths: Schema.optionalWith(Schema.Array(NonEmptyString), {
      default: (): readonly string[] => DEFAULT_BINLOG_SEARCH_PATHS,
    }),
  });

// ============================================================================
// [retention]
// ============================================================================

export interface RetentionSettings {
  readonly keepFullBackups: number;
  readonly keepBinlogGenerations: number;
}

export interface RetentionSettingsInput {
  readonly keepFullBackups?: number | undefined;
  readonly keepBinlogGenerations?: number | undefined;
}

const retentionDefaults: RetentionSettings = {
  keepFullBackups: 7,
  keepBinlogGenerations: 2,
};

export const retentionSettingsSchema: Schema.Schema<RetentionSettings, RetentionSettingsInput> =
  Schema.Struct({
    keepFullBackups: Schema.optionalWith(PositiveInt, {
      default: (): number => retentionDefaults.keepFullBackups,
    }),
    keepBinlogGenerations: Schema.optionalWith(PositiveInt, {
      default: (): number => retentionDefaults.keepBinlogGenerations,
    }),
  });

// ============================================================================
// [restore]
// ============================================================================

export interface RestoreSettings {
  readonly replayMode: ReplayMode;
}

export interface RestoreSettingsInput {
  readonly replayMode?: ReplayMode | undefined;
}

const restoreDefaults: RestoreSettings = { replayMode: REPLAY_MODE_DEFAULT };

export const restoreSettingsSchema: Schema.Schema<RestoreSettings, RestoreSettingsInput> =
  Schema.Struct({
    replayMode: Schema.optionalWith(Schema.Literal(...REPLAY_MODE_VALUES), {
      default: (): ReplayMode => REPLAY_MODE_DEFAULT,
    }),
  });

// ============================================================================
// [lock]
// ============================================================================

export interface LockSettings {
  readonly waitSeconds: number;
  readonly staleAfterMinutes: number;
}

export interface LockSettingsInput {
  readonly waitSeconds?: number | undefined;
  readonly staleAfterMinutes?: number | undefined;
}

const lockDefaults: LockSettings = { waitSeconds: 30, staleAfterMinutes: 360 };

export const lockSettingsSchema: Schema.Schema<LockSettings, LockSettingsInput> = Schema.Struct({
  waitSeconds: Schema.optionalWith(NonNegativeInt, {
    default: (): number => lockDefaults.waitSeconds,
  }),
  staleAfterMinutes: Schema.optionalWith(PositiveInt, {
    default: (): number => lockDefaults.staleAfterMinutes,
  }),
});

// ============================================================================
// [health]
// ============================================================================

export interface HealthSettings {
  readonly maxBackupAgeDays: number;
  readonly minKeyBytes: number;
}

export interface HealthSettingsInput {
  readonly maxBackupAgeDays?: number | undefined;
  readonly minKeyBytes?: number | undefined;
}

const healthDefaults: HealthSettings = { maxBackupAgeDays: 7, minKeyBytes: 20 };

export const healthSettingsSchema: Schema.Schema<HealthSettings, HealthSettingsInput> =
  Schema.Struct({
    maxBackupAgeDays: Schema.optionalWith(PositiveInt, {
      default: (): number => healthDefaults.maxBackupAgeDays,
    }),
    minKeyBytes: Schema.optionalWith(NonNegativeInt, {
      default: (): number => healthDefaults.minKeyBytes,
    }),
  });

// ============================================================================
// [paths]
// ============================================================================

export interface PathSettings {
  /** Credential file, relative to the working directory unless absolute. */
  readonly envFile: string;
  readonly keyFile: string;
}

export interface PathSettingsInput {
  readonly envFile?: string | undefined;
  readonly keyFile?: string | undefined;
}

const pathDefaults: PathSettings = { envFile: ".env", keyFile: ".backup_encryption_key" };

export const pathSettingsSchema: Schema.Schema<PathSettings, PathSettingsInput> = Schema.Struct({
  envFile: Schema.optionalWith(NonEmptyString, { default: (): string => pathDefaults.envFile }),
  keyFile: Schema.optionalWith(NonEmptyString, { default: (): string => pathDefaults.keyFile }),
});

// ============================================================================
// Settings file
// ============================================================================

export interface Settings {
  readonly logging: LoggingSettings;
  readonly backup: BackupSettings;
  readonly retention: RetentionSettings;
  readonly restore: RestoreSettings;
  readonly lock: LockSettings;
  readonly health: HealthSettings;
  readonly paths: PathSettings;
}

export interface SettingsInput {
  readonly logging?: LoggingSettingsInput | undefined;
  readonly backup?: BackupSettingsInput | undefined;
  readonly retention?: RetentionSettingsInput | undefined;
  readonly restore?: RestoreSettingsInput | undefined;
  readonly lock?: LockSettingsInput | undefined;
  readonly health?: HealthSettingsInput | undefined;
  readonly paths?: PathSettingsInput | undefined;
}

export const settingsSchema: Schema.Schema<Settings, SettingsInput> = Schema.Struct({
  logging: Schema.optionalWith(loggingSettingsSchema, {
    default: (): LoggingSettings => loggingDefaults,
  }),
  backup: Schema.optionalWith(backupSettingsSchema, {
    default: (): BackupSettings => backupDefaults,
  }),
  retention: Schema.optionalWith(retentionSettingsSchema, {
    default: (): RetentionSettings => retentionDefaults,
  }),
  restore: Schema.optionalWith(restoreSettingsSchema, {
    default: (): RestoreSettings => restoreDefaults,
  }),
  lock: Schema.optionalWith(lockSettingsSchema, { default: (): LockSettings => lockDefaults }),
  health: Schema.optionalWith(healthSettingsSchema, {
    default: (): HealthSettings => healthDefaults,
  }),
  paths: Schema.optionalWith(pathSettingsSchema, { default: (): PathSettings => pathDefaults }),
});

export const DEFAULT_SETTINGS: Settings = {
  logging: loggingDefaults,
  backup: backupDefaults,
  retention: retentionDefaults,
  restore: restoreDefaults,
  lock: lockDefaults,
  health: healthDefaults,
  paths: pathDefaults,
};
