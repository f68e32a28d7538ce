// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** lenient: a failed segment is a warning; strict: it fails the database. */
export const REPLAY_MODE_VALUES = ["lenient", "strict"] as const;
export type ReplayMode = (typeof REPLAY_MODE_VALUES)[number];
export const REPLAY_MODE_DEFAULT: ReplayMode = "lenient";

export const BACKUP_MODE_VALUES = ["full", "incremental"] as const;
export type BackupMode = (typeof BACKUP_MODE_VALUES)[number];

export const HEALTH_STATUS_VALUES = ["ok", "warn", "fail"] as const;
export type HealthStatus = (typeof HEALTH_STATUS_VALUES)[number];
