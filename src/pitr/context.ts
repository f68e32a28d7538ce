// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Per-invocation context: where the backups live, the decoded settings
 * and the connection details. These hold data, not implementations.
 */

import { Context, Effect, Layer } from "effect";
import type { ConnectionConfig } from "../config/connection";
import type { Settings } from "../config/schema";
import type { GeneralError, SystemError } from "../lib/errors";
import { type BackupLayout, backupLayout } from "../lib/paths";
import { withLock } from "../system/lock";

/**
 * BackupPaths tag identifier type.
 */
export interface BackupPaths {
  readonly _tag: "BackupPaths";
}

export const BackupPaths: Context.Tag<BackupPaths, BackupLayout> = Context.GenericTag<
  BackupPaths,
  BackupLayout
>("mariadb-pitr/BackupPaths");

/**
 * PitrSettings tag identifier type.
 */
export interface PitrSettings {
  readonly _tag: "PitrSettings";
}

export const PitrSettings: Context.Tag<PitrSettings, Settings> = Context.GenericTag<
  PitrSettings,
  Settings
>("mariadb-pitr/PitrSettings");

/**
 * Connection tag identifier type.
 */
export interface Connection {
  readonly _tag: "Connection";
}

export const Connection: Context.Tag<Connection, ConnectionConfig> = Context.GenericTag<
  Connection,
  ConnectionConfig
>("mariadb-pitr/Connection");

/** Context shared by every command that touches the backup directory. */
export type PitrContext = BackupPaths | PitrSettings | Connection;

export const pitrContextLayer = (
  settings: Settings,
  connection: ConnectionConfig
): Layer.Layer<PitrContext> =>
  Layer.mergeAll(
    Layer.succeed(BackupPaths, backupLayout(connection.backupDir, connection.binlogDir)),
    Layer.succeed(PitrSettings, settings),
    Layer.succeed(Connection, connection)
  );

// ============================================================================
// State lock
// ============================================================================

const STATE_LOCK = "state";
const POLL_INTERVAL_MS = 100;

/**
 * Serialises backup, restore and cleanup runs: marker read-modify-write,
 * segment staging and segment deletion all happen under this lock.
 */
export const withStateLock = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<A, E | GeneralError | SystemError, R | BackupPaths | PitrSettings> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const settings = yield* PitrSettings;
    return yield* withLock(STATE_LOCK, effect, {
      lockDir: layout.locks,
      maxWaitMs: settings.lock.waitSeconds * 1000,
      retryIntervalMs: POLL_INTERVAL_MS,
      staleAfterMs: settings.lock.staleAfterMinutes * 60 * 1000,
    });
  });
