// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * layer wiring and error display so each command stays focused on its logic.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { Prompt } from "@effect/cli/Prompt";
import { Effect, Layer, Match, Option, pipe } from "effect";
import { type ConnectionConfig, loadConnectionConfig } from "../config/connection";
import { type EnvConfig, EnvConfigSpec } from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadSettingsWithHome } from "../config/loader";
import { resolveLogFormat, resolveLogLevel } from "../config/resolve";
import type { Settings } from "../config/schema";
import { PitrLoggerLive, colorize, detectColorSupport } from "../lib/effect-logger";
import { type AppError, ConfigError, ErrorCode, causeProps, isAppError } from "../lib/errors";
import { APP_NAME, APP_VERSION } from "../lib/version";
import type { DatabaseClient } from "../pitr/client";
import { type PitrContext, pitrContextLayer } from "../pitr/context";
import { DatabaseClientLive } from "../pitr/docker-client";

import { executeBackup } from "./commands/backup";
import { executeCleanupBackups, executeCleanupBinlogs } from "./commands/cleanup";
import { executeEncrypt } from "./commands/encrypt";
import { executeHealth } from "./commands/health";
import { executeList } from "./commands/list";
import { executeRestore } from "./commands/restore";

import {
  type GlobalOptions,
  backupOptions,
  databaseOption,
  dryRun,
  encryptOptions,
  globalOptions,
  keepOption,
  keyFileOption,
  restoreOptions,
} from "./options";

/** Resolved runtime context. CLI flags > environment > settings file. */
export interface CommandContext {
  readonly env: EnvConfig;
  readonly settings: Settings;
  readonly connection: ConnectionConfig;
  readonly logLevel: LogLevel;
  readonly format: LogFormat;
}

// Context resolution

const readEnvironment: Effect.Effect<EnvConfig, ConfigError> = Effect.mapError(
  EnvConfigSpec,
  (e) =>
    new ConfigError({
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
      message: `Invalid environment: ${String(e)}`,
      ...causeProps(e),
    })
);

export const resolveContext = (globals: GlobalOptions): Effect.Effect<CommandContext, AppError> =>
  Effect.gen(function* () {
    const env = yield* readEnvironment;
    const settings = yield* loadSettingsWithHome(
      Option.orElse(globals.config, () => env.configPath),
      env.home
    );
    const connection = yield* loadConnectionConfig({
      explicit: globals.envFile,
      fallback: settings.paths.envFile,
    });

    return {
      env,
      settings,
      connection,
      logLevel: resolveLogLevel(globals, env, settings),
      format: resolveLogFormat(globals, env, settings),
    };
  });

// Error display

/** Sync because it runs on the exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
    ),
    Match.when("pretty", () =>
      process.stderr.write(`${colorize("red", "✗", detectColorSupport())} ${err.message}\n`)
    ),
    Match.exhaustive
  );
};

// Command runner

type CommandEnv = PitrContext | DatabaseClient | Prompt.Environment;

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, AppError, CommandEnv>
): Effect.Effect<void, AppError, Prompt.Environment> =>
  Effect.gen(function* () {
    const ctx = yield* Effect.tapError(resolveContext(globals), (err) =>
      Effect.sync(() => displayError(err, globals.json ? "json" : "pretty"))
    );
    const services = Layer.mergeAll(
      pitrContextLayer(ctx.settings, ctx.connection),
      DatabaseClientLive(ctx.connection)
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(services),
      Effect.provide(PitrLoggerLive({ level: ctx.logLevel, format: ctx.format }))
    );
  });

// Subcommand definitions

const backupCmd = Command.make(
  "backup",
  { ...globalOptions, ...backupOptions, database: databaseOption, key: keyFileOption },
  (args) =>
    runCommand(args, "backup", (ctx) =>
      executeBackup({ ...args, format: ctx.format, settings: ctx.settings })
    )
).pipe(Command.withDescription("Full or incremental backup of the configured databases"));

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, ...restoreOptions, database: databaseOption, key: keyFileOption },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      executeRestore({ ...args, format: ctx.format, settings: ctx.settings, env: ctx.env })
    )
).pipe(Command.withDescription("Restore a full backup and replay binlogs up to a point in time"));

const cleanupBackupsCmd = Command.make(
  "cleanup-backups",
  { ...globalOptions, keep: keepOption, dryRun },
  (args) =>
    runCommand(args, "cleanup-backups", (ctx) =>
      executeCleanupBackups({
        keep: args.keep,
        defaultKeep: ctx.settings.retention.keepFullBackups,
        dryRun: args.dryRun,
        format: ctx.format,
      })
    )
).pipe(Command.withDescription("Delete backup generations beyond the newest N fulls"));

const cleanupBinlogsCmd = Command.make(
  "cleanup-binlogs",
  { ...globalOptions, keep: keepOption, dryRun },
  (args) =>
    runCommand(args, "cleanup-binlogs", (ctx) =>
      executeCleanupBinlogs({
        keep: args.keep,
        defaultKeep: ctx.settings.retention.keepBinlogGenerations,
        dryRun: args.dryRun,
        format: ctx.format,
      })
    )
).pipe(Command.withDescription("Delete staged binlogs no retained generation needs"));

const encryptCmd = Command.make(
  "encrypt",
  { ...globalOptions, ...encryptOptions, key: keyFileOption },
  (args) =>
    runCommand(args, "encrypt", (ctx) =>
      executeEncrypt({ ...args, format: ctx.format, settings: ctx.settings })
    )
).pipe(Command.withDescription("Encrypt or decrypt a single file with the backup key"));

const listCmd = Command.make("list", { ...globalOptions, database: databaseOption }, (args) =>
  runCommand(args, "list", (ctx) => executeList({ database: args.database, format: ctx.format }))
).pipe(Command.withDescription("List backup generations and staged binlogs"));

const healthCmd = Command.make("health", { ...globalOptions, key: keyFileOption }, (args) =>
  runCommand(args, "health", (ctx) =>
    executeHealth({ key: args.key, format: ctx.format, settings: ctx.settings })
  )
).pipe(Command.withDescription("Check server, directories, key and backup freshness"));

// Root command

const root = Command.make(APP_NAME).pipe(
  Command.withDescription("Point-in-time recovery backups for containerized MariaDB"),
  Command.withSubcommands([
    backupCmd,
    restoreCmd,
    cleanupBackupsCmd,
    cleanupBinlogsCmd,
    encryptCmd,
    listCmd,
    healthCmd,
  ])
);

export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(root, {
    name: APP_NAME,
    version: APP_VERSION,
  });
