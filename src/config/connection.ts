// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Credentials and locations from the `.env` file, overlaid by same-named
 * process environment variables and validated with zod.
 */

import { Effect, Option, pipe } from "effect";
import { z } from "zod";
import { ConfigError, ErrorCode, type SystemError } from "../lib/errors";
import { parseKeyValue } from "../lib/file-parsers";
import { toAbsolutePathEffect } from "../lib/paths";
import {
  type AbsolutePath,
  type ContainerName,
  type DatabaseName,
  isContainerName,
  isDatabaseName,
  pathJoin,
} from "../lib/types";
import { readFileOption } from "../system/fs";

const containerNameSchema = z
  .string()
  .refine((s): s is ContainerName => isContainerName(s), {
    message: "Container name must match [a-zA-Z0-9][a-zA-Z0-9_.-]*",
  });

const databaseNameSchema = z
  .string()
  .refine((s): s is DatabaseName => isDatabaseName(s), {
    message: "Database name must match [A-Za-z0-9_$-]+ and must not contain _full_ or _incremental_",
  });

export const envFileSchema = z.object({
  MARIADB_CONTAINER: containerNameSchema.default("mariadb"),
  MARIADB_ROOT_USER: z.string().min(1).default("root"),
  MARIADB_ROOT_PASSWORD: z.string().optional(),
  BACKUP_DIR: z.string().min(1).default("./backups"),
  BINLOG_DIR: z.string().min(1).optional(),
  CONTAINER_RUNTIME: z.enum(["docker", "podman"]).default("docker"),
  MARIADB_DATABASE1: databaseNameSchema.optional(),
  MARIADB_DATABASE2: databaseNameSchema.optional(),
  MARIADB_DATABASE3: databaseNameSchema.optional(),
  MARIADB_DATABASE4: databaseNameSchema.optional(),
  MARIADB_DATABASE5: databaseNameSchema.optional(),
});

export type EnvFile = z.infer<typeof envFileSchema>;

export type ContainerRuntime = EnvFile["CONTAINER_RUNTIME"];

const ENV_KEYS: readonly (keyof EnvFile)[] = envFileSchema.keyof().options;

export interface ConnectionConfig {
  readonly container: ContainerName;
  readonly user: string;
  /** None means the client connects without a password. */
  readonly password: Option.Option<string>;
  readonly runtime: ContainerRuntime;
  readonly backupDir: AbsolutePath;
  readonly binlogDir: AbsolutePath;
  /** MARIADB_DATABASE1..5, used when discovery fails. */
  readonly fallbackDatabases: readonly DatabaseName[];
}

/**
 * Later sources win. Empty values count as unset so that
 * `MARIADB_ROOT_PASSWORD=` selects a passwordless login.
 */
export const mergeEnvSources = (
  ...sources: readonly Readonly<Record<string, string | undefined>>[]
): Record<string, string> => {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    for (const key of ENV_KEYS) {
      const value = source[key];
      if (value !== undefined && value !== "") {
        merged[key] = value;
      }
    }
  }
  return merged;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`).join("\n");

export const validateEnvFile = (
  raw: Record<string, string>,
  context: string
): Effect.Effect<EnvFile, ConfigError> => {
  const result = envFileSchema.safeParse(raw);
  return result.success
    ? Effect.succeed(result.data)
    : Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid credentials in ${context}:\n${formatIssues(result.error)}`,
          path: context,
        })
      );
};

export const toConnectionConfig = (
  env: EnvFile,
  cwd: string = process.cwd()
): Effect.Effect<ConnectionConfig, ConfigError> =>
  Effect.gen(function* () {
    const backupDir = yield* toAbsolutePathEffect(env.BACKUP_DIR, cwd);
    const binlogDir = yield* pipe(
      Option.fromNullable(env.BINLOG_DIR),
      Option.match({
        onNone: (): Effect.Effect<AbsolutePath, ConfigError> =>
          Effect.succeed(pathJoin(backupDir, "binlogs")),
        onSome: (dir): Effect.Effect<AbsolutePath, ConfigError> => toAbsolutePathEffect(dir, cwd),
      })
    );

    const fallbackDatabases = [
      env.MARIADB_DATABASE1,
      env.MARIADB_DATABASE2,
      env.MARIADB_DATABASE3,
      env.MARIADB_DATABASE4,
      env.MARIADB_DATABASE5,
    ].filter((db): db is DatabaseName => db !== undefined);

    return {
      container: env.MARIADB_CONTAINER,
      user: env.MARIADB_ROOT_USER,
      password: Option.fromNullable(env.MARIADB_ROOT_PASSWORD),
      runtime: env.CONTAINER_RUNTIME,
      backupDir,
      binlogDir,
      fallbackDatabases,
    };
  });

export interface EnvFileSource {
  /** From `--env-file`; must exist. */
  readonly explicit: Option.Option<string>;
  /** From the settings file; silently skipped when absent. */
  readonly fallback: string;
}

/**
 * Read the credential file and overlay `processEnv`.
 * A missing default file leaves only the process environment.
 */
export const loadConnectionConfig = (
  source: EnvFileSource,
  processEnv: Readonly<Record<string, string | undefined>> = process.env
): Effect.Effect<ConnectionConfig, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const isExplicit = Option.isSome(source.explicit);
    const filePath = yield* toAbsolutePathEffect(Option.getOrElse(source.explicit, () => source.fallback));
    const content = yield* readFileOption(filePath);

    if (Option.isNone(content)) {
      if (isExplicit) {
        return yield* Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Credential file not found: ${filePath}`,
            path: filePath,
          })
        );
      }
      yield* Effect.logDebug(`No credential file at ${filePath}; using the process environment`);
    }

    const fromFile = Option.match(content, {
      onNone: (): Record<string, string> => ({}),
      onSome: parseKeyValue,
    });
    const env = yield* validateEnvFile(mergeEnvSources(fromFile, processEnv), filePath);
    return yield* toConnectionConfig(env);
  });
