#!/usr/bin/env tsx
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * mariadb-pitr - point-in-time recovery backups for containerized MariaDB
 *
 * Main entry point. This is the "imperative shell": the only place the
 * Effect runtime is executed.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Option } from "effect";
import { cli } from "./cli/index";
import { ErrorCode, isAppError, toExitCode } from "./lib/errors";

export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(["node", "mariadb-pitr", ...argv]).pipe(Effect.provide(NodeContext.layer));

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => ErrorCode.GENERAL_ERROR,
        onSome: (err: unknown): number =>
          isAppError(err) ? toExitCode(err.code) : ErrorCode.INVALID_ARGS,
      }),
  });

/** App errors were already shown by the command runner; only defects are printed here. */
const logDefect = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void => {
      if (Option.isNone(Cause.failureOption(cause))) {
        console.error("Unexpected error:", Cause.pretty(cause));
      }
    },
  });

async function main(): Promise<void> {
  const exit = await Effect.runPromiseExit(program(process.argv.slice(2)));
  logDefect(exit);
  process.exitCode = exitCodeFromExit(exit);
}

const invokedPath = process.argv[1];
if (invokedPath !== undefined && import.meta.url === pathToFileURL(realpathSync(invokedPath)).href) {
  main().catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = ErrorCode.GENERAL_ERROR;
  });
}
