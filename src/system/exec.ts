// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Subprocess execution via the @effect/platform Command API.
 *
 * Arguments are always structured arrays, never shell strings. Streaming
 * variants move bytes straight between processes and files, so a dump or
 * an import never has to fit in memory.
 */

import { createReadStream } from "node:fs";
import { pipeline } from "node:stream";
import { createGunzip } from "node:zlib";
import { Command, FileSystem } from "@effect/platform";
import { NodeContext, NodeStream } from "@effect/platform-node";
import { Effect, Either, Sink, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeProps, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

export interface ExecOptions {
  readonly env?: Record<string, string>;
  readonly cwd?: string;
  readonly stdin?: string;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't carry the R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...causeProps(e),
  });

/** Non-empty guarantee prevents index errors on destructuring. */
interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const buildCommand = (
  { cmd, args }: ValidatedCommand,
  options: ExecOptions,
  stdin: "feed" | "pipe"
): Command.Command =>
  pipe(
    Command.make(cmd, ...args),
    (c) => (options.env !== undefined ? Command.env(c, options.env) : c),
    (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
    // An empty feed closes stdin so interactive clients never wait on the terminal.
    (c) => (stdin === "feed" ? Command.feed(c, options.stdin ?? "") : c)
  );

export const formatCommand = (command: readonly string[]): string => command.join(" ");

export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const validated = yield* validateCommand(command);

    return yield* withExecutor(
      Effect.gen(function* () {
        const proc = yield* Command.start(buildCommand(validated, options, "feed"));

        const [exitCode, stdout, stderr] = yield* Effect.all(
          [proc.exitCode, streamToString(proc.stdout), streamToString(proc.stderr)],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(formatCommand(command), e)));
  });

// ============================================================================
// Streaming
// ============================================================================

/** Stream stdout into `dest`. stderr is captured; stdout in the result is always empty. */
export const execToFile = (
  command: readonly string[],
  dest: AbsolutePath,
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const validated = yield* validateCommand(command);

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const proc = yield* Command.start(buildCommand(validated, options, "feed"));

        const [exitCode, , stderr] = yield* Effect.all(
          [proc.exitCode, Stream.run(proc.stdout, fs.sink(dest)), streamToString(proc.stderr)],
          { concurrency: 3 }
        );

        return { exitCode, stdout: "", stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(formatCommand(command), e)));
  });

/**
 * Run `command` with `input` streamed into its stdin. A process that exits
 * early reports its own exit code and stderr rather than the broken pipe.
 */
export const execWithInput = <E>(
  command: readonly string[],
  input: Stream.Stream<Uint8Array, E>,
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError | E> =>
  Effect.gen(function* () {
    const validated = yield* validateCommand(command);

    const label = formatCommand(command);

    const { fed, result } = yield* withExecutor(
      Effect.gen(function* () {
        const proc = yield* Command.start(buildCommand(validated, options, "pipe"));
        const stdin = Sink.mapError(proc.stdin, (e) => execError(label, e));

        const [fed, exitCode, stdout, stderr] = yield* Effect.all(
          [
            Effect.either(Stream.run(input, stdin)),
            proc.exitCode,
            streamToString(proc.stdout),
            streamToString(proc.stderr),
          ],
          { concurrency: "unbounded" }
        );

        return { fed, result: { exitCode, stdout, stderr } };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(label, e)));

    if (Either.isLeft(fed) && result.exitCode === 0) {
      return yield* Effect.fail(fed.left);
    }
    return result;
  });

export interface PipedResult {
  readonly producer: ExecResult;
  readonly consumer: ExecResult;
}

/** `producer | consumer`, reporting both exit codes. */
export const execPiped = (
  producer: readonly string[],
  consumer: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<PipedResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const left = yield* validateCommand(producer);
    const right = yield* validateCommand(consumer);
    const label = `${formatCommand(producer)} | ${formatCommand(consumer)}`;

    return yield* withExecutor(
      Effect.gen(function* () {
        const source = yield* Command.start(buildCommand(left, options, "feed"));
        const sink = yield* Command.start(buildCommand(right, options, "pipe"));

        const [, producerExit, producerErr, consumerExit, consumerOut, consumerErr] =
          yield* Effect.all(
            [
              Effect.either(Stream.run(source.stdout, sink.stdin)),
              source.exitCode,
              streamToString(source.stderr),
              sink.exitCode,
              streamToString(sink.stdout),
              streamToString(sink.stderr),
            ],
            { concurrency: "unbounded" }
          );

        return {
          producer: { exitCode: producerExit, stdout: "", stderr: producerErr },
          consumer: { exitCode: consumerExit, stdout: consumerOut, stderr: consumerErr },
        };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(label, e)));
  });

/** Bytes of a file, optionally gunzipped on the fly. */
export const fileInputStream = (
  path: AbsolutePath,
  options: { readonly gunzip?: boolean } = {}
): Stream.Stream<Uint8Array, SystemError> =>
  NodeStream.fromReadable(
    () =>
      options.gunzip === true
        ? // pipeline destroys the returned gunzip stream on any upstream error
          pipeline(createReadStream(path), createGunzip(), () => undefined)
        : createReadStream(path),
    (e): SystemError =>
      new SystemError({
        code: ErrorCode.FILE_READ_FAILED,
        message: `Failed to read ${path}: ${errorMessage(e)}`,
        ...causeProps(e),
      })
  );
