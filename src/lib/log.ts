// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled logging helpers. Styles travel as log annotations that
 * effect-logger.ts turns into step counters and success/failure marks.
 */

import { Data, Effect, Match, SynchronizedRef, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
}>;

const { step, success, fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("fail", () => ({ logStyle: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

export const logFail = (message: string): Effect.Effect<void> =>
  Effect.logError(message).pipe(Effect.annotateLogs(encodeStyle(fail())));

/** Tags every log line emitted by `effect` with the database it concerns. */
export const withDatabase =
  (database: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, "database", database);

/** Bypasses the logger for raw program output (tables, summaries). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

export const writeJson = (value: unknown): Effect.Effect<void> =>
  writeOutput(JSON.stringify(value, null, 2));

// ============================================================================
// StepCounter
// ============================================================================

export interface StepCounter {
  /** Increment and log atomically; concurrent calls are serialized. */
  readonly next: (message: string) => Effect.Effect<void>;
  readonly current: Effect.Effect<number>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make(0);

    return {
      next: (message: string): Effect.Effect<void> =>
        SynchronizedRef.updateAndGetEffect(ref, (n) =>
          Effect.gen(function* () {
            const current = n + 1;
            yield* logStep(current, total, message);
            return current;
          })
        ).pipe(Effect.asVoid),

      current: SynchronizedRef.get(ref),
    };
  });
