// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Match, Option, pipe } from "effect";
import type { HealthStatus, LogFormat } from "../../config/field-values";
import type { Settings } from "../../config/schema";
import type { AppError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import type { DatabaseClient } from "../../pitr/client";
import type { PitrContext } from "../../pitr/context";
import { type HealthReport, healthFailure, runHealthChecks } from "../../pitr/health";
import { formatTable, resolveKeyFile } from "./utils";

export interface HealthCommandOptions {
  readonly key: Option.Option<string>;
  readonly format: LogFormat;
  readonly settings: Settings;
}

const STATUS_MARK: Record<HealthStatus, string> = { ok: "✓", warn: "!", fail: "✗" };

export const renderHealthReport = (report: HealthReport): readonly string[] => [
  ...formatTable(report.checks.map((c) => [STATUS_MARK[c.status], c.name, c.detail])),
  report.healthy ? "Healthy" : "Unhealthy",
];

export const executeHealth = (
  options: HealthCommandOptions
): Effect.Effect<void, AppError, PitrContext | DatabaseClient> =>
  Effect.gen(function* () {
    const keyFile = yield* resolveKeyFile(options.key, options.settings);
    const report = yield* runHealthChecks(keyFile);

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeJson(report)),
      Match.when("pretty", () => writeOutput(renderHealthReport(report).join("\n"))),
      Match.exhaustive
    );

    yield* Option.match(healthFailure(report), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (e): Effect.Effect<never, AppError> => Effect.fail(e),
    });
  });
