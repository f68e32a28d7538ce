// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { AppError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import type { PitrContext } from "../../pitr/context";
import { type BackupListing, type DatabaseListing, listBackups } from "../../pitr/list";
import { formatBytes, formatTable, parseOptionalDatabase } from "./utils";

export interface ListCommandOptions {
  readonly database: Option.Option<string>;
  readonly format: LogFormat;
}

const databaseSection = (listing: DatabaseListing): readonly string[] => [
  `${listing.database}:`,
  ...formatTable(
    listing.generations.map((g) => [
      g.mode,
      g.timestamp,
      formatBytes(g.size),
      Option.getOrElse(g.coordinate, () => "-"),
      g.checksum ? "sha256" : "",
    ])
  ).map((line) => `  ${line.trimEnd()}`),
];

export const renderListing = (listing: BackupListing): readonly string[] => {
  if (listing.databases.length === 0 && listing.segments.length === 0) {
    return ["No backups found"];
  }
  const segmentBytes = listing.segments.reduce((sum, s) => sum + s.size, 0);
  return [
    ...listing.databases.flatMap(databaseSection),
    `binlogs: ${listing.segments.length} staged segment(s), ${formatBytes(segmentBytes)}`,
  ];
};

export const listingJson = (listing: BackupListing): unknown => ({
  databases: listing.databases.map((d) => ({
    database: d.database,
    generations: d.generations.map((g) => ({
      ...g,
      coordinate: Option.getOrNull(g.coordinate),
    })),
  })),
  segments: listing.segments,
});

export const executeList = (
  options: ListCommandOptions
): Effect.Effect<void, AppError, PitrContext> =>
  Effect.gen(function* () {
    const database = yield* parseOptionalDatabase(options.database);
    const listing = yield* listBackups(database);
    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeJson(listingJson(listing))),
      Match.when("pretty", () => writeOutput(renderListing(listing).join("\n"))),
      Match.exhaustive
    );
  });
