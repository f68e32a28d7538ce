// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import type { BackupMode } from "../config/field-values";
import type { SystemError } from "../lib/errors";
import type { BackupTimestamp } from "../lib/timestamp";
import type { DatabaseName } from "../lib/types";
import { fileExists, fileSize } from "../system/fs";
import {
  type Artifact,
  ArtifactOrder,
  artifactChecksumPath,
  generationCoordinate,
  listArtifacts,
  listStagedSegments,
} from "./artifacts";
import { BackupPaths } from "./context";
import { formatCoordinate } from "./coordinate";

export interface GenerationEntry {
  readonly mode: BackupMode;
  readonly timestamp: BackupTimestamp;
  readonly fileName: string;
  readonly size: number;
  /** `mysql-bin.000005 1024`; None for unknown markers and missing ones. */
  readonly coordinate: Option.Option<string>;
  readonly checksum: boolean;
}

export interface DatabaseListing {
  readonly database: DatabaseName;
  /** Newest first. */
  readonly generations: readonly GenerationEntry[];
}

export interface SegmentEntry {
  readonly name: string;
  readonly size: number;
}

export interface BackupListing {
  readonly databases: readonly DatabaseListing[];
  readonly segments: readonly SegmentEntry[];
}

const describe = (artifact: Artifact): Effect.Effect<GenerationEntry, SystemError, BackupPaths> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const { coordinate, checksum, size } = yield* Effect.all({
      coordinate: generationCoordinate(layout, artifact.database, artifact.timestamp),
      checksum: fileExists(artifactChecksumPath(layout, artifact)),
      size: fileSize(artifact.path),
    });
    return {
      mode: artifact.mode,
      timestamp: artifact.timestamp,
      fileName: artifact.fileName,
      size,
      coordinate: Option.map(coordinate, formatCoordinate),
      checksum,
    };
  });

export const listBackups = (
  only: Option.Option<DatabaseName>
): Effect.Effect<BackupListing, SystemError, BackupPaths> =>
  Effect.gen(function* () {
    const layout = yield* BackupPaths;
    const artifacts = (yield* listArtifacts(layout)).filter((a) =>
      Option.match(only, { onNone: () => true, onSome: (db) => a.database === db })
    );

    const byDatabase = pipe(
      artifacts,
      Arr.groupBy((a) => a.database),
      (groups) => Object.entries(groups),
      Arr.sort(Order.mapInput(Order.string, ([db]: readonly [string, unknown]) => db))
    );

    const databases = yield* Effect.forEach(byDatabase, ([, group]) =>
      Effect.gen(function* () {
        const newestFirst = Arr.sort(group, Order.reverse(ArtifactOrder));
        const generations = yield* Effect.forEach(newestFirst, describe);
        return { database: group[0].database, generations };
      })
    );

    const segments = (yield* listStagedSegments(layout)).map((s) => ({
      name: s.fileName,
      size: s.size,
    }));
    return { databases, segments };
  });
