// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized path constants and the on-disk layout of a backup directory.
 * All paths are branded AbsolutePath values.
 */

import { normalize, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { type AbsolutePath, path, pathJoin } from "./types";

/** Container-side scratch directory for binlog segments being replayed. */
export const CONTAINER_PATHS: {
  readonly replayDir: AbsolutePath;
  readonly dataDir: AbsolutePath;
} = {
  replayDir: path("/tmp/mariadb-pitr-binlogs"),
  dataDir: path("/var/lib/mysql"),
};

/** Rejects null bytes to prevent path injection. */
const hasNullByte = (p: string): boolean => p.includes("\x00");

const resolveToAbsolute = (p: string, cwd: string): AbsolutePath => {
  const normalized = normalize(p);
  return (normalized.startsWith("/") ? normalized : resolve(cwd, normalized)) as AbsolutePath;
};

/** Use for all user-provided or config-file paths. */
export const toAbsolutePathEffect = (
  p: string,
  cwd: string = process.cwd()
): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p, cwd));

/** Use ONLY for trusted paths (hardcoded defaults, validated inputs). */
export const toAbsolutePathUnsafe = (p: string, cwd: string = process.cwd()): AbsolutePath =>
  resolveToAbsolute(p, cwd);

// ============================================================================
// Backup directory layout
// ============================================================================

export interface BackupLayout {
  readonly root: AbsolutePath;
  /** Staged binlog segments. May live outside `root`. */
  readonly binlogs: AbsolutePath;
  readonly binlogInfo: AbsolutePath;
  readonly incrInfo: AbsolutePath;
  readonly checksums: AbsolutePath;
  readonly locks: AbsolutePath;
}

export const backupLayout = (root: AbsolutePath, binlogDir?: AbsolutePath): BackupLayout => ({
  root,
  binlogs: binlogDir ?? pathJoin(root, "binlogs"),
  binlogInfo: pathJoin(root, "binlog_info"),
  incrInfo: pathJoin(root, "incr"),
  checksums: pathJoin(root, "checksums"),
  locks: pathJoin(root, ".locks"),
});

/** Directories a backup run creates before doing anything else. */
export const layoutDirectories = (layout: BackupLayout): readonly AbsolutePath[] => [
  layout.root,
  layout.binlogs,
  layout.binlogInfo,
  layout.incrInfo,
  layout.checksums,
];

/** sha256sum sidecar for any file name kept under `checksums/`. */
export const checksumPath = (layout: BackupLayout, fileName: string): AbsolutePath =>
  pathJoin(layout.checksums, `${fileName}.sha256`);
