// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * sha256sum-compatible sidecars: `sha256sum -c` accepts every file written here.
 */

import { Effect, Option, pipe } from "effect";
import { CryptoError, ErrorCode, type SystemError } from "../lib/errors";
import { formatChecksumLine, parseChecksumFile } from "../lib/file-parsers";
import { type AbsolutePath, pathBasename } from "../lib/types";
import { atomicWrite, readFileOption, sha256File } from "./fs";

export type ChecksumStatus = "verified" | "missing";

export const writeChecksum = (
  file: AbsolutePath,
  sidecar: AbsolutePath
): Effect.Effect<string, SystemError> =>
  Effect.gen(function* () {
    const hash = yield* sha256File(file);
    yield* atomicWrite(sidecar, formatChecksumLine({ hash, fileName: pathBasename(file) }));
    return hash;
  });

/**
 * `missing` when there is no sidecar; CHECKSUM_MISMATCH when the sidecar is
 * unreadable or names a different digest.
 */
export const verifyChecksum = (
  file: AbsolutePath,
  sidecar: AbsolutePath
): Effect.Effect<ChecksumStatus, CryptoError | SystemError> =>
  Effect.gen(function* () {
    const content = yield* readFileOption(sidecar);
    if (Option.isNone(content)) {
      return "missing" as const;
    }

    const expected = yield* pipe(
      parseChecksumFile(content.value),
      Option.match({
        onNone: (): Effect.Effect<string, CryptoError> =>
          Effect.fail(
            new CryptoError({
              code: ErrorCode.CHECKSUM_MISMATCH,
              message: `Checksum file is unreadable: ${sidecar}`,
              path: sidecar,
            })
          ),
        onSome: (entry): Effect.Effect<string> => Effect.succeed(entry.hash),
      })
    );

    const actual = yield* sha256File(file);
    if (actual !== expected) {
      return yield* Effect.fail(
        new CryptoError({
          code: ErrorCode.CHECKSUM_MISMATCH,
          message: `Checksum mismatch for ${file}: expected ${expected}, got ${actual}`,
          path: file,
        })
      );
    }
    return "verified" as const;
  });
