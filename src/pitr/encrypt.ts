// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The `encrypt` command: one file in, one file out, with a sha256 sidecar
 * next to the encrypted file.
 */

import { Effect, Option } from "effect";
import {
  type ConfigError,
  type CryptoError,
  ErrorCode,
  SystemError,
} from "../lib/errors";
import { type AbsolutePath, pathBasename, pathDirname, pathJoin, pathWithSuffix } from "../lib/types";
import { type ChecksumStatus, verifyChecksum, writeChecksum } from "../system/checksum";
import {
  ENCRYPTED_SUFFIX,
  decryptFile,
  decryptedName,
  encryptFile,
  loadKey,
  loadOrCreateKey,
} from "../system/encryption";
import { fileExists } from "../system/fs";

export const CHECKSUM_SUFFIX = ".sha256";

export interface CryptOptions {
  readonly input: AbsolutePath;
  readonly output: Option.Option<AbsolutePath>;
  readonly keyFile: AbsolutePath;
}

export interface EncryptResult {
  readonly output: AbsolutePath;
  readonly sidecar: AbsolutePath;
  readonly sha256: string;
}

export interface DecryptResult {
  readonly output: AbsolutePath;
  readonly checksum: ChecksumStatus;
}

export const encryptedOutputPath = (input: AbsolutePath): AbsolutePath =>
  pathWithSuffix(input, ENCRYPTED_SUFFIX);

export const decryptedOutputPath = (input: AbsolutePath): AbsolutePath =>
  pathJoin(pathDirname(input), decryptedName(pathBasename(input)));

export const sidecarPath = (file: AbsolutePath): AbsolutePath =>
  pathWithSuffix(file, CHECKSUM_SUFFIX);

const requireInput = (input: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.flatMap(fileExists(input), (exists) =>
    exists
      ? Effect.void
      : Effect.fail(
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Input file not found: ${input}`,
          })
        )
  );

export const encryptCommand = (
  options: CryptOptions
): Effect.Effect<EncryptResult, SystemError | CryptoError | ConfigError> =>
  Effect.gen(function* () {
    yield* requireInput(options.input);
    const key = yield* loadOrCreateKey(options.keyFile);
    const output = Option.getOrElse(options.output, () => encryptedOutputPath(options.input));
    const sidecar = sidecarPath(output);

    yield* encryptFile(options.input, output, key);
    const sha256 = yield* writeChecksum(output, sidecar);
    yield* Effect.logDebug(`Encrypted ${options.input} -> ${output}`);
    return { output, sidecar, sha256 };
  });

/** Verifies `<input>.sha256`, when present, before writing anything. */
export const decryptCommand = (
  options: CryptOptions
): Effect.Effect<DecryptResult, SystemError | CryptoError | ConfigError> =>
  Effect.gen(function* () {
    yield* requireInput(options.input);
    const key = yield* loadKey(options.keyFile);
    const output = Option.getOrElse(options.output, () => decryptedOutputPath(options.input));

    const checksum = yield* verifyChecksum(options.input, sidecarPath(options.input));
    if (checksum === "missing") {
      yield* Effect.logWarning(`No checksum file for ${options.input}; skipping verification`);
    }
    yield* decryptFile(options.input, output, key);
    yield* Effect.logDebug(`Decrypted ${options.input} -> ${output}`);
    return { output, checksum };
  });
