// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Symmetric file encryption, byte compatible with
 * `openssl enc -aes-256-cbc -salt -pbkdf2 -pass file:KEY`:
 *
 *   "Salted__" | salt (8 bytes) | AES-256-CBC ciphertext (PKCS#7)
 *
 * Key and IV are the first 32 and next 16 bytes of
 * PBKDF2-HMAC-SHA256(passphrase, salt, 10000 iterations).
 *
 * Output is written to a temporary sibling and renamed into place, so a
 * failed run leaves no partial file behind.
 */

import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { open } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { Effect, Option, pipe } from "effect";
import {
  ConfigError,
  CryptoError,
  ErrorCode,
  type SystemError,
  causeProps,
  errorMessage,
} from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import {
  chmod,
  deleteFile,
  fileExists,
  readFileOption,
  renameFile,
  tempSibling,
  writeFileExclusive,
} from "./fs";

const MAGIC = Buffer.from("Salted__", "ascii");
const SALT_LENGTH = 8;
const HEADER_LENGTH = MAGIC.length + SALT_LENGTH;
const PBKDF2_ITERATIONS = 10000;
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const CIPHER = "aes-256-cbc";

export const ENCRYPTED_SUFFIX = ".enc";

/** Private mode for key files. */
export const KEY_FILE_MODE = 0o600;

export interface EncryptionKey {
  readonly path: AbsolutePath;
  /** First line of the key file. */
  readonly passphrase: string;
}

interface DerivedKey {
  readonly key: Buffer;
  readonly iv: Buffer;
}

export const deriveKey = (passphrase: string, salt: Buffer): DerivedKey => {
  const material = pbkdf2Sync(
    passphrase,
    salt,
    PBKDF2_ITERATIONS,
    KEY_LENGTH + IV_LENGTH,
    "sha256"
  );
  return {
    key: material.subarray(0, KEY_LENGTH),
    iv: material.subarray(KEY_LENGTH, KEY_LENGTH + IV_LENGTH),
  };
};

// ============================================================================
// Key files
// ============================================================================

const firstLine = (content: string): string => (content.split("\n")[0] ?? "").trim();

export const loadKey = (
  path: AbsolutePath
): Effect.Effect<EncryptionKey, ConfigError | SystemError> =>
  pipe(
    readFileOption(path),
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<EncryptionKey, ConfigError> =>
          Effect.fail(
            new ConfigError({
              code: ErrorCode.KEY_FILE_MISSING,
              message: `Encryption key file not found: ${path}`,
              path,
            })
          ),
        onSome: (content): Effect.Effect<EncryptionKey, ConfigError> => {
          const passphrase = firstLine(content);
          return passphrase.length === 0
            ? Effect.fail(
                new ConfigError({
                  code: ErrorCode.KEY_FILE_MISSING,
                  message: `Encryption key file is empty: ${path}`,
                  path,
                })
              )
            : Effect.succeed({ path, passphrase });
        },
      })
    )
  );

/** 32 random bytes, base64. */
export const generatePassphrase = (): string => randomBytes(32).toString("base64");

/** Load the key, creating it (mode 0600) when the file does not exist yet. */
export const loadOrCreateKey = (
  path: AbsolutePath
): Effect.Effect<EncryptionKey, ConfigError | SystemError | CryptoError> =>
  Effect.gen(function* () {
    const exists = yield* fileExists(path);
    if (!exists) {
      const created = yield* writeFileExclusive(path, `${generatePassphrase()}\n`, {
        mode: KEY_FILE_MODE,
      }).pipe(
        Effect.mapError(
          (e) =>
            new CryptoError({
              code: ErrorCode.KEY_GENERATION_FAILED,
              message: `Failed to create encryption key ${path}: ${e.message}`,
              path,
              cause: e,
            })
        )
      );
      if (created) {
        // umask can only clear bits; this pins the exact mode
        yield* chmod(path, KEY_FILE_MODE);
        yield* Effect.logInfo(`Generated new encryption key: ${path}`);
      }
    }
    return yield* loadKey(path);
  });

// ============================================================================
// Encrypt / decrypt
// ============================================================================

const cryptoError =
  (code: 40 | 41, verb: string, path: AbsolutePath) =>
  (e: unknown): CryptoError =>
    new CryptoError({
      code,
      message: `Failed to ${verb} ${path}: ${errorMessage(e)}`,
      path,
      ...causeProps(e),
    });

/** Streams through a temporary sibling of `output`, which is removed on failure. */
const writeViaTemp = (
  output: AbsolutePath,
  write: (tempPath: AbsolutePath) => Promise<void>,
  onError: (e: unknown) => CryptoError
): Effect.Effect<void, CryptoError | SystemError> => {
  const tempPath = tempSibling(output);
  return pipe(
    Effect.tryPromise({ try: () => write(tempPath), catch: onError }),
    Effect.tapError(() => deleteFile(tempPath).pipe(Effect.ignore)),
    Effect.zipRight(renameFile(tempPath, output))
  );
};

export const encryptFile = (
  input: AbsolutePath,
  output: AbsolutePath,
  key: EncryptionKey
): Effect.Effect<void, CryptoError | SystemError> =>
  writeViaTemp(
    output,
    async (tempPath) => {
      const salt = randomBytes(SALT_LENGTH);
      const { key: aesKey, iv } = deriveKey(key.passphrase, salt);
      const header = Buffer.concat([MAGIC, salt]);
      await pipeline(
        createReadStream(input),
        createCipheriv(CIPHER, aesKey, iv),
        async function* (source: AsyncIterable<Buffer>) {
          yield header;
          yield* source;
        },
        createWriteStream(tempPath)
      );
    },
    cryptoError(ErrorCode.ENCRYPT_FAILED, "encrypt", input)
  );

const readHeader = async (path: AbsolutePath): Promise<Buffer> => {
  const handle = await open(path, "r");
  try {
    const header = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead } = await handle.read(header, 0, HEADER_LENGTH, 0);
    if (bytesRead < HEADER_LENGTH || !header.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw new Error("not an encrypted backup (missing Salted__ header)");
    }
    return header.subarray(MAGIC.length);
  } finally {
    await handle.close();
  }
};

/** A wrong key or corrupt data fails with DECRYPT_FAILED and writes nothing. */
export const decryptFile = (
  input: AbsolutePath,
  output: AbsolutePath,
  key: EncryptionKey
): Effect.Effect<void, CryptoError | SystemError> =>
  writeViaTemp(
    output,
    async (tempPath) => {
      const salt = await readHeader(input);
      const { key: aesKey, iv } = deriveKey(key.passphrase, salt);
      await pipeline(
        createReadStream(input, { start: HEADER_LENGTH }),
        createDecipheriv(CIPHER, aesKey, iv),
        createWriteStream(tempPath)
      );
    },
    cryptoError(ErrorCode.DECRYPT_FAILED, "decrypt", input)
  );

/** `x.sql.gz.enc` decrypts to `x.sql.gz`; a name without `.enc` gains `.decrypted`. */
export const decryptedName = (name: string): string =>
  name.endsWith(ENCRYPTED_SUFFIX)
    ? name.slice(0, -ENCRYPTED_SUFFIX.length)
    : `${name}.decrypted`;
