// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Data, Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { Settings } from "../../config/schema";
import type { AppError } from "../../lib/errors";
import { logSuccess, writeJson } from "../../lib/log";
import { toAbsolutePathEffect } from "../../lib/paths";
import { decryptCommand, encryptCommand } from "../../pitr/encrypt";
import { exactlyOne, resolveKeyFile, resolveOptionalPath } from "./utils";

export interface EncryptCommandOptions {
  readonly encrypt: Option.Option<string>;
  readonly decrypt: Option.Option<string>;
  readonly output: Option.Option<string>;
  readonly key: Option.Option<string>;
  readonly format: LogFormat;
  readonly settings: Settings;
}

type Direction = Data.TaggedEnum<{
  Encrypt: { readonly input: string };
  Decrypt: { readonly input: string };
}>;

const Direction = Data.taggedEnum<Direction>();

export const executeEncrypt = (options: EncryptCommandOptions): Effect.Effect<void, AppError> =>
  Effect.gen(function* () {
    const direction = yield* exactlyOne<Direction>(
      Option.map(options.encrypt, (input) => Direction.Encrypt({ input })),
      Option.map(options.decrypt, (input) => Direction.Decrypt({ input })),
      "--encrypt or --decrypt"
    );
    const input = yield* toAbsolutePathEffect(direction.input);
    const output = yield* resolveOptionalPath(options.output);
    const keyFile = yield* resolveKeyFile(options.key, options.settings);
    const crypt = { input, output, keyFile };

    const result = yield* Direction.$match(direction, {
      Encrypt: () =>
        Effect.map(encryptCommand(crypt), (r) => ({
          verb: "Encrypted",
          output: r.output,
          checksum: r.sidecar,
        })),
      Decrypt: () =>
        Effect.map(decryptCommand(crypt), (r) => ({
          verb: "Decrypted",
          output: r.output,
          checksum: r.checksum,
        })),
    });

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () =>
        writeJson({ action: direction._tag.toLowerCase(), input, ...result })
      ),
      Match.when("pretty", () => logSuccess(`${result.verb} ${input} -> ${result.output}`)),
      Match.exhaustive
    );
  });
