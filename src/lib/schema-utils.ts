// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema utilities with parser-first validation design.
 * Parsers return Option<A>; validators derive from parsers via Option.isSome.
 */

import { Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { all, isAlphaNum, isDigit, isOneOf, uncons } from "./str";

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Output format:
 *   Configuration validation failed for /path/to/file.toml:
 *   └─ ["backup"]["parallelism"]
 *      └─ Expected ...
 */
export const formatSchemaError = (error: ParseResult.ParseError, context: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Configuration validation failed for ${context}:\n${ParseResult.TreeFormatter.formatErrorSync(error)}`,
    path: context,
  });

// ============================================================================
// Decode Utilities
// ============================================================================

export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, ConfigError> =>
      Effect.fail(formatSchemaError(error, context)),
    onRight: (value): Effect.Effect<A, ConfigError> => Effect.succeed(value),
  });

// ============================================================================
// Parsing Primitives
// ============================================================================

/**
 * Parse a natural number (non-negative integer) from string.
 * Returns None for empty or non-digit input. Leading zeros are accepted
 * because binlog sequence suffixes are zero padded.
 */
export const parseNat = (s: string): Option.Option<number> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length > 0),
    Option.filter(all(isDigit)),
    Option.map((str) => Number.parseInt(str, 10)),
    Option.filter(Number.isSafeInteger)
  );

// ============================================================================
// Name Parsers
// ============================================================================

/** Substrings that would make an artifact filename ambiguous. */
const RESERVED_NAME_PARTS: readonly string[] = ["_full_", "_incremental_"];

/** [A-Za-z0-9_$-] */
const isDatabaseChar = (c: string): boolean => isAlphaNum(c) || isOneOf("_$-")(c);

export const parseDatabaseName = (s: string): Option.Option<string> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length > 0 && str.length <= 64),
    Option.filter(all(isDatabaseChar)),
    Option.filter((str) => !RESERVED_NAME_PARTS.some((part) => str.includes(part))),
    Option.map(() => s)
  );

export const isValidDatabaseName = (s: string): boolean => Option.isSome(parseDatabaseName(s));

/** Valid first char for container name: [a-zA-Z0-9] */
const isContainerFirst = isAlphaNum;

/** Valid rest char: [a-zA-Z0-9_.-] */
const isContainerRest = (c: string): boolean => isAlphaNum(c) || isOneOf("_.-")(c);

export const parseContainerName = (s: string): Option.Option<string> =>
  pipe(
    uncons(s),
    Option.filter((tuple) => isContainerFirst(tuple[0])),
    Option.filter((tuple) => all(isContainerRest)(tuple[1])),
    Option.map(() => s)
  );

export const isValidContainerName = (s: string): boolean => Option.isSome(parseContainerName(s));
