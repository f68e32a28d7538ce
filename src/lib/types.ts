// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A `DatabaseName` and a `ContainerName` are both strings, but passing one
 * where the other is expected is a compile error.
 */

import { type Brand, Effect, ParseResult, Schema, type SchemaAST, pipe } from "effect";

import { ErrorCode, GeneralError } from "./errors";
import { isValidContainerName, isValidDatabaseName } from "./schema-utils";
import { collapseChar } from "./str";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type DatabaseName = string & Brand.Brand<"DatabaseName">;
export type ContainerName = string & Brand.Brand<"ContainerName">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const databaseNameMsg = (): string =>
  "Database name must match [A-Za-z0-9_$-]+ and must not contain _full_ or _incremental_";
const containerNameMsg = (): string => "Invalid container name";

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const DatabaseNameSchema: Schema.BrandSchema<DatabaseName, string, never> =
  Schema.String.pipe(
    Schema.filter(isValidDatabaseName, { message: databaseNameMsg }),
    Schema.brand("DatabaseName")
  );

export const ContainerNameSchema: Schema.BrandSchema<ContainerName, string, never> =
  Schema.String.pipe(
    Schema.filter(isValidContainerName, { message: containerNameMsg }),
    Schema.brand("ContainerName")
  );

export const isAbsolutePath: (u: unknown) => u is AbsolutePath = Schema.is(AbsolutePathSchema);
export const isDatabaseName: (u: unknown) => u is DatabaseName = Schema.is(DatabaseNameSchema);
export const isContainerName: (u: unknown) => u is ContainerName = Schema.is(ContainerNameSchema);

// Usage: yield* decodeDatabaseName(input).pipe(Effect.mapError(parseErrorToGeneralError))
export const decodeAbsolutePath: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<AbsolutePath, ParseResult.ParseError, never> = Schema.decode(AbsolutePathSchema);

export const decodeDatabaseName: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<DatabaseName, ParseResult.ParseError, never> = Schema.decode(DatabaseNameSchema);

export const decodeContainerName: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<ContainerName, ParseResult.ParseError, never> =
  Schema.decode(ContainerNameSchema);

/** Bridge Schema `ParseError` into the application error hierarchy. */
export const parseErrorToGeneralError = (error: ParseResult.ParseError): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: ParseResult.TreeFormatter.formatErrorSync(error),
  });

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic paths, use `decodeAbsolutePath` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Branded literal constructor. For dynamic input, use `decodeDatabaseName`. */
export const databaseName = <const S extends string>(literal: S): DatabaseName =>
  literal as string as DatabaseName;

/** Branded literal constructor. For dynamic input, use `decodeContainerName`. */
export const containerName = <const S extends string>(literal: S): ContainerName =>
  literal as string as ContainerName;

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : pipe([base, ...segments].join("/"), collapseChar("/"));
}

/** Append a suffix (e.g. `".sha256"`), preserving `AbsolutePath` brand. */
export function pathWithSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithSuffix(base: string, suffix: string): string;
export function pathWithSuffix(base: string, suffix: string): string {
  return `${base}${suffix}`;
}

/** Drop the last path component. `/a/b/c` becomes `/a/b`; `/a` becomes `/`. */
export function pathDirname(p: AbsolutePath): AbsolutePath;
export function pathDirname(p: string): string;
export function pathDirname(p: string): string {
  const idx = p.lastIndexOf("/");
  return idx <= 0 ? (p.startsWith("/") ? "/" : ".") : p.slice(0, idx);
}

export const pathBasename = (p: string): string => p.slice(p.lastIndexOf("/") + 1);

export const joinPath = (...segments: string[]): Effect.Effect<AbsolutePath, GeneralError> =>
  segments.length === 0
    ? Effect.fail(
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "No path segments provided",
        })
      )
    : decodeAbsolutePath(pipe(segments.join("/"), collapseChar("/"))).pipe(
        Effect.mapError(parseErrorToGeneralError)
      );
