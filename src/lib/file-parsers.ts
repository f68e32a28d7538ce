// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parsers for the small text formats kept beside backups: the credential
 * file (`KEY=value`) and sha256sum sidecars. Pure functions with no IO.
 */

import { Array as Arr, Option, pipe } from "effect";
import { all, isHexDigit } from "./str";

const isContentLine = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith("#");
};

export const toContentLines = (content: string): readonly string[] =>
  Arr.filter(content.split("\n"), isContentLine);

/** `"value"` and `'value'` lose their quotes; anything else is kept as written. */
const unquote = (value: string): string => {
  const first = value.at(0);
  return value.length >= 2 && (first === '"' || first === "'") && value.at(-1) === first
    ? value.slice(1, -1)
    : value;
};

const stripExport = (line: string): string =>
  line.startsWith("export ") ? line.slice("export ".length).trimStart() : line;

/**
 * Parse `KEY=value` lines. Comments, blank lines and an `export ` prefix
 * are accepted. Later duplicates win.
 */
export const parseKeyValue = (content: string): Record<string, string> =>
  pipe(
    content.split("\n"),
    Arr.map((line) => line.trim()),
    Arr.filter(isContentLine),
    Arr.map(stripExport),
    Arr.filterMap((line) => {
      const eqIndex = line.indexOf("=");
      return eqIndex > 0
        ? Option.some([line.slice(0, eqIndex).trim(), unquote(line.slice(eqIndex + 1).trim())] as const)
        : Option.none();
    }),
    Object.fromEntries
  );

// ============================================================================
// sha256sum sidecars
// ============================================================================

export interface ChecksumEntry {
  readonly hash: string;
  readonly fileName: string;
}

/** `<64 hex>  <name>` or the binary-mode `<64 hex> *<name>`. */
export const parseChecksumLine = (line: string): Option.Option<ChecksumEntry> => {
  const match = /^(\S+)\s+\*?(.+)$/.exec(line.trim());
  return pipe(
    Option.fromNullable(match),
    Option.flatMap(([, hash, fileName]) =>
      hash !== undefined && fileName !== undefined
        ? Option.some({ hash: hash.toLowerCase(), fileName })
        : Option.none()
    ),
    Option.filter((entry) => entry.hash.length === 64 && all(isHexDigit)(entry.hash))
  );
};

export const parseChecksumFile = (content: string): Option.Option<ChecksumEntry> =>
  pipe(toContentLines(content), Arr.head, Option.flatMap(parseChecksumLine));

export const formatChecksumLine = (entry: ChecksumEntry): string =>
  `${entry.hash}  ${entry.fileName}\n`;
