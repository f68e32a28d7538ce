// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates and string combinators used by the name parsers.
 * Curried data-last so they compose with `pipe()`.
 */

import { Option } from "effect";

export type CharPred = (c: string) => boolean;

export const isLower: CharPred = (c) => c >= "a" && c <= "z";

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isAlpha: CharPred = (c) => isLower(c) || (c >= "A" && c <= "Z");

export const isAlphaNum: CharPred = (c) => isAlpha(c) || isDigit(c);

export const isHexDigit: CharPred = (c) =>
  isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    chars.includes(c);

export const chars = (s: string): readonly string[] => Array.from(s);

/** Split into `[head, tail]`, returning `None` for empty strings. */
export const uncons = (s: string): Option.Option<readonly [string, string]> => {
  const arr = chars(s);
  const first = arr[0];
  return first !== undefined ? Option.some([first, arr.slice(1).join("")] as const) : Option.none();
};

/** Every character must satisfy `pred`. */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

/** Remove consecutive duplicates of `char` (e.g. collapse `//` to `/`). */
export const collapseChar =
  (char: string) =>
  (s: string): string => {
    const arr = chars(s);
    return arr.filter((c, i) => c !== char || arr[i - 1] !== char).join("");
  };

/** Strip one trailing occurrence of any listed suffix. */
export const stripSuffixes =
  (suffixes: readonly string[]) =>
  (s: string): string => {
    const hit = suffixes.find((suffix) => s.endsWith(suffix));
    return hit === undefined ? s : s.slice(0, s.length - hit.length);
  };
