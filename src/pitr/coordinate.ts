// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Binary log segments and coordinates.
 *
 * Segments are ordered by their numeric sequence, never by comparing file
 * names as strings: `mysql-bin.1000000` sorts after `mysql-bin.999999`.
 */

import { Option, Order, pipe } from "effect";
import { parseNat } from "../lib/schema-utils";
import { stripSuffixes } from "../lib/str";

export interface BinlogSegment {
  readonly base: string;
  readonly sequence: number;
  /** Digits in the rendered suffix. */
  readonly width: number;
}

export interface BinlogCoordinate {
  readonly segment: BinlogSegment;
  /** Byte offset within the segment. */
  readonly position: number;
}

const MIN_SEQUENCE_WIDTH = 6;

/** Left behind by an old parsing bug; stripped from every coordinate reference. */
const INDEX_SUFFIXES: readonly string[] = [".index", ".idx"];

export const segment = (base: string, sequence: number, width = MIN_SEQUENCE_WIDTH): BinlogSegment => ({
  base,
  sequence,
  width: Math.max(width, MIN_SEQUENCE_WIDTH),
});

export const coordinate = (seg: BinlogSegment, position: number): BinlogCoordinate => ({
  segment: seg,
  position,
});

export const segmentName = (seg: BinlogSegment): string =>
  `${seg.base}.${String(seg.sequence).padStart(seg.width, "0")}`;

/**
 * `mysql-bin.000005` only. Index files and anything without a numeric
 * suffix are not segments.
 */
export const parseSegmentName = (name: string): Option.Option<BinlogSegment> => {
  const dot = name.lastIndexOf(".");
  const base = name.slice(0, dot);
  const digits = name.slice(dot + 1);
  return pipe(
    Option.some(digits),
    Option.filter(() => dot > 0 && base.length > 0),
    Option.flatMap(parseNat),
    Option.map((sequence) => segment(base, sequence, digits.length))
  );
};

/** Like {@link parseSegmentName}, tolerating a trailing `.idx` or `.index`. */
export const parseSegmentReference = (name: string): Option.Option<BinlogSegment> =>
  parseSegmentName(stripSuffixes(INDEX_SUFFIXES)(name.trim()));

export const SegmentOrder: Order.Order<BinlogSegment> = Order.combine(
  Order.mapInput(Order.string, (s: BinlogSegment) => s.base),
  Order.mapInput(Order.number, (s: BinlogSegment) => s.sequence)
);

export const CoordinateOrder: Order.Order<BinlogCoordinate> = Order.combine(
  Order.mapInput(SegmentOrder, (c: BinlogCoordinate) => c.segment),
  Order.mapInput(Order.number, (c: BinlogCoordinate) => c.position)
);

export const sameSegment = (a: BinlogSegment, b: BinlogSegment): boolean =>
  SegmentOrder(a, b) === 0;

export const sameCoordinate = (a: BinlogCoordinate, b: BinlogCoordinate): boolean =>
  CoordinateOrder(a, b) === 0;

/** `mysql-bin.000005 1024` */
export const formatCoordinate = (c: BinlogCoordinate): string =>
  `${segmentName(c.segment)} ${c.position}`;

/** Two whitespace-separated fields: segment name and byte offset. */
export const parseCoordinate = (text: string): Option.Option<BinlogCoordinate> => {
  const [file, position, ...rest] = text.trim().split(/\s+/);
  return rest.length > 0 || file === undefined || position === undefined
    ? Option.none()
    : Option.all([parseSegmentReference(file), parseNat(position)]).pipe(
        Option.map(([seg, pos]) => coordinate(seg, pos))
      );
};
