// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Exit } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { type AbsolutePath, pathJoin } from "../../src/lib/types.ts";
import { verifyChecksum, writeChecksum } from "../../src/system/checksum.ts";
import { gunzipFile, gzipFile, isGzipName } from "../../src/system/compress.ts";
import { fileExists, readFile, writeFile } from "../../src/system/fs.ts";
import { createTempDirectory, removeTempDirectory, runTest, runTestExit } from "../helpers/layers.ts";

const HELLO_SHA256 = "5891b5b522d5df086d0ff0b110fbd9d21bb4fc7163af34d08286a2e846f6be03";

let dir: AbsolutePath;

describe("checksum sidecars", () => {
  beforeAll(async () => {
    dir = await createTempDirectory("checksum");
  });

  afterAll(async () => {
    await removeTempDirectory(dir);
  });

  test("writeChecksum writes a sha256sum line naming the file", async () => {
    const file = pathJoin(dir, "hello.enc");
    const sidecar = pathJoin(dir, "hello.enc.sha256");
    await runTest(writeFile(file, "hello\n"));

    expect(await runTest(writeChecksum(file, sidecar))).toBe(HELLO_SHA256);
    expect(await runTest(readFile(sidecar))).toBe(`${HELLO_SHA256}  hello.enc\n`);
    expect(await runTest(verifyChecksum(file, sidecar))).toBe("verified");
  });

  test("a missing sidecar is reported, not failed", async () => {
    const file = pathJoin(dir, "lonely.enc");
    await runTest(writeFile(file, "x"));
    expect(await runTest(verifyChecksum(file, pathJoin(dir, "lonely.enc.sha256")))).toBe("missing");
  });

  test("a different digest is CHECKSUM_MISMATCH", async () => {
    const file = pathJoin(dir, "changed.enc");
    const sidecar = pathJoin(dir, "changed.enc.sha256");
    await runTest(writeFile(file, "hello\n"));
    await runTest(writeFile(sidecar, `${"0".repeat(64)}  changed.enc\n`));

    const exit = await runTestExit(verifyChecksum(file, sidecar));
    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error.code).toBe(42);
      expect(exit.cause.error.message).toBe(
        `Checksum mismatch for ${file}: expected ${"0".repeat(64)}, got ${HELLO_SHA256}`
      );
    }
  });

  test("an unreadable sidecar is CHECKSUM_MISMATCH", async () => {
    const file = pathJoin(dir, "garbled.enc");
    const sidecar = pathJoin(dir, "garbled.enc.sha256");
    await runTest(writeFile(file, "hello\n"));
    await runTest(writeFile(sidecar, "not a checksum\n"));
    const exit = await runTestExit(verifyChecksum(file, sidecar));
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error.message).toBe(`Checksum file is unreadable: ${sidecar}`);
    } else {
      expect.fail("expected a checksum failure");
    }
  });
});

describe("gzip", () => {
  beforeAll(async () => {
    dir = await createTempDirectory("gzip");
  });

  afterAll(async () => {
    await removeTempDirectory(dir);
  });

  test("compresses and decompresses", async () => {
    const plain = pathJoin(dir, "dump.sql");
    const gz = pathJoin(dir, "dump.sql.gz");
    const back = pathJoin(dir, "dump.back.sql");
    const content = "INSERT INTO orders VALUES (1);\n".repeat(100);
    await runTest(writeFile(plain, content));

    await runTest(gzipFile(plain, gz));
    await runTest(gunzipFile(gz, back));
    expect(await runTest(readFile(back))).toBe(content);
  });

  test("a corrupt archive fails and leaves no output", async () => {
    const gz = pathJoin(dir, "corrupt.sql.gz");
    const out = pathJoin(dir, "corrupt.sql");
    await runTest(writeFile(gz, "definitely not gzip"));
    const exit = await runTestExit(gunzipFile(gz, out));
    expect(Exit.isFailure(exit)).toBe(true);
    expect(await runTest(fileExists(out))).toBe(false);
  });

  test("isGzipName", () => {
    expect(isGzipName("x.sql.gz")).toBe(true);
    expect(isGzipName("x.sql")).toBe(false);
  });
});
