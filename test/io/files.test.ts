/**
 * Tests for file helpers on the Node.js platform
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Effect, Option } from "effect";
import { gzipSync, strToU8, zipSync } from "fflate";
import { afterAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { fileExists, getMetadata, readText, readUnpackedText } from "../../src/io/file-reader";
import { removeFile, setModifiedTime, writeText } from "../../src/io/file-writer";
import { type PlatformServices, runWithPlatform } from "../../src/io/runtime";

const dir = mkdtempSync(join(tmpdir(), "files-"));

function run<A, E>(program: Effect.Effect<A, E, PlatformServices>): Promise<A> {
  return runWithPlatform(program, { logLevel: "none" });
}

afterAll(() => {
  if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
});

describe("file reader", () => {
  test("reports regular files only as existing", async () => {
    writeFileSync(join(dir, "present.txt"), "x");
    mkdirSync(join(dir, "folder"));

    expect(await run(fileExists(join(dir, "present.txt")))).toBe(true);
    expect(await run(fileExists(join(dir, "folder")))).toBe(false);
    expect(await run(fileExists(join(dir, "absent.txt")))).toBe(false);
  });

  test("returns size and modification time", async () => {
    writeFileSync(join(dir, "sized.txt"), "12345");

    const metadata = await run(getMetadata(join(dir, "sized.txt")));

    expect(Option.isSome(metadata)).toBe(true);
    if (Option.isSome(metadata)) {
      expect(metadata.value.size).toBe(5);
      expect(metadata.value.lastModified).toBeInstanceOf(Date);
    }
    expect(Option.isNone(await run(getMetadata(join(dir, "absent.txt"))))).toBe(true);
  });

  test("fails with FileError for a missing file", async () => {
    await expect(run(readText(join(dir, "absent.txt")))).rejects.toBeInstanceOf(FileError);
  });

  test("unwraps gzip and zip packaging", async () => {
    writeFileSync(join(dir, "table.txt.gz"), gzipSync(strToU8("gz content\n")));
    writeFileSync(join(dir, "table.zip"), zipSync({ "table.txt": strToU8("zip content\n") }));
    writeFileSync(join(dir, "table.txt"), "plain content\n");

    expect(await run(readUnpackedText(join(dir, "table.txt.gz")))).toBe("gz content\n");
    expect(await run(readUnpackedText(join(dir, "table.zip")))).toBe("zip content\n");
    expect(await run(readUnpackedText(join(dir, "table.txt")))).toBe("plain content\n");
  });

  test("unwraps a gzipped entry inside a zip", async () => {
    writeFileSync(join(dir, "kit.zip"), zipSync({ "kit.csv.gz": gzipSync(strToU8("nested content\n")) }));
    writeFileSync(join(dir, "renamed.zip"), zipSync({ "kit.csv": gzipSync(strToU8("renamed content\n")) }));

    expect(await run(readUnpackedText(join(dir, "kit.zip")))).toBe("nested content\n");
    expect(await run(readUnpackedText(join(dir, "renamed.zip")))).toBe("renamed content\n");
  });
});

describe("file writer", () => {
  test("writes, stamps and removes files", async () => {
    const path = join(dir, "written.txt");
    const stamp = new Date("2024-03-01T12:00:00Z");

    await run(writeText(path, "written\n"));
    await run(setModifiedTime(path, stamp));

    expect(readFileSync(path, "utf8")).toBe("written\n");
    expect(statSync(path).mtime.getTime()).toBe(stamp.getTime());
    expect(await run(removeFile(path))).toBe(true);
    expect(await run(removeFile(path))).toBe(false);
  });
});
