/**
 * Unit tests for identifier files
 */

import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../../../src/lib/errors.js";
import { readIdsFile } from "../../../src/lib/ids-file.js";

vi.mock("node:fs/promises", async () => {
  const memfs = await import("memfs");
  return {
    default: memfs.fs.promises,
    ...memfs.fs.promises,
  };
});

describe("readIdsFile", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("should return one identifier per line", async () => {
    vol.fromJSON({ "/work/ids.txt": "logs-bucket\narn:aws:s3:::data-bucket\n" });

    await expect(readIdsFile("/work/ids.txt")).resolves.toEqual(["logs-bucket", "arn:aws:s3:::data-bucket"]);
  });

  it("should skip blank lines and comments and trim whitespace", async () => {
    vol.fromJSON({ "/work/ids.txt": "# build projects\r\n  build-app  \r\n\r\n#build-old\r\nbuild-web\r\n" });

    await expect(readIdsFile("/work/ids.txt")).resolves.toEqual(["build-app", "build-web"]);
  });

  it("should return nothing for an empty file", async () => {
    vol.fromJSON({ "/work/ids.txt": "" });

    await expect(readIdsFile("/work/ids.txt")).resolves.toEqual([]);
  });

  it("should report a file that cannot be read as invalid input", async () => {
    const error = await readIdsFile("/work/missing.txt").catch((error_: unknown) => error_);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ metadata: { field: "idsFile", value: "/work/missing.txt" } });
    expect(String(error)).toContain("Cannot read identifier file /work/missing.txt: ENOENT");
  });
});
