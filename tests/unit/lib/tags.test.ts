import { describe, expect, it } from "vitest";
import { tagListToRecord } from "../../../src/lib/tags.js";

describe("tagListToRecord", () => {
  it("should turn a tag list into a record", () => {
    expect(
      tagListToRecord([
        { Key: "env", Value: "dev" },
        { Key: "team", Value: "data" },
      ]),
    ).toEqual({ env: "dev", team: "data" });
  });

  it("should keep keys without a value as empty strings and drop entries without a key", () => {
    expect(tagListToRecord([{ Key: "owner" }, { Value: "orphan" }])).toEqual({ owner: "" });
  });

  it("should accept a missing list", () => {
    expect(tagListToRecord(undefined)).toEqual({});
  });
});
