/**
 * Unit tests for the sweeper: discovery and deletion over one adapter
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderThrottledError } from "../../../src/lib/sweep-errors.js";
import type { BatchOutcome } from "../../../src/sweep/report.js";
import { createSweeper } from "../../../src/sweep/sweeper.js";
import {
  bucket,
  FakeAdapter,
  project,
  silentLogger,
  TEST_SCOPE,
  versionBatch,
} from "../../utils/fake-adapter.js";

describe("createSweeper", () => {
  let adapter: FakeAdapter;
  const sleep = vi.fn(async () => {});

  beforeEach(() => {
    adapter = new FakeAdapter();
    sleep.mockClear();
  });

  it("should delete the matching trees and find nothing on a second run", async () => {
    adapter
      .setPages("Bucket", [[bucket("a-test"), bucket("b-prod")], [bucket("a-staging")]])
      .setPages("S3ObjectVersionBatch", [[versionBatch("batch-1", "a-test")]], "a-test");
    const sweeper = createSweeper(adapter, { logger: silentLogger(), sleep });
    const target = { kind: "Bucket" as const, scope: TEST_SCOPE, filter: { type: "name-glob", pattern: "a-*" } as const };

    const first = await sweeper.delete(await sweeper.discover(target));
    const candidates = await sweeper.discover(target);
    const second = await sweeper.delete(candidates);

    expect(first.outcomes.map((outcome) => [outcome.resourceId, outcome.state])).toEqual([
      ["a-test", "Deleted"],
      ["a-staging", "Deleted"],
    ]);
    expect(adapter.deleteCalls).toEqual(["S3ObjectVersionBatch:batch-1", "Bucket:a-test", "Bucket:a-staging"]);
    expect(candidates).toEqual([]);
    expect(second.outcomes).toEqual([]);
    expect(second.success).toBe(true);
  });

  it("should list under the parent of the target", async () => {
    const owner = project("owner");
    adapter.setPages("CodeBuildProject", [[project("child")]], "owner");
    const sweeper = createSweeper(adapter, { logger: silentLogger() });

    const candidates = await sweeper.discover({ kind: "CodeBuildProject", scope: TEST_SCOPE, parent: owner });

    expect(candidates.map((candidate) => candidate.id)).toEqual(["child"]);
    expect(adapter.listCalls[0]?.parent?.id).toBe("owner");
  });

  it("should pass dry-run and outcome callbacks to the deleter", async () => {
    const outcomes: BatchOutcome[] = [];
    const sweeper = createSweeper(adapter, {
      logger: silentLogger(),
      dryRun: true,
      onOutcome: (outcome) => outcomes.push(outcome),
    });

    const report = await sweeper.delete([project("a")]);

    expect(adapter.deleteCalls).toEqual([]);
    expect(outcomes).toEqual(report.outcomes);
    expect(outcomes[0]?.skipped).toBe(true);
  });

  it("should retry a throttled deletion once with the injected sleep", async () => {
    adapter.failDelete(
      "CodeBuildProject:a",
      new ProviderThrottledError("Rate exceeded"),
      new ProviderThrottledError("Rate exceeded"),
    );
    const sweeper = createSweeper(adapter, { logger: silentLogger(), sleep });

    const report = await sweeper.delete([project("a")]);

    expect(adapter.deleteCalls).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(report.success).toBe(false);
  });

  it("should retry throttled page fetches up to five times", async () => {
    const throttled = Array.from({ length: 5 }, () => new ProviderThrottledError("Rate exceeded"));
    adapter.failList("CodeBuildProject", ...throttled);
    const sweeper = createSweeper(adapter, { logger: silentLogger(), sleep });

    await expect(sweeper.discover({ kind: "CodeBuildProject", scope: TEST_SCOPE })).rejects.toMatchObject({
      code: "DISCOVERY_FAILED",
    });
    expect(adapter.listCalls).toHaveLength(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });
});
