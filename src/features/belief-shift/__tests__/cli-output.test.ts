import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("@sentry/node", () => ({
  startSpan: (_opts: unknown, cb: (span: unknown) => unknown): unknown => cb({}),
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  metrics: { count: vi.fn(), distribution: vi.fn() },
  captureException: vi.fn(),
  flush: vi.fn(() => Promise.resolve(true)),
}));

import { main } from "../cli";
import { DEFAULT_CORPUS_PATH } from "../corpus-loader";

function written(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

describe("cli output streams", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps stdout to the JSON document while logs go to stderr", async () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await main(["--dry-run", "--seed", "1", "--rounds", "2", "--corpus", DEFAULT_CORPUS_PATH]);

    expect(JSON.parse(written(stdout))).toMatchObject({
      dryRun: true,
      propositions: 6,
      totalDebates: 24,
      remoteCalls: 144,
      rounds: 2,
      seed: 1,
    });
    expect(written(stderr)).toContain("[info] corpus loaded ");
    expect(process.exitCode).toBeUndefined();
  });
});
