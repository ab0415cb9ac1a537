import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("@/lib/telemetry", () => ({
  withSpan: (_name: string, _op: string, fn: () => unknown) => fn(),
  logInfo: vi.fn(),
  countMetric: vi.fn(),
}));

import { DEFAULT_CORPUS_PATH, loadCorpus, parseCorpus } from "../corpus-loader";
import { CorpusError } from "../errors";

describe("corpus-loader", () => {
  describe("parseCorpus", () => {
    it("maps the tri-state ground truth", () => {
      const corpus = parseCorpus(
        [
          "propositions:",
          "  - id: a",
          "    text: Alpha",
          "    ground_truth: true",
          "  - id: b",
          "    text: Beta",
          "    ground_truth: false",
          "  - id: c",
          "    text: Gamma",
          "    ground_truth: null",
          "  - id: d",
          "    text: Delta",
          "    ground_truth: unknown",
        ].join("\n"),
      );

      expect(corpus).toEqual([
        { id: "a", text: "Alpha", groundTruth: "true" },
        { id: "b", text: "Beta", groundTruth: "false" },
        { id: "c", text: "Gamma", groundTruth: "unknown" },
        { id: "d", text: "Delta", groundTruth: "unknown" },
      ]);
    });

    it("rejects an empty corpus", () => {
      expect(() => parseCorpus("propositions: []")).toThrow(CorpusError);
    });

    it("rejects a missing ground truth", () => {
      expect(() => parseCorpus("propositions:\n  - id: a\n    text: Alpha\n")).toThrow(
        /propositions\.0\.ground_truth/,
      );
    });

    it("rejects duplicate ids", () => {
      const raw = [
        "propositions:",
        "  - { id: a, text: Alpha, ground_truth: true }",
        "  - { id: a, text: Beta, ground_truth: false }",
      ].join("\n");

      expect(() => parseCorpus(raw, "dupes.yaml")).toThrow(
        'dupes.yaml is invalid: propositions.1.id: duplicate proposition id "a"',
      );
    });

    it("wraps YAML syntax errors", () => {
      expect(() => parseCorpus("propositions: [unclosed", "broken.yaml")).toThrow(
        /^broken\.yaml is not valid YAML/,
      );
    });
  });

  describe("loadCorpus", () => {
    it("loads the bundled corpus by default", async () => {
      const corpus = await loadCorpus();

      expect(corpus).toHaveLength(6);
      expect(corpus).toContainEqual({
        id: "machiavelli-born-1720",
        text: "Niccolò Machiavelli was born in 1720",
        groundTruth: "false",
      });
      expect(DEFAULT_CORPUS_PATH.endsWith(join("corpus", "default.yaml"))).toBe(true);
    });

    it("fails with CorpusError for a missing file", async () => {
      await expect(loadCorpus(join(tmpdir(), "no-such-corpus-file.yaml"))).rejects.toBeInstanceOf(CorpusError);
    });
  });
});
