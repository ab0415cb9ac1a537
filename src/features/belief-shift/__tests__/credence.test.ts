import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@/lib/telemetry", () => ({
  withSpan: (_name: string, _op: string, fn: () => unknown) => fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logChunked: vi.fn(),
  countMetric: vi.fn(),
}));

import { askCredence, buildCredenceContents, parseCredence } from "../credence";
import { FatalRemoteError, MalformedCredenceError } from "../errors";
import { buildCredenceAskerInstruction } from "../prompt-builder";
import { appendTurn, createTranscript } from "../transcript";
import { createScriptedGenerator } from "@/tests/factories";

describe("credence", () => {
  describe("parseCredence", () => {
    it.each(["73%", "73.0", " 73. ", "73", "73%.", "\n73 %\n"])("parses %j as 73", (raw) => {
      expect(parseCredence(raw)).toBe(73);
    });

    it("keeps fractional values", () => {
      expect(parseCredence("12.5%")).toBe(12.5);
    });

    it("accepts the bounds", () => {
      expect(parseCredence("0")).toBe(0);
      expect(parseCredence("100%")).toBe(100);
    });

    it.each(["about 73%", "", "   ", "%", "73 percent", "seventy", "NaN", "Infinity"])(
      "rejects %j",
      (raw) => {
        expect(() => parseCredence(raw)).toThrow(MalformedCredenceError);
      },
    );

    it("rejects values outside 0-100", () => {
      expect(() => parseCredence("120")).toThrow(MalformedCredenceError);
      expect(() => parseCredence("-5")).toThrow(MalformedCredenceError);
    });

    it("keeps the raw reply on the error", () => {
      try {
        parseCredence("about 73%");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedCredenceError);
        if (error instanceof MalformedCredenceError) {
          expect(error.raw).toBe("about 73%");
          expect(error._tag).toBe("MalformedCredenceError");
        }
      }
    });
  });

  describe("buildCredenceContents", () => {
    it("sends the bare question when there is no history", () => {
      expect(buildCredenceContents("Q?", createTranscript())).toBe("Q?");
    });

    it("puts the full history ahead of the question", () => {
      const history = appendTurn(appendTurn(createTranscript(), "Arguer", "A"), "Target", "B");
      expect(buildCredenceContents("Q?", history)).toBe("Arguer: A\nTarget: B\nQ?");
    });
  });

  describe("askCredence", () => {
    const sleep = vi.fn(async (_ms: number) => {});

    beforeEach(() => {
      sleep.mockClear();
    });

    it("sends the question under the credence instruction and parses the reply", async () => {
      const generator = createScriptedGenerator(() => " 35% ");

      const value = await askCredence("Q?", createTranscript(), { generator, model: "test-model" });

      expect(value).toBe(35);
      expect(generator.calls).toEqual([
        { model: "test-model", systemInstruction: buildCredenceAskerInstruction(), contents: "Q?" },
      ]);
    });

    it("retries a transient failure before parsing", async () => {
      let calls = 0;
      const generator = createScriptedGenerator(() => {
        calls++;
        if (calls === 1) throw new Error("429 rate limit");
        return "60";
      });

      const value = await askCredence("Q?", createTranscript(), {
        generator,
        model: "test-model",
        retry: { sleep, backoffSeconds: 0 },
      });

      expect(value).toBe(60);
      expect(generator.calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledOnce();
    });

    it("propagates a fatal failure", async () => {
      const generator = createScriptedGenerator(() => {
        throw new Error("401 unauthorized");
      });

      await expect(
        askCredence("Q?", createTranscript(), { generator, model: "test-model", retry: { sleep } }),
      ).rejects.toBeInstanceOf(FatalRemoteError);
    });

    it("fails on an unparseable reply", async () => {
      const generator = createScriptedGenerator(() => "I'd say roughly 40");

      await expect(
        askCredence("Q?", createTranscript(), { generator, model: "test-model" }),
      ).rejects.toBeInstanceOf(MalformedCredenceError);
    });
  });
});
