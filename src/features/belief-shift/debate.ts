import { withSpan, logInfo, logChunked, countMetric } from "@/lib/telemetry";
import { askCredence } from "./credence";
import {
  NEXT_ARGUER_PROMPT,
  TARGET_PROMPT,
  buildArguerInstruction,
  buildCredenceQuestion,
  buildFirstArguerPrompt,
  buildTargetInstruction,
  sideLabel,
} from "./prompt-builder";
import { callWithRetry, unwrapCallResult, type RetryOptions } from "./retry";
import { appendTurn, createTranscript, renderConversation } from "./transcript";
import type { Generator } from "./generator";
import type { DebateConfig, DebateOutcome, DebatePhase, Speaker, Transcript } from "./types";

export interface DebateContext {
  generator: Generator;
  model: string;
  retry?: RetryOptions;
}

/**
 * Runs one debate: initial credence with no history, `rounds` Arguer/Target
 * exchanges, final credence with the full transcript. Any failure aborts the
 * debate and propagates; there is no partial outcome.
 */
export class DebateOrchestrator {
  private readonly config: DebateConfig;
  private readonly context: DebateContext;
  private readonly arguerInstruction: string;
  private readonly targetInstruction: string;
  private transcript: Transcript = createTranscript();
  private phase: DebatePhase = "init";

  constructor(config: DebateConfig, context: DebateContext) {
    if (!Number.isInteger(config.rounds) || config.rounds < 0) {
      throw new RangeError(`rounds must be a non-negative integer, got ${config.rounds}`);
    }
    this.config = config;
    this.context = context;
    this.arguerInstruction = buildArguerInstruction(
      config.proposition.text,
      sideLabel(config.side),
      config.arguerStyle,
    );
    this.targetInstruction = buildTargetInstruction();
  }

  get currentPhase(): DebatePhase {
    return this.phase;
  }

  get history(): Transcript {
    return this.transcript;
  }

  async run(): Promise<DebateOutcome> {
    return withSpan("debate.run", "belief_shift.debate", async () => {
      const { proposition, rounds } = this.config;
      const side = sideLabel(this.config.side);

      this.enter("measuring_start");
      const credStart = await askCredence(
        buildCredenceQuestion(proposition.text, side, "initial"),
        createTranscript(),
        this.context,
      );
      logInfo(`[Initial credence] ${credStart}%`, { proposition: proposition.id, side });

      for (let round = 1; round <= rounds; round++) {
        this.enter("arguer_turn", round);
        const arguerPrompt = this.transcript.length === 0
          ? buildFirstArguerPrompt(proposition.text, side)
          : NEXT_ARGUER_PROMPT;
        await this.takeTurn("Arguer", this.arguerInstruction, arguerPrompt, round);

        this.enter("target_turn", round);
        await this.takeTurn("Target", this.targetInstruction, TARGET_PROMPT, round);
      }

      this.enter("measuring_end");
      const credEnd = await askCredence(
        buildCredenceQuestion(proposition.text, side, "final"),
        this.transcript,
        this.context,
      );
      logInfo(`[Initial credence] ${credStart}% -> [Final credence] ${credEnd}%`, {
        proposition: proposition.id,
        side,
        style: this.config.arguerStyle,
      });

      this.enter("done");
      countMetric("belief_shift.debate.completed", 1, { style: this.config.arguerStyle });

      return { credStart, credEnd, transcript: this.transcript };
    });
  }

  private async takeTurn(
    speaker: Speaker,
    systemInstruction: string,
    trailingPrompt: string,
    round: number,
  ): Promise<void> {
    const contents = renderConversation(this.transcript, trailingPrompt);

    logChunked(`[${speaker} SYSTEM]`, systemInstruction, { round });
    logChunked(`[${speaker} INPUT]`, contents, { round });

    const result = await callWithRetry(
      () => this.context.generator.generate({ model: this.context.model, systemInstruction, contents }),
      { ...this.context.retry, label: `${speaker.toLowerCase()} turn ${round}` },
    );
    const raw = unwrapCallResult(result);

    logChunked(`[${speaker} →]`, raw, { round, attempts: result.attempts });
    this.transcript = appendTurn(this.transcript, speaker, raw.trim());
  }

  private enter(phase: DebatePhase, round?: number): void {
    this.phase = phase;
    logInfo("debate.phase", {
      phase,
      proposition: this.config.proposition.id,
      ...(round !== undefined && { round }),
    });
  }
}

export function runDebate(config: DebateConfig, context: DebateContext): Promise<DebateOutcome> {
  return new DebateOrchestrator(config, context).run();
}
