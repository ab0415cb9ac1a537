import { renderTranscript } from "./prompt-builder";
import type { Speaker, Transcript } from "./types";

/**
 * Debate history. The model endpoint keeps no state between calls, so the
 * whole transcript is rendered into every request; it is never truncated.
 */

export function createTranscript(): Transcript {
  return Object.freeze([]);
}

/** Returns a new transcript one turn longer; the input is left untouched. */
export function appendTurn(transcript: Transcript, speaker: Speaker, utterance: string): Transcript {
  return Object.freeze([...transcript, Object.freeze({ speaker, utterance })]);
}

export function renderConversation(transcript: Transcript, trailingPrompt: string): string {
  return renderTranscript(transcript, trailingPrompt);
}
