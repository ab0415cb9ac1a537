import {
  buildCredenceAskerInstruction,
  buildTargetInstruction,
} from "@/features/belief-shift/prompt-builder";
import type { GenerateRequest, Generator } from "@/features/belief-shift/generator";

export type CallRole = "credence" | "arguer" | "target";

export interface ScriptedGenerator extends Generator {
  readonly calls: GenerateRequest[];
  callsFor(role: CallRole): GenerateRequest[];
}

export function roleOf(request: GenerateRequest): CallRole {
  if (request.systemInstruction === buildCredenceAskerInstruction()) return "credence";
  if (request.systemInstruction === buildTargetInstruction()) return "target";
  return "arguer";
}

/**
 * In-process stand-in for the model endpoint. `respond` receives each request
 * and the 1-based count of calls made so far for that role; it may throw.
 */
export function createScriptedGenerator(
  respond: (request: GenerateRequest, role: CallRole, roleCallNumber: number) => string | Promise<string>,
): ScriptedGenerator {
  const calls: GenerateRequest[] = [];
  const counters: Record<CallRole, number> = { credence: 0, arguer: 0, target: 0 };

  return {
    calls,
    callsFor(role) {
      return calls.filter((request) => roleOf(request) === role);
    },
    async generate(request) {
      calls.push(request);
      const role = roleOf(request);
      counters[role]++;
      return respond(request, role, counters[role]);
    },
  };
}

/**
 * Replies with the given credences in order (cycling), `Arguer point N` and
 * `Target reply N` for debate turns.
 */
export function createDebateGenerator(credences: readonly string[]): ScriptedGenerator {
  return createScriptedGenerator((_request, role, n) => {
    if (role === "credence") {
      return credences[(n - 1) % credences.length] ?? "50";
    }
    return role === "arguer" ? `  Arguer point ${n}  ` : `Target reply ${n}\n`;
  });
}
