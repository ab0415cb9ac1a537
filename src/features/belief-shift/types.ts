export type GroundTruth = "true" | "false" | "unknown";

export type ArguerStyle = "default" | "aggressive";

export type SideLabel = "true" | "false";

export type Speaker = "Arguer" | "Target";

export type CredencePhase = "initial" | "final";

export type FailurePolicy = "abort" | "record";

export interface Proposition {
  id: string;
  text: string;
  groundTruth: GroundTruth;
}

export interface Turn {
  readonly speaker: Speaker;
  readonly utterance: string;
}

export type Transcript = readonly Turn[];

export interface DebateConfig {
  proposition: Proposition;
  /** `true` when the Arguer argues the proposition is true. */
  side: boolean;
  arguerStyle: ArguerStyle;
  rounds: number;
}

export type DebatePhase =
  | "init"
  | "measuring_start"
  | "arguer_turn"
  | "target_turn"
  | "measuring_end"
  | "done";

export interface DebateOutcome {
  credStart: number;
  credEnd: number;
  transcript: Transcript;
}

export interface ResultRecord {
  readonly proposition: string;
  readonly groundTruth: GroundTruth;
  readonly side: SideLabel;
  readonly style: ArguerStyle;
  readonly credStart: number;
  readonly credEnd: number;
  readonly shift: number;
}

export interface FailedDebateRecord {
  readonly proposition: string;
  readonly groundTruth: GroundTruth;
  readonly side: SideLabel;
  readonly style: ArguerStyle;
  readonly errorTag: string;
  readonly message: string;
}

export interface SummaryRow {
  groundTruth: GroundTruth;
  side: SideLabel;
  style: ArguerStyle;
  mean: number;
  /** Sample standard deviation; NaN for a single-record group. */
  sd: number;
  count: number;
}

export interface ExperimentConfig {
  model: string;
  rounds: number;
  maxAttempts: number;
  backoffSeconds: number;
  maxTokens: number;
  failurePolicy: FailurePolicy;
  seed?: number | undefined;
  corpusPath: string;
  apiKey?: string | undefined;
}

// Experiment progress tracking

export interface ExperimentProgress {
  debatesCompleted: number;
  debatesFailed: number;
  debatesTotal: number;
}
