/**
 * Probe Types
 *
 * Region/model tables are static input. Probe results are frozen once
 * produced and live only for the duration of one run.
 */

// ============================================
// MODEL TABLE
// ============================================

export interface ModelSpec {
  /** Inference model identifier, e.g. "anthropic.claude-3-haiku-20240307-v1:0" */
  id: string;
  displayName: string;
}

/** Region identifier → models, both in declaration order. */
export type RegionModelTable = ReadonlyMap<string, readonly ModelSpec[]>;

// ============================================
// PROBE RESULTS
// ============================================

export type ProbeMode = "direct" | "proxy";

export const PROBE_MODES: readonly ProbeMode[] = ["direct", "proxy"];

export interface TokenUsage {
  input: number;
  output: number;
}

export interface ProbeSuccess {
  readonly success: true;
  readonly statusCode: number;
  readonly elapsedSeconds: number;
  readonly tokenUsage: Readonly<TokenUsage>;
  readonly responseSnippet: string;
}

export interface ProbeFailure {
  readonly success: false;
  /** Class name of the error raised by the call or the parse step */
  readonly errorKind: string;
  readonly errorMessage: string;
}

export type ProbeResult = ProbeSuccess | ProbeFailure;

export interface ProbePair {
  /** "{displayName} @ {region}" */
  key: string;
  region: string;
  model: ModelSpec;
}

export interface RunResults {
  /** Every checked pair, in table order */
  pairs: ProbePair[];
  direct: Map<string, ProbeResult>;
  proxy: Map<string, ProbeResult>;
}

// ============================================
// PROGRESS EVENTS
// ============================================

export interface PairStartedEvent {
  /** 1-based */
  index: number;
  total: number;
  region: string;
  model: ModelSpec;
}

export interface ProbeFinishedEvent extends PairStartedEvent {
  mode: ProbeMode;
  result: ProbeResult;
}

export interface ProbeObserver {
  pairStarted?(event: PairStartedEvent): void;
  probeFinished?(event: ProbeFinishedEvent): void;
}
