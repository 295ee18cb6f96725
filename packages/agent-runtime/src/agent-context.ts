import type { Message, Model, Usage } from '@tether/core';

/** Read-only view of a run handed to output validators. */
export interface RunContext<Deps> {
  deps: Deps;
  model: Model;
  /** Usage accumulated so far in the run. */
  usage: Usage;
  /** Retries already spent on the current item (tool call or output). */
  retries: number;
  runId: string;
  /** 1-based loop iteration. */
  runStep: number;
  messages: readonly Message[];
  /** Fires when the run is cancelled, or when a tool call times out. */
  signal: AbortSignal;
}

/** Context passed to every tool invocation. */
export interface AgentContext<Deps> extends RunContext<Deps> {
  toolCallId: string;
  toolName: string;
  /** True when this invocation follows an approval granted on resume. */
  approved: boolean;
}
