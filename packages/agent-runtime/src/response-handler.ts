import {
  toolResultsMessage,
  userMessage,
  type CompletionResponse,
  type ToolCall,
  type ToolResultEntry,
} from '@tether/core';
import { throwIfAborted } from './abort.js';
import type { RunContext } from './agent-context.js';
import { capturePausedRun } from './deferral.js';
import {
  HasDeferredToolsError,
  InternalAgentError,
  ModelRefusedError,
  OutputValidationError,
  TruncatedOrFilteredError,
  UnexpectedModelBehaviorError,
  ValidationRetry,
} from './errors.js';
import type { LoopObserver } from './loop-observer.js';
import type { StructuredOutputSpec } from './output.js';
import type { RunSettings } from './run-settings.js';
import type { RunState } from './run-state.js';
import type { ToolCallScope } from './tool-execution-engine.js';
import type { PendingToolCall, ToolExecutionRecord, ToolOutcome } from './types.js';

export const OUTPUT_ACCEPTED_MESSAGE = 'Final result accepted';
export const OUTPUT_ALREADY_PROVIDED_MESSAGE = 'Tool call skipped: final result already provided';

/** What the loop should do after a response has been handled. */
export type HandlerAction<Output> =
  | { type: 'output'; output: Output; outputToolName?: string }
  | { type: 'continue' };

type OutputVerdict<Output> = { ok: true; output: Output } | { ok: false; message: string };

/** Turns a model response into the loop's next action. */
export class ResponseHandler<Deps, Output> {
  constructor(private readonly settings: RunSettings<Deps, Output>) {}

  async handle(
    response: CompletionResponse,
    state: RunState<Deps>,
    step: number,
    observer: LoopObserver<Output>,
    signal: AbortSignal,
  ): Promise<HandlerAction<Output>> {
    if (response.refusal !== undefined) {
      throw new ModelRefusedError(response.refusal);
    }

    switch (response.stopReason) {
      case 'max_tokens':
      case 'content_filtered':
        throw new TruncatedOrFilteredError(response.stopReason);

      case 'tool_use':
        if (response.toolCalls.length === 0) {
          throw new UnexpectedModelBehaviorError('Model requested tool use without any tool calls');
        }
        return this.handleToolCalls(response.toolCalls, state, step, observer, signal);

      case 'end_turn':
      case 'stop_sequence':
        if (response.toolCalls.length > 0) {
          return this.handleToolCalls(response.toolCalls, state, step, observer, signal);
        }
        if (this.settings.output.kind === 'text' && response.content) {
          return this.handleText(response.content, state, step, signal);
        }
        throw new UnexpectedModelBehaviorError('Model ended without output or tool calls');
    }
  }

  private async handleText(
    content: string,
    state: RunState<Deps>,
    step: number,
    signal: AbortSignal,
  ): Promise<HandlerAction<Output>> {
    if (this.settings.output.kind !== 'text') {
      throw new InternalAgentError('text output handled for a structured output spec');
    }
    try {
      const output = await this.validate(this.settings.output.fromText(content), state, step, signal);
      return { type: 'output', output };
    } catch (err) {
      if (!(err instanceof ValidationRetry)) throw err;
      state.append(userMessage(`Validation feedback: ${err.message}`));
      this.recordValidationFailure(state, err.message);
      return { type: 'continue' };
    }
  }

  private async handleToolCalls(
    calls: ToolCall[],
    state: RunState<Deps>,
    step: number,
    observer: LoopObserver<Output>,
    signal: AbortSignal,
  ): Promise<HandlerAction<Output>> {
    const { output: spec, outputToolName, endStrategy, engine } = this.settings;
    const structured = spec.kind === 'structured' ? spec : undefined;
    const scope = this.scope(state, step, signal);

    observer.onBeforeToolBatch(step, calls);
    const results = new Map<ToolCall, ToolResultEntry>();
    const records: ToolExecutionRecord[] = [];

    let accepted: { output: Output } | undefined;
    let lastFeedback: string | undefined;
    for (const segment of splitBatch(calls, (call) => structured !== undefined && call.name === outputToolName)) {
      if (segment.kind === 'tools') {
        if (accepted && endStrategy === 'early') {
          for (const call of segment.calls) results.set(call, errorEntry(call, OUTPUT_ALREADY_PROVIDED_MESSAGE));
          continue;
        }
        let pending = segment.calls;
        while (pending.length > 0) {
          const batch = await engine.executeAll(pending, scope, (record) => {
            observer.onToolComplete(record);
          });
          state.toolCallCount += batch.records.length;
          records.push(...batch.records);
          for (const record of batch.records) {
            if (record.outcome.type !== 'deferred') results.set(record.call, entryFromOutcome(record.call, record.outcome));
          }
          if (!batch.deferred) break;

          const { call, deferral } = batch.deferred;
          if (!accepted) {
            observer.onAfterToolBatch(step, records);
            this.pause(state, calls, results, { call, deferral }, lastFeedback);
          }
          results.set(call, errorEntry(call, `Tool call deferred (${deferral.reason}) and not executed: final result already provided`));
          pending = batch.unattempted;
        }
        continue;
      }

      const { call } = segment;
      if (accepted || !structured) {
        results.set(call, errorEntry(call, OUTPUT_ALREADY_PROVIDED_MESSAGE));
        continue;
      }
      const verdict = await this.evaluateOutputCall(structured, call, state, step, signal);
      if (verdict.ok) {
        accepted = { output: verdict.output };
        results.set(call, { toolCallId: call.id, content: OUTPUT_ACCEPTED_MESSAGE, isError: false });
      } else {
        lastFeedback = verdict.message;
        results.set(call, errorEntry(call, verdict.message));
      }
    }

    observer.onAfterToolBatch(step, records);
    state.append(toolResultsMessage(calls.map((call) => requireEntry(results, call))));

    if (accepted) {
      return { type: 'output', output: accepted.output, outputToolName };
    }
    if (lastFeedback !== undefined) this.recordValidationFailure(state, lastFeedback);
    return { type: 'continue' };
  }

  /** Record what settled before `deferred` and stop the run. Calls after it are carried as skipped. */
  private pause(
    state: RunState<Deps>,
    calls: ToolCall[],
    results: Map<ToolCall, ToolResultEntry>,
    deferred: PendingToolCall,
    lastFeedback: string | undefined,
  ): never {
    if (lastFeedback !== undefined) this.recordValidationFailure(state, lastFeedback);
    const settled = calls.flatMap((c) => results.get(c) ?? []);
    if (settled.length > 0) state.append(toolResultsMessage(settled));
    const skipped = calls.slice(calls.indexOf(deferred.call) + 1);
    const paused = capturePausedRun(state, [deferred], skipped);
    this.settings.logger.info(`Run ${state.runId} paused on deferred tool call ${deferred.call.name}`, {
      deferralId: deferred.deferral.id,
      kind: deferred.deferral.kind,
    });
    throw new HasDeferredToolsError(paused);
  }

  private async evaluateOutputCall(
    spec: StructuredOutputSpec<Output>,
    call: ToolCall,
    state: RunState<Deps>,
    step: number,
    signal: AbortSignal,
  ): Promise<OutputVerdict<Output>> {
    const parsed = spec.parse(call.arguments);
    if (!parsed.ok) return { ok: false, message: parsed.message };
    try {
      return { ok: true, output: await this.validate(parsed.value, state, step, signal) };
    } catch (err) {
      if (err instanceof ValidationRetry) return { ok: false, message: err.message };
      throw err;
    }
  }

  private async validate(candidate: Output, state: RunState<Deps>, step: number, signal: AbortSignal): Promise<Output> {
    const context: RunContext<Deps> = { ...this.scope(state, step, signal), retries: state.validationRetries };
    let output = candidate;
    for (const validator of this.settings.outputValidators) {
      output = await validator(context, output);
      throwIfAborted(signal);
    }
    return output;
  }

  private recordValidationFailure(state: RunState<Deps>, feedback: string): void {
    state.validationRetries++;
    const max = this.settings.maxValidationRetries;
    this.settings.logger.debug(`Output rejected (${state.validationRetries}): ${feedback}`);
    if (max !== undefined && state.validationRetries > max) {
      throw new OutputValidationError(state.validationRetries, feedback);
    }
  }

  scope(state: RunState<Deps>, step: number, signal: AbortSignal): ToolCallScope<Deps> {
    return {
      deps: state.deps,
      model: this.settings.model,
      usage: state.usage,
      runId: state.runId,
      runStep: step,
      messages: state.copyMessages(),
      signal,
    };
  }
}

type BatchSegment = { kind: 'tools'; calls: ToolCall[] } | { kind: 'output'; call: ToolCall };

/** Split a batch into runs of regular calls and single output calls, keeping call order. */
function splitBatch(calls: readonly ToolCall[], isOutputCall: (call: ToolCall) => boolean): BatchSegment[] {
  const segments: BatchSegment[] = [];
  let tools: ToolCall[] = [];
  for (const call of calls) {
    if (!isOutputCall(call)) {
      tools.push(call);
      continue;
    }
    if (tools.length > 0) segments.push({ kind: 'tools', calls: tools });
    tools = [];
    segments.push({ kind: 'output', call });
  }
  if (tools.length > 0) segments.push({ kind: 'tools', calls: tools });
  return segments;
}

function errorEntry(call: ToolCall, content: string): ToolResultEntry {
  return { toolCallId: call.id, content, isError: true };
}

export function entryFromOutcome(call: ToolCall, outcome: ToolOutcome): ToolResultEntry {
  switch (outcome.type) {
    case 'success':
      return { toolCallId: call.id, content: outcome.content, isError: false };
    case 'failure':
      return errorEntry(call, outcome.error.message);
    case 'retry':
      return errorEntry(call, outcome.feedback);
    case 'deferred':
      return errorEntry(call, `Tool call deferred: ${outcome.deferral.reason}`);
  }
}

function requireEntry(results: Map<ToolCall, ToolResultEntry>, call: ToolCall): ToolResultEntry {
  const entry = results.get(call);
  if (!entry) throw new InternalAgentError(`no result recorded for tool call ${call.id}`);
  return entry;
}
