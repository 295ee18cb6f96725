import { errorMessage, noopLogger, type DeferredToolCall, type Logger, type ToolCall } from '@tether/core';
import { childAbortController } from './abort.js';
import type { AgentContext, RunContext } from './agent-context.js';
import type { AgentTool } from './agent-tool.js';
import { AgentCancelledError, ToolNotFoundError, ToolRetriesExhaustedError, ToolTimeoutError } from './errors.js';
import { toolFailure } from './tool-outcome.js';
import type { ToolExecutionRecord, ToolOutcome } from './types.js';

/** Run-level view shared by every call in a batch. */
export type ToolCallScope<Deps> = Omit<RunContext<Deps>, 'retries'>;

export interface ToolExecutionEngineOptions {
  /** Per-attempt timeout. A timeout fails the whole run with ToolTimeoutError. */
  timeoutMs?: number;
  logger?: Logger;
}

export interface BatchExecution {
  /** Attempted calls in call order, including the one that deferred. */
  records: ToolExecutionRecord[];
  deferred?: { call: ToolCall; deferral: DeferredToolCall };
  /** Calls after the deferring one. Never invoked. */
  unattempted: ToolCall[];
}

/**
 * Executes tool calls with per-tool retries and an optional timeout.
 * Holds no state between calls.
 */
export class ToolExecutionEngine<Deps> {
  private readonly tools = new Map<string, AgentTool<Deps>>();
  private readonly logger: Logger;

  constructor(
    tools: readonly AgentTool<Deps>[],
    private readonly options: ToolExecutionEngineOptions = {},
  ) {
    for (const tool of tools) this.tools.set(tool.definition.name, tool);
    this.logger = options.logger ?? noopLogger;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Execute one call, re-invoking on `retry` outcomes up to the tool's `maxRetries`. */
  async execute(call: ToolCall, scope: ToolCallScope<Deps>): Promise<ToolExecutionRecord> {
    const start = performance.now();
    const tool = this.tools.get(call.name);
    if (!tool) {
      return this.finish(call, toolFailure(new ToolNotFoundError(call.name)), start);
    }

    let retries = 0;
    for (;;) {
      const outcome = await this.invokeAttempt(tool, call, scope, retries, false);
      if (outcome.type !== 'retry') return this.finish(call, outcome, start);
      if (retries >= tool.maxRetries) {
        return this.finish(
          call,
          toolFailure(new ToolRetriesExhaustedError(call.name, retries + 1, outcome.feedback)),
          start,
        );
      }
      retries++;
      this.logger.debug(`Tool ${call.name} asked for a retry (${retries}/${tool.maxRetries})`);
    }
  }

  /**
   * Execute one call with a single attempt. A `retry` outcome becomes a failure.
   * `approved` is handed to the tool as `context.approved`.
   */
  async executeOnce(call: ToolCall, scope: ToolCallScope<Deps>, approved = false): Promise<ToolExecutionRecord> {
    const start = performance.now();
    const tool = this.tools.get(call.name);
    if (!tool) {
      return this.finish(call, toolFailure(new ToolNotFoundError(call.name)), start);
    }
    const outcome = await this.invokeAttempt(tool, call, scope, 0, approved);
    if (outcome.type === 'retry') {
      return this.finish(call, toolFailure(new ToolRetriesExhaustedError(call.name, 1, outcome.feedback)), start);
    }
    return this.finish(call, outcome, start);
  }

  /** Execute calls in order, stopping after the first deferred outcome. */
  async executeAll(
    calls: readonly ToolCall[],
    scope: ToolCallScope<Deps>,
    onComplete?: (record: ToolExecutionRecord) => void,
  ): Promise<BatchExecution> {
    const records: ToolExecutionRecord[] = [];
    for (const [index, call] of calls.entries()) {
      const record = await this.execute(call, scope);
      records.push(record);
      onComplete?.(record);
      if (record.outcome.type === 'deferred') {
        return {
          records,
          deferred: { call, deferral: record.outcome.deferral },
          unattempted: calls.slice(index + 1),
        };
      }
    }
    return { records, unattempted: [] };
  }

  private finish(call: ToolCall, outcome: ToolOutcome, start: number): ToolExecutionRecord {
    const durationMs = Math.round(performance.now() - start);
    this.logger.debug(`Tool ${call.name} finished with ${outcome.type} in ${durationMs}ms`);
    return { call, outcome, durationMs };
  }

  private invokeAttempt(
    tool: AgentTool<Deps>,
    call: ToolCall,
    scope: ToolCallScope<Deps>,
    retries: number,
    approved: boolean,
  ): Promise<ToolOutcome> {
    if (scope.signal.aborted) return Promise.reject(new AgentCancelledError(scope.signal.reason));
    const { controller, dispose } = childAbortController(scope.signal);
    const context: AgentContext<Deps> = {
      ...scope,
      retries,
      toolCallId: call.id,
      toolName: call.name,
      approved,
      signal: controller.signal,
    };

    const invocation = Promise.resolve()
      .then(() => tool.invoke(context, call.arguments))
      .catch((err: unknown) => toolFailure(err instanceof Error ? err : new Error(errorMessage(err))));

    return this.race(invocation, call, controller, scope.signal).finally(dispose);
  }

  /** Settle with the invocation, or fail on run cancellation or timeout, whichever comes first. */
  private race(
    invocation: Promise<ToolOutcome>,
    call: ToolCall,
    controller: AbortController,
    runSignal: AbortSignal,
  ): Promise<ToolOutcome> {
    const { timeoutMs } = this.options;
    return new Promise<ToolOutcome>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const settle = () => {
        clearTimeout(timer);
        runSignal.removeEventListener('abort', onCancel);
      };
      const onCancel = () => {
        settle();
        reject(new AgentCancelledError(runSignal.reason));
      };

      if (runSignal.aborted) {
        onCancel();
        return;
      }
      runSignal.addEventListener('abort', onCancel, { once: true });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          settle();
          const err = new ToolTimeoutError(call.name, timeoutMs);
          this.logger.warn(err.message);
          controller.abort(err);
          reject(err);
        }, timeoutMs);
      }

      invocation.then(
        (outcome) => {
          settle();
          resolve(outcome);
        },
        (err: unknown) => {
          settle();
          reject(err);
        },
      );
    });
  }
}
