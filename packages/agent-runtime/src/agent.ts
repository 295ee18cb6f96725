import {
  noopLogger,
  userMessage,
  type CompletionOptions,
  type ContentPart,
  type EndStrategy,
  type Logger,
  type Model,
} from '@tether/core';
import { childAbortController } from './abort.js';
import type { AgentTool } from './agent-tool.js';
import { AsyncEventQueue } from './async-event-queue.js';
import { ToolConflictError } from './errors.js';
import {
  IteratingLoopObserver,
  NoopLoopObserver,
  StreamingLoopObserver,
  type LoopObserver,
} from './loop-observer.js';
import type { OutputSpec, OutputValidator } from './output.js';
import { RetryPolicies, type RetryPolicy } from './retry-policy.js';
import { RunLoop, blockingModelCaller, type ModelCaller } from './run-loop.js';
import type { RunSettings } from './run-settings.js';
import { RunState } from './run-state.js';
import { ToolExecutionEngine } from './tool-execution-engine.js';
import type {
  AgentNode,
  AgentResult,
  AgentStreamEvent,
  PausedAgentRun,
  Resolutions,
  ResumeOptions,
  RunOptions,
  UsageLimits,
} from './types.js';

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_OUTPUT_TOOL_NAME = 'final_result';
export const DEFAULT_OUTPUT_TOOL_DESCRIPTION = 'Provide the final result';

export interface AgentOptions<Deps, Output> {
  model: Model;
  output: OutputSpec<Output>;
  systemPrompt?: string;
  tools?: readonly AgentTool<Deps>[];
  outputValidators?: readonly OutputValidator<Deps, Output>[];
  /** Ceiling on model requests per run, resumed segments included. */
  maxIterations?: number;
  usageLimits?: UsageLimits;
  endStrategy?: EndStrategy;
  outputToolName?: string;
  outputToolDescription?: string;
  retryPolicy?: RetryPolicy;
  toolTimeoutMs?: number;
  maxValidationRetries?: number;
  completionOptions?: CompletionOptions;
  logger?: Logger;
}

export type Prompt = string | ContentPart[];

/**
 * An agent configuration. Immutable once built; any number of runs may
 * execute against one instance concurrently, each with its own state.
 */
export class Agent<Deps, Output> {
  readonly settings: RunSettings<Deps, Output>;
  private readonly loop: RunLoop<Deps, Output>;

  constructor(options: AgentOptions<Deps, Output>) {
    const tools = [...(options.tools ?? [])];
    const outputToolName = options.outputToolName ?? DEFAULT_OUTPUT_TOOL_NAME;
    const names = new Set<string>();
    for (const tool of tools) {
      const name = tool.definition.name;
      if (names.has(name) || (options.output.kind === 'structured' && name === outputToolName)) {
        throw new ToolConflictError(name);
      }
      names.add(name);
    }

    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const logger = options.logger ?? noopLogger;
    this.settings = {
      model: options.model,
      output: options.output,
      systemPrompt: options.systemPrompt,
      tools,
      engine: new ToolExecutionEngine(tools, { timeoutMs: options.toolTimeoutMs, logger }),
      outputValidators: [...(options.outputValidators ?? [])],
      maxIterations,
      usageLimits: { ...options.usageLimits },
      endStrategy: options.endStrategy ?? 'early',
      outputToolName,
      outputToolDescription: options.outputToolDescription ?? DEFAULT_OUTPUT_TOOL_DESCRIPTION,
      retryPolicy: options.retryPolicy ?? RetryPolicies.default,
      maxValidationRetries: options.maxValidationRetries,
      completionOptions: options.completionOptions,
      logger,
    };
    this.loop = new RunLoop(this.settings);
  }

  /** Run to completion and return the final result. */
  async run(prompt: Prompt, deps: Deps, options: RunOptions = {}): Promise<AgentResult<Output>> {
    const { controller, dispose } = childAbortController(options.signal);
    try {
      return await this.loop.start(
        userMessage(prompt),
        new RunState({ deps, messages: options.history }),
        new NoopLoopObserver(),
        blockingModelCaller,
        controller.signal,
      );
    } finally {
      dispose();
    }
  }

  /**
   * Run with live events: model deltas, usage updates, tool results and
   * the final result. Breaking out of the iteration cancels the run.
   */
  stream(prompt: Prompt, deps: Deps, options: RunOptions = {}): AsyncIterable<AgentStreamEvent<Output>> {
    const { controller, dispose } = childAbortController(options.signal);
    const queue = new AsyncEventQueue<AgentStreamEvent<Output>>(() => controller.abort());
    const streamingCaller: ModelCaller = (completion, request) =>
      completion.stream(request, (event) => {
        if (event.type !== 'completion') queue.push(event);
      });

    this.launch(queue, dispose, () =>
      this.loop.start(
        userMessage(prompt),
        new RunState({ deps, messages: options.history }),
        new StreamingLoopObserver(queue),
        streamingCaller,
        controller.signal,
      ),
    );
    return queue;
  }

  /** Run step by step, yielding a node for each stage of the loop. */
  iterate(prompt: Prompt, deps: Deps, options: RunOptions = {}): AsyncIterable<AgentNode<Output>> {
    const { controller, dispose } = childAbortController(options.signal);
    const queue = new AsyncEventQueue<AgentNode<Output>>(() => controller.abort());
    this.launch(queue, dispose, () =>
      this.loop.start(
        userMessage(prompt),
        new RunState({ deps, messages: options.history }),
        new IteratingLoopObserver(queue),
        blockingModelCaller,
        controller.signal,
      ),
    );
    return queue;
  }

  /**
   * Continue a paused run with resolutions for its pending calls. Not
   * idempotent: resuming the same snapshot twice runs approved tools twice.
   */
  async resume(
    paused: PausedAgentRun,
    resolutions: Resolutions,
    deps: Deps,
    options: ResumeOptions = {},
  ): Promise<AgentResult<Output>> {
    const { controller, dispose } = childAbortController(options.signal);
    const observer: LoopObserver<Output> = new NoopLoopObserver();
    try {
      return await this.loop.resume(paused, resolutions, deps, observer, blockingModelCaller, controller.signal);
    } finally {
      dispose();
    }
  }

  private launch<T>(queue: AsyncEventQueue<T>, dispose: () => void, run: () => Promise<unknown>): void {
    run().then(
      () => {
        dispose();
        queue.complete();
      },
      (err: unknown) => {
        dispose();
        queue.error(err);
      },
    );
  }
}
