import {
  assistantMessage,
  systemMessage,
  toolResultsMessage,
  type CompletionRequest,
  type CompletionResponse,
  type ToolDefinition,
  type UserMessage,
} from '@tether/core';
import { throwIfAborted } from './abort.js';
import { capturePausedRun, resolvePendingCalls } from './deferral.js';
import { HasDeferredToolsError, IterationLimitExceededError } from './errors.js';
import type { LoopObserver } from './loop-observer.js';
import { ResponseHandler } from './response-handler.js';
import { RetryingCompletion } from './retrying-completion.js';
import type { RunSettings } from './run-settings.js';
import { RunState } from './run-state.js';
import type { AgentResult, PausedAgentRun, Resolutions } from './types.js';
import { checkUsageLimits } from './usage-limiter.js';

/** How a mode obtains one completion: blocking, or streamed with deltas forwarded. */
export type ModelCaller = (completion: RetryingCompletion, request: CompletionRequest) => Promise<CompletionResponse>;

export const blockingModelCaller: ModelCaller = (completion, request) => completion.complete(request);

/**
 * Drives iterations between the model and the tools until output or a
 * terminal condition. Shared by every execution mode.
 */
export class RunLoop<Deps, Output> {
  private readonly handler: ResponseHandler<Deps, Output>;

  constructor(private readonly settings: RunSettings<Deps, Output>) {
    this.handler = new ResponseHandler(settings);
  }

  /** Start a run from a prompt appended to optional prior history. */
  async start(
    prompt: UserMessage,
    state: RunState<Deps>,
    observer: LoopObserver<Output>,
    callModel: ModelCaller,
    signal: AbortSignal,
  ): Promise<AgentResult<Output>> {
    state.append(prompt);
    this.settings.logger.info(`Run ${state.runId} started`, { model: this.settings.model.name });
    observer.onLoopStart(state.runId, prompt);
    return this.drive(state, observer, callModel, signal);
  }

  /** Apply resolutions to a paused run, then rejoin the loop. */
  async resume(
    paused: PausedAgentRun,
    resolutions: Resolutions,
    deps: Deps,
    observer: LoopObserver<Output>,
    callModel: ModelCaller,
    signal: AbortSignal,
  ): Promise<AgentResult<Output>> {
    const state = new RunState<Deps>({
      deps,
      runId: paused.runId,
      messages: paused.messages,
      usage: paused.usage,
      requestCount: paused.requestCount,
      toolCallCount: paused.toolCallCount,
      validationRetries: paused.validationRetries,
    });
    this.settings.logger.info(`Run ${state.runId} resumed`, { pending: paused.pendingCalls.length });
    observer.onLoopStart(state.runId, undefined);

    throwIfAborted(signal);
    const { results, redeferred } = await resolvePendingCalls(
      paused,
      resolutions,
      this.settings.engine,
      this.handler.scope(state, state.requestCount, signal),
    );
    if (results.length > 0) state.append(toolResultsMessage(results));
    if (redeferred.length > 0) {
      this.settings.logger.info(`Run ${state.runId} paused again on ${redeferred.length} deferred tool call(s)`);
      throw new HasDeferredToolsError(capturePausedRun(state, redeferred, paused.skippedCalls));
    }
    return this.drive(state, observer, callModel, signal);
  }

  private async drive(
    state: RunState<Deps>,
    observer: LoopObserver<Output>,
    callModel: ModelCaller,
    signal: AbortSignal,
  ): Promise<AgentResult<Output>> {
    const { settings } = this;
    const completion = new RetryingCompletion(settings.model, {
      policy: settings.retryPolicy,
      logger: settings.logger,
      signal,
    });

    for (;;) {
      throwIfAborted(signal);
      if (state.requestCount >= settings.maxIterations) {
        throw new IterationLimitExceededError(settings.maxIterations);
      }
      checkUsageLimits(settings.usageLimits, state);

      const step = state.requestCount + 1;
      const request = this.buildRequest(state);
      observer.onBeforeModelCall(step, request);
      settings.logger.debug(`Run ${state.runId} model request ${step}`, { messages: request.messages.length });

      const response = await callModel(completion, request);
      state.requestCount++;
      state.addUsage(response.usage);
      state.append(assistantMessage(response.content ?? '', response.toolCalls));
      observer.onModelResponse(step, response, state.usage);

      const action = await this.handler.handle(response, state, step, observer, signal);
      if (action.type === 'output') {
        const result: AgentResult<Output> = {
          output: action.output,
          usage: state.usage,
          messages: state.copyMessages(),
          runId: state.runId,
          requestCount: state.requestCount,
          toolCallCount: state.toolCallCount,
        };
        if (action.outputToolName !== undefined) result.outputToolName = action.outputToolName;
        settings.logger.info(`Run ${state.runId} finished`, {
          requests: state.requestCount,
          toolCalls: state.toolCallCount,
        });
        observer.onEnd(result);
        return result;
      }
    }
  }

  /** System prompt, full history, tool catalog and the output pseudo-tool when output is structured. */
  buildRequest(state: RunState<Deps>): CompletionRequest {
    const { settings } = this;
    const messages = settings.systemPrompt
      ? [systemMessage(settings.systemPrompt), ...state.getMessages()]
      : [...state.getMessages()];

    const tools: ToolDefinition[] = settings.tools.map((t) => t.definition);
    if (settings.output.kind === 'structured') {
      tools.push({
        name: settings.outputToolName,
        description: settings.outputToolDescription,
        inputSchema: settings.output.schema,
      });
    }

    const request: CompletionRequest = { messages };
    if (tools.length > 0) request.tools = tools;
    if (settings.completionOptions) request.options = { ...settings.completionOptions };
    return request;
  }
}
