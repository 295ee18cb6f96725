import { describe, it, expect, vi } from 'vitest';
import { Type } from '@sinclair/typebox';
import { LLMError, type CompletionResponse, type Message } from '@tether/core';
import { Agent } from '../src/agent.js';
import { defineTool } from '../src/agent-tool.js';
import { structuredOutput, textOutput } from '../src/output.js';
import { createRetryPolicy } from '../src/retry-policy.js';
import {
  AgentCancelledError,
  IterationLimitExceededError,
  ModelRefusedError,
  OutputValidationError,
  ToolConflictError,
  ToolTimeoutError,
  TruncatedOrFilteredError,
  UnexpectedModelBehaviorError,
  UsageLimitExceededError,
  ValidationRetry,
} from '../src/errors.js';
import { HangingModel, ScriptedModel, textResponse, tick, toolCall, toolUseResponse } from './helpers.js';

interface Deps {
  offset: number;
}

const addParams = Type.Object({ a: Type.Number(), b: Type.Number() });
const emptyParams = Type.Object({});
const add = defineTool<Deps, typeof addParams>({
  name: 'add',
  description: 'Add two numbers',
  parameters: addParams,
  execute: (args, ctx) => String(args.a + args.b + ctx.deps.offset),
});

const weather = Type.Object({ city: Type.String(), temp: Type.Number() });

describe('Agent.run', () => {
  it('returns text output after a single request', async () => {
    const model = new ScriptedModel([textResponse('Hello!')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput(), systemPrompt: 'Be brief' });

    const result = await agent.run('Hi', { offset: 0 });

    expect(result.output).toBe('Hello!');
    expect(result.requestCount).toBe(1);
    expect(result.toolCallCount).toBe(0);
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5 });
    expect(result.outputToolName).toBeUndefined();
    expect(result.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Hi' }] },
      { role: 'assistant', content: 'Hello!', toolCalls: [] },
    ]);
  });

  it('prepends the system prompt to each request without storing it', async () => {
    const model = new ScriptedModel([textResponse('Hello!')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput(), systemPrompt: 'Be brief' });

    const result = await agent.run('Hi', { offset: 0 });

    const request = model.requests[0];
    expect(request?.messages[0]).toEqual({ role: 'system', content: 'Be brief' });
    expect(request?.messages).toHaveLength(2);
    expect(request?.tools).toBeUndefined();
    expect(result.messages.some((m) => m.role === 'system')).toBe(false);
  });

  it('counts N tool rounds as N tool calls and N+1 requests', async () => {
    const model = new ScriptedModel([
      toolUseResponse([toolCall('add', { a: 1, b: 2 }, 'c1')]),
      toolUseResponse([toolCall('add', { a: 3, b: 4 }, 'c2')]),
      textResponse('Done'),
    ]);
    const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [add] });

    const result = await agent.run('Add things', { offset: 10 });

    expect(result.output).toBe('Done');
    expect(result.requestCount).toBe(3);
    expect(result.toolCallCount).toBe(2);
    expect(result.usage).toEqual({ inputTokens: 30, outputTokens: 15 });
    expect(result.messages.map((m) => m.role)).toEqual([
      'user',
      'assistant',
      'tool_results',
      'assistant',
      'tool_results',
      'assistant',
    ]);
    expect(result.messages[2]).toEqual({
      role: 'tool_results',
      results: [{ toolCallId: 'c1', content: '13', isError: false }],
    });
    expect(model.requests[1]?.messages).toHaveLength(3);
    expect(model.requests[0]?.tools?.map((t) => t.name)).toEqual(['add']);
  });

  it('reports unknown tools to the model and keeps going', async () => {
    const model = new ScriptedModel([toolUseResponse([toolCall('ghost', {}, 'c1')]), textResponse('ok')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [add] });

    const result = await agent.run('go', { offset: 0 });

    expect(result.messages[2]).toEqual({
      role: 'tool_results',
      results: [{ toolCallId: 'c1', content: 'Unknown tool: ghost', isError: true }],
    });
    expect(result.toolCallCount).toBe(1);
  });

  it('starts from prior history', async () => {
    const model = new ScriptedModel([textResponse('Second answer')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput() });
    const first = await new Agent<Deps, string>({
      model: new ScriptedModel([textResponse('First answer')]),
      output: textOutput(),
    }).run('First', { offset: 0 });

    const result = await agent.run('Second', { offset: 0 }, { history: first.messages });

    expect(result.messages).toHaveLength(4);
    expect(model.requests[0]?.messages).toHaveLength(3);
    expect(result.messages[1]).toEqual({ role: 'assistant', content: 'First answer', toolCalls: [] });
  });

  it('freezes transcript messages', async () => {
    const model = new ScriptedModel([textResponse('Hello!')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput() });

    const result = await agent.run('Hi', { offset: 0 });
    expect(Object.isFrozen(result.messages[0])).toBe(true);
  });

  it('gives concurrent runs their own state', async () => {
    const model = new ScriptedModel([textResponse('one'), textResponse('two')]);
    const agent = new Agent<Deps, string>({ model, output: textOutput() });

    const [a, b] = await Promise.all([agent.run('a', { offset: 0 }), agent.run('b', { offset: 0 })]);

    expect(a.runId).not.toBe(b.runId);
    expect([a.output, b.output].sort()).toEqual(['one', 'two']);
    expect(a.messages).toHaveLength(2);
    expect(b.messages).toHaveLength(2);
  });

  it('retries transient model failures per the retry policy', async () => {
    const model = new ScriptedModel([new LLMError('server_error', '503'), textResponse('ok')]);
    const agent = new Agent<Deps, string>({
      model,
      output: textOutput(),
      retryPolicy: createRetryPolicy({ initialDelayMs: 1, jitter: 0 }),
    });

    const result = await agent.run('go', { offset: 0 });
    expect(result.output).toBe('ok');
    expect(result.requestCount).toBe(1);
    expect(model.requests).toHaveLength(2);
  });

  describe('structured output', () => {
    it('accepts a valid output tool call', async () => {
      const model = new ScriptedModel([toolUseResponse([toolCall('final_result', { city: 'Oslo', temp: 4 }, 'o1')])]);
      const agent = new Agent<Deps, { city: string; temp: number }>({ model, output: structuredOutput(weather) });

      const result = await agent.run('Weather?', { offset: 0 });

      expect(result.output).toEqual({ city: 'Oslo', temp: 4 });
      expect(result.outputToolName).toBe('final_result');
      expect(result.toolCallCount).toBe(0);
      expect(result.messages[2]).toEqual({
        role: 'tool_results',
        results: [{ toolCallId: 'o1', content: 'Final result accepted', isError: false }],
      });
      expect(model.requests[0]?.tools).toEqual([
        { name: 'final_result', description: 'Provide the final result', inputSchema: weather },
      ]);
    });

    it('sends schema feedback and retries on invalid output', async () => {
      const model = new ScriptedModel([
        toolUseResponse([toolCall('final_result', { city: 'Oslo' }, 'o1')]),
        toolUseResponse([toolCall('final_result', { city: 'Oslo', temp: 4 }, 'o2')]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({ model, output: structuredOutput(weather) });

      const result = await agent.run('Weather?', { offset: 0 });

      expect(result.output).toEqual({ city: 'Oslo', temp: 4 });
      expect(result.requestCount).toBe(2);
      const feedback = result.messages[2];
      expect(feedback?.role).toBe('tool_results');
      if (feedback?.role === 'tool_results') {
        expect(feedback.results[0]?.isError).toBe(true);
        expect(feedback.results[0]?.content.split('\n')[0]).toBe('Invalid final result:');
        expect(feedback.results[0]?.content).toContain('  - temp: number (required)');
      }
    });

    it('fails with OutputValidationError past maxValidationRetries', async () => {
      const model = new ScriptedModel([
        toolUseResponse([toolCall('final_result', { city: 'Oslo' }, 'o1')]),
        toolUseResponse([toolCall('final_result', { city: 'Oslo' }, 'o2')]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({
        model,
        output: structuredOutput(weather),
        maxValidationRetries: 1,
      });

      const err = await agent.run('Weather?', { offset: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(OutputValidationError);
      if (err instanceof OutputValidationError) expect(err.retries).toBe(2);
      expect(model.requests).toHaveLength(2);
    });

    it('skips regular tool calls under the early end strategy', async () => {
      const sideEffect = vi.fn(() => 'done');
      const notify = defineTool<Deps, typeof emptyParams>({
        name: 'notify',
        description: 'Notify',
        parameters: emptyParams,
        execute: sideEffect,
      });
      const model = new ScriptedModel([
        toolUseResponse([toolCall('final_result', { city: 'Oslo', temp: 4 }, 'o1'), toolCall('notify', {}, 'n1')]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({
        model,
        output: structuredOutput(weather),
        tools: [notify],
      });

      const result = await agent.run('Weather?', { offset: 0 });

      expect(sideEffect).not.toHaveBeenCalled();
      expect(result.toolCallCount).toBe(0);
      expect(result.messages[2]).toEqual({
        role: 'tool_results',
        results: [
          { toolCallId: 'o1', content: 'Final result accepted', isError: false },
          { toolCallId: 'n1', content: 'Tool call skipped: final result already provided', isError: true },
        ],
      });
    });

    it('runs regular calls that precede the output call under the early end strategy', async () => {
      const saved = vi.fn(() => 'saved');
      const save = defineTool<Deps, typeof emptyParams>({
        name: 'save',
        description: 'Save progress',
        parameters: emptyParams,
        execute: saved,
      });
      const model = new ScriptedModel([
        toolUseResponse([
          toolCall('save', {}, 's1'),
          toolCall('final_result', { city: 'Oslo', temp: 4 }, 'f1'),
          toolCall('save', {}, 's2'),
        ]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({
        model,
        output: structuredOutput(weather),
        tools: [save],
      });

      const result = await agent.run('Weather?', { offset: 0 });

      expect(result.output).toEqual({ city: 'Oslo', temp: 4 });
      expect(saved).toHaveBeenCalledTimes(1);
      expect(result.toolCallCount).toBe(1);
      expect(result.messages[2]).toEqual({
        role: 'tool_results',
        results: [
          { toolCallId: 's1', content: 'saved', isError: false },
          { toolCallId: 'f1', content: 'Final result accepted', isError: false },
          { toolCallId: 's2', content: 'Tool call skipped: final result already provided', isError: true },
        ],
      });
    });

    it('runs regular tool calls under the exhaustive end strategy', async () => {
      const sideEffect = vi.fn(() => 'done');
      const notify = defineTool<Deps, typeof emptyParams>({
        name: 'notify',
        description: 'Notify',
        parameters: emptyParams,
        execute: sideEffect,
      });
      const model = new ScriptedModel([
        toolUseResponse([toolCall('notify', {}, 'n1'), toolCall('final_result', { city: 'Oslo', temp: 4 }, 'o1')]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({
        model,
        output: structuredOutput(weather),
        tools: [notify],
        endStrategy: 'exhaustive',
      });

      const result = await agent.run('Weather?', { offset: 0 });

      expect(sideEffect).toHaveBeenCalledTimes(1);
      expect(result.toolCallCount).toBe(1);
      expect(result.messages[2]).toEqual({
        role: 'tool_results',
        results: [
          { toolCallId: 'n1', content: 'done', isError: false },
          { toolCallId: 'o1', content: 'Final result accepted', isError: false },
        ],
      });
    });

    it('accepts only the first valid output call', async () => {
      const model = new ScriptedModel([
        toolUseResponse([
          toolCall('final_result', { city: 'Oslo', temp: 4 }, 'o1'),
          toolCall('final_result', { city: 'Bergen', temp: 9 }, 'o2'),
        ]),
      ]);
      const agent = new Agent<Deps, { city: string; temp: number }>({ model, output: structuredOutput(weather) });

      const result = await agent.run('Weather?', { offset: 0 });
      expect(result.output).toEqual({ city: 'Oslo', temp: 4 });
      expect(result.messages[2]).toEqual({
        role: 'tool_results',
        results: [
          { toolCallId: 'o1', content: 'Final result accepted', isError: false },
          { toolCallId: 'o2', content: 'Tool call skipped: final result already provided', isError: true },
        ],
      });
    });

    it('treats plain text without an output call as unexpected', async () => {
      const model = new ScriptedModel([textResponse('It is cold')]);
      const agent = new Agent<Deps, { city: string; temp: number }>({ model, output: structuredOutput(weather) });

      await expect(agent.run('Weather?', { offset: 0 })).rejects.toBeInstanceOf(UnexpectedModelBehaviorError);
    });
  });

  describe('output validators', () => {
    it('feeds ValidationRetry messages back and transforms accepted output', async () => {
      const retriesSeen: number[] = [];
      const model = new ScriptedModel([textResponse('hi'), textResponse('hi!')]);
      const agent = new Agent<Deps, string>({
        model,
        output: textOutput(),
        outputValidators: [
          (ctx, output) => {
            retriesSeen.push(ctx.retries);
            if (!output.endsWith('!')) throw new ValidationRetry('Add an exclamation mark');
            return output.toUpperCase();
          },
        ],
      });

      const result = await agent.run('Greet', { offset: 0 });

      expect(result.output).toBe('HI!');
      expect(retriesSeen).toEqual([0, 1]);
      expect(result.messages[2]).toEqual({
        role: 'user',
        content: [{ type: 'text', text: 'Validation feedback: Add an exclamation mark' }],
      });
    });

    it('propagates other validator errors', async () => {
      const model = new ScriptedModel([textResponse('hi')]);
      const agent = new Agent<Deps, string>({
        model,
        output: textOutput(),
        outputValidators: [
          () => {
            throw new RangeError('bad validator');
          },
        ],
      });

      await expect(agent.run('Greet', { offset: 0 })).rejects.toThrow('bad validator');
    });
  });

  describe('terminal conditions', () => {
    const refusal: CompletionResponse = {
      refusal: 'I cannot help with that',
      toolCalls: [],
      stopReason: 'end_turn',
      usage: { inputTokens: 1, outputTokens: 1 },
    };

    it('fails on refusal', async () => {
      const agent = new Agent<Deps, string>({ model: new ScriptedModel([refusal]), output: textOutput() });
      const err = await agent.run('x', { offset: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ModelRefusedError);
      if (err instanceof ModelRefusedError) expect(err.reason).toBe('I cannot help with that');
    });

    it('fails on truncation and content filtering', async () => {
      const truncated: CompletionResponse = { ...textResponse('partial'), stopReason: 'max_tokens' };
      const filtered: CompletionResponse = { ...textResponse(''), stopReason: 'content_filtered' };

      const a = await new Agent<Deps, string>({ model: new ScriptedModel([truncated]), output: textOutput() })
        .run('x', { offset: 0 })
        .catch((e: unknown) => e);
      const b = await new Agent<Deps, string>({ model: new ScriptedModel([filtered]), output: textOutput() })
        .run('x', { offset: 0 })
        .catch((e: unknown) => e);

      expect(a).toBeInstanceOf(TruncatedOrFilteredError);
      expect(b).toBeInstanceOf(TruncatedOrFilteredError);
      if (a instanceof TruncatedOrFilteredError) expect(a.reason).toBe('max_tokens');
      if (b instanceof TruncatedOrFilteredError) expect(b.reason).toBe('content_filtered');
    });

    it('fails when the model ends its turn with nothing', async () => {
      const agent = new Agent<Deps, string>({ model: new ScriptedModel([textResponse('')]), output: textOutput() });
      await expect(agent.run('x', { offset: 0 })).rejects.toThrow(
        'Unexpected model behavior: Model ended without output or tool calls',
      );
    });

    it('fails when tool use is requested without calls', async () => {
      const agent = new Agent<Deps, string>({ model: new ScriptedModel([toolUseResponse([])]), output: textOutput() });
      await expect(agent.run('x', { offset: 0 })).rejects.toBeInstanceOf(UnexpectedModelBehaviorError);
    });

    it('stops at the iteration ceiling', async () => {
      let n = 0;
      const loop = () => toolUseResponse([toolCall('add', { a: 1, b: 1 }, `c${++n}`)]);
      const model = new ScriptedModel([loop, loop, loop, loop]);
      const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [add], maxIterations: 2 });

      const err = await agent.run('x', { offset: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IterationLimitExceededError);
      if (err instanceof IterationLimitExceededError) expect(err.iterations).toBe(2);
      expect(model.requests).toHaveLength(2);
    });

    it('stops once a request ceiling is reached', async () => {
      const model = new ScriptedModel([toolUseResponse([toolCall('add', { a: 1, b: 1 }, 'c1')]), textResponse('unused')]);
      const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [add], usageLimits: { maxRequests: 1 } });

      const err = await agent.run('x', { offset: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UsageLimitExceededError);
      if (err instanceof UsageLimitExceededError) expect(err.kind).toBe('requests');
      expect(model.requests).toHaveLength(1);
    });

    it('stops once token usage passes its ceiling', async () => {
      const model = new ScriptedModel([
        toolUseResponse([toolCall('add', { a: 1, b: 1 }, 'c1')]),
        toolUseResponse([toolCall('add', { a: 1, b: 1 }, 'c2')]),
        textResponse('unused'),
      ]);
      const agent = new Agent<Deps, string>({
        model,
        output: textOutput(),
        tools: [add],
        usageLimits: { maxTotalTokens: 20 },
      });

      const err = await agent.run('x', { offset: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UsageLimitExceededError);
      if (err instanceof UsageLimitExceededError) {
        expect(err.kind).toBe('totalTokens');
        expect(err.used).toBe(30);
      }
      expect(model.requests).toHaveLength(2);
    });
  });

  describe('tools', () => {
    it('hands tools the transcript as it stood when their batch started', async () => {
      const captured: { messages?: readonly Message[] } = {};
      const peek = defineTool<Deps, typeof emptyParams>({
        name: 'peek',
        description: 'Look at the history',
        parameters: emptyParams,
        execute: (_args, ctx) => {
          captured.messages = ctx.messages;
          return 'ok';
        },
      });
      const model = new ScriptedModel([toolUseResponse([toolCall('peek', {}, 'p1')]), textResponse('done')]);
      const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [peek] });

      const result = await agent.run('Look', { offset: 0 });

      expect(result.messages).toHaveLength(4);
      expect(captured.messages?.map((m) => m.role)).toEqual(['user', 'assistant']);
    });

    it('fails the run with ToolTimeoutError once a tool overruns its timeout', async () => {
      const slow = defineTool<Deps, typeof emptyParams>({
        name: 'slow',
        description: 'Never finishes',
        parameters: emptyParams,
        execute: () => new Promise<string>(() => {}),
      });
      const model = new ScriptedModel([toolUseResponse([toolCall('slow', {}, 's1')])]);
      const agent = new Agent<Deps, string>({ model, output: textOutput(), tools: [slow], toolTimeoutMs: 50 });

      const started = performance.now();
      await expect(agent.run('Go', { offset: 0 })).rejects.toBeInstanceOf(ToolTimeoutError);
      expect(performance.now() - started).toBeLessThan(1000);
      expect(model.requests).toHaveLength(1);
    });
  });

  describe('cancellation', () => {
    it('rejects immediately with an already-aborted signal', async () => {
      const model = new ScriptedModel([textResponse('unused')]);
      const agent = new Agent<Deps, string>({ model, output: textOutput() });
      const controller = new AbortController();
      controller.abort();

      await expect(agent.run('x', { offset: 0 }, { signal: controller.signal })).rejects.toBeInstanceOf(
        AgentCancelledError,
      );
      expect(model.requests).toHaveLength(0);
    });

    it('cancels an in-flight model call', async () => {
      const model = new HangingModel();
      const agent = new Agent<Deps, string>({ model, output: textOutput() });
      const controller = new AbortController();

      const pending = agent.run('x', { offset: 0 }, { signal: controller.signal });
      await tick();
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(AgentCancelledError);
      expect(model.calls).toBe(1);
    });

    it('stops when the run is cancelled while an output validator runs', async () => {
      const controller = new AbortController();
      const model = new ScriptedModel([textResponse('hi')]);
      const agent = new Agent<Deps, string>({
        model,
        output: textOutput(),
        outputValidators: [
          (_ctx, output) => {
            controller.abort();
            return output;
          },
        ],
      });

      await expect(agent.run('Greet', { offset: 0 }, { signal: controller.signal })).rejects.toBeInstanceOf(
        AgentCancelledError,
      );
    });
  });
});

describe('Agent construction', () => {
  it('rejects duplicate tool names', () => {
    expect(() => new Agent<Deps, string>({ model: new ScriptedModel([]), output: textOutput(), tools: [add, add] })).toThrow(
      ToolConflictError,
    );
  });

  it('rejects a tool named like the output tool when output is structured', () => {
    const clash = defineTool<Deps, typeof emptyParams>({
      name: 'final_result',
      description: 'Clash',
      parameters: emptyParams,
      execute: () => 'x',
    });
    expect(() => new Agent({ model: new ScriptedModel([]), output: structuredOutput(weather), tools: [clash] })).toThrow(
      'Tool already registered: final_result',
    );
    expect(() => new Agent({ model: new ScriptedModel([]), output: textOutput(), tools: [clash] })).not.toThrow();
  });

  it('rejects a non-positive iteration ceiling', () => {
    expect(() => new Agent<Deps, string>({ model: new ScriptedModel([]), output: textOutput(), maxIterations: 0 })).toThrow(
      RangeError,
    );
  });
});

