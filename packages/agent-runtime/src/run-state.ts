import { addUsage, emptyUsage, generateId, type Message, type Usage } from '@tether/core';

/**
 * Mutable state of a single run. Owned by one loop; never shared between runs.
 * Messages are frozen on append.
 */
export class RunState<Deps> {
  readonly runId: string;
  readonly deps: Deps;
  private messages: Message[];
  usage: Usage;
  requestCount: number;
  toolCallCount: number;
  validationRetries: number;

  constructor(params: {
    deps: Deps;
    messages?: readonly Message[];
    runId?: string;
    usage?: Usage;
    requestCount?: number;
    toolCallCount?: number;
    validationRetries?: number;
  }) {
    this.runId = params.runId ?? generateId();
    this.deps = params.deps;
    this.messages = (params.messages ?? []).map(freezeMessage);
    this.usage = params.usage ?? emptyUsage();
    this.requestCount = params.requestCount ?? 0;
    this.toolCallCount = params.toolCallCount ?? 0;
    this.validationRetries = params.validationRetries ?? 0;
  }

  append(message: Message): void {
    this.messages.push(freezeMessage(message));
  }

  addUsage(usage: Usage): void {
    this.usage = addUsage(this.usage, usage);
  }

  /** Read-only view of the transcript. */
  getMessages(): readonly Message[] {
    return this.messages;
  }

  /** Independent copy of the transcript, for results and snapshots. */
  copyMessages(): Message[] {
    return [...this.messages];
  }
}

function freezeMessage(message: Message): Message {
  return Object.isFrozen(message) ? message : deepFreeze(structuredClone(message));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
