import type { Logger } from '@switchyard/core';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { EventLogger, InMemoryLogStore } from '@switchyard/event-log';
import { HandlerRegistry } from '@switchyard/handlers';
import { Dispatcher } from '../src/dispatcher.js';

export const AGENT = 'test-agent';

export interface Harness {
  dispatcher: Dispatcher;
  registry: HandlerRegistry;
  eventLog: EventLogger;
  store: InMemoryLogStore;
  chat: { chat: Mock<(text: string, signal?: AbortSignal) => Promise<string>> };
  logger: Logger;
}

/** Dispatcher wired to an in-memory store and a canned chat handler. */
export function createHarness(options: { deadlineMs?: number; reply?: string } = {}): Harness {
  const registry = new HandlerRegistry();
  const store = new InMemoryLogStore();
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const eventLog = new EventLogger({ store, logger });
  const reply = options.reply ?? 'fallback reply';
  const chat = { chat: vi.fn(async (_text: string, _signal?: AbortSignal) => reply) };
  const dispatcher = new Dispatcher({
    registry,
    chat,
    eventLog,
    agentName: AGENT,
    deadlineMs: options.deadlineMs,
    logger,
  });
  return { dispatcher, registry, eventLog, store, chat, logger };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
