import { describe, it, expect, beforeEach } from 'vitest';
import { silentLogger } from '@switchyard/core';
import { EventLogger, InMemoryLogStore } from '@switchyard/event-log';
import { HandlerRegistry } from '@switchyard/handlers';
import { Dispatcher, CANCELLED_MESSAGE, TIMED_OUT_MESSAGE } from '../src/dispatcher.js';
import { AGENT, createHarness, sleep } from './helpers.js';
import type { Harness } from './helpers.js';

/** Slack allowed on top of a deadline for timer scheduling. */
const EPSILON_MS = 250;

describe('Dispatcher', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness({ deadlineMs: 100 });
  });

  // ── tools and capabilities ──────────────────────────────────────────

  describe('registered handlers', () => {
    it('routes a tool command and logs tool_usage', async () => {
      h.registry.register('tool', 'search_tool', async (params) => `Searching for: ${String(params['query'])}`);

      const outcome = await h.dispatcher.dispatch('use tool: search_tool {"query": "AI trends"}');

      expect(outcome.result).toBe('Searching for: AI trends');
      expect(outcome.source).toBe('tool');
      expect(outcome.fault).toBeUndefined();
      expect(h.chat.chat).not.toHaveBeenCalled();

      const entries = await h.eventLog.query({}, 10);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        activity_type: 'tool_usage',
        agent_name: AGENT,
        details: {
          tool_name: 'search_tool',
          params: { query: 'AI trends' },
          status: 'ok',
          result: 'Searching for: AI trends',
        },
        metadata: { level: 'info', deadline_ms: 100 },
      });
      expect(typeof entries[0]?.details['elapsed_ms']).toBe('number');
    });

    it('routes a capability command and logs capability_usage', async () => {
      h.registry.register('capability', 'translate', (params) => `[fr] ${String(params['text'])}`);

      const outcome = await h.dispatcher.dispatch('use capability: translate {"text": "hello"}');

      expect(outcome).toMatchObject({ result: '[fr] hello', source: 'capability' });
      const [entry] = await h.eventLog.query({ activityType: 'capability_usage' }, 5);
      expect(entry?.details).toMatchObject({ capability_name: 'translate', status: 'ok' });
    });

    it('does not cross namespaces', async () => {
      h.registry.register('capability', 'search_tool', () => 'capability result');

      const outcome = await h.dispatcher.dispatch('use tool: search_tool {}');

      expect(outcome.result).toBe("Tool 'search_tool' not found.");
    });

    it('reports elapsed time on the outcome', async () => {
      h.registry.register('tool', 'nap', async () => {
        await sleep(30);
        return 'rested';
      });

      const outcome = await h.dispatcher.dispatch('use tool: nap {}');
      expect(outcome.elapsedMs).toBeGreaterThanOrEqual(25);
    });

    it('returns a frozen outcome', async () => {
      h.registry.register('tool', 'echo', () => 'x');
      expect(Object.isFrozen(await h.dispatcher.dispatch('use tool: echo {}'))).toBe(true);
    });
  });

  // ── not found ───────────────────────────────────────────────────────

  describe('unknown handlers', () => {
    it('reports a missing tool with the exact message', async () => {
      const outcome = await h.dispatcher.dispatch('use tool: x {}');

      expect(outcome).toMatchObject({ result: "Tool 'x' not found.", source: 'tool', fault: 'not_found' });
      expect(h.chat.chat).not.toHaveBeenCalled();
    });

    it('reports a missing capability with the exact message', async () => {
      const outcome = await h.dispatcher.dispatch('use capability: x {"a": 1}');

      expect(outcome.result).toBe("Capability 'x' not found.");
      const entries = await h.eventLog.query({}, 10);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        activity_type: 'capability_usage',
        details: { capability_name: 'x', status: 'not_found', result: "Capability 'x' not found." },
        metadata: { level: 'error' },
      });
    });
  });

  // ── deadline ────────────────────────────────────────────────────────

  describe('deadline', () => {
    it('returns TimedOut within deadline + ε for a slow handler', async () => {
      h.registry.register('tool', 'slow', async () => {
        await sleep(1_000);
        return 'too late';
      });

      const started = Date.now();
      const outcome = await h.dispatcher.dispatch('use tool: slow {}');

      expect(Date.now() - started).toBeLessThan(100 + EPSILON_MS);
      expect(outcome).toMatchObject({ result: TIMED_OUT_MESSAGE, source: 'tool', fault: 'timed_out' });

      const entries = await h.eventLog.query({}, 10);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        activity_type: 'tool_usage',
        details: { tool_name: 'slow', status: 'timed_out', error: TIMED_OUT_MESSAGE },
      });
    });

    it('uses a per-call deadline override', async () => {
      h.registry.register('tool', 'medium', async () => {
        await sleep(200);
        return 'done';
      });

      const outcome = await h.dispatcher.dispatch('use tool: medium {}', { deadlineMs: 1_000 });

      expect(outcome.result).toBe('done');
      const [entry] = await h.eventLog.query({}, 1);
      expect(entry?.metadata['deadline_ms']).toBe(1_000);
    });

    it('ignores an invalid per-call deadline', async () => {
      h.registry.register('tool', 'echo', () => 'echo');

      const outcome = await h.dispatcher.dispatch('use tool: echo {}', { deadlineMs: -1 });

      expect(outcome.result).toBe('echo');
      expect(h.logger.warn).toHaveBeenCalledWith('Ignoring invalid deadline -1ms; using 100ms');
    });

    it('rejects an invalid configured deadline', () => {
      expect(
        () =>
          new Dispatcher({
            registry: new HandlerRegistry(),
            chat: { chat: () => '' },
            eventLog: new EventLogger({ store: new InMemoryLogStore() }),
            agentName: AGENT,
            deadlineMs: 0,
          }),
      ).toThrow(RangeError);
    });
  });

  // ── handler faults ──────────────────────────────────────────────────

  describe('handler faults', () => {
    it('converts a throwing handler into an error string', async () => {
      h.registry.register('tool', 'broken', () => {
        throw new Error('quota exceeded');
      });

      const outcome = await h.dispatcher.dispatch('use tool: broken {}');

      expect(outcome).toMatchObject({
        result: 'An error occurred: quota exceeded',
        source: 'tool',
        fault: 'handler_fault',
      });
      const [entry] = await h.eventLog.query({}, 1);
      expect(entry?.details).toMatchObject({ status: 'failed', error: 'quota exceeded' });
    });
  });

  // ── cancellation ────────────────────────────────────────────────────

  describe('cancellation', () => {
    it('returns cancelled when the caller aborts', async () => {
      h.registry.register('tool', 'hang', () => new Promise<string>(() => {}));
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const outcome = await h.dispatcher.dispatch('use tool: hang {}', {
        deadlineMs: 5_000,
        signal: controller.signal,
      });

      expect(outcome).toMatchObject({ result: CANCELLED_MESSAGE, fault: 'cancelled' });
      const [entry] = await h.eventLog.query({}, 1);
      expect(entry?.details['status']).toBe('cancelled');
    });

    it('forwards the signal to the fallback handler', async () => {
      const controller = new AbortController();
      await h.dispatcher.dispatch('hello', { signal: controller.signal });
      expect(h.chat.chat).toHaveBeenCalledWith('hello', controller.signal);
    });
  });

  // ── fallback ────────────────────────────────────────────────────────

  describe('fallback', () => {
    it('forwards conversational input and logs agent_fallback', async () => {
      const outcome = await h.dispatcher.dispatch('Tell me about AI.');

      expect(outcome).toMatchObject({ result: 'fallback reply', source: 'fallback' });
      expect(outcome.fault).toBeUndefined();
      expect(h.chat.chat).toHaveBeenCalledWith('Tell me about AI.', undefined);

      const entries = await h.eventLog.query({}, 10);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        activity_type: 'agent_fallback',
        agent_name: AGENT,
        details: { input: 'Tell me about AI.', response: 'fallback reply' },
      });
    });

    it('logs a parse warning and still falls back on malformed commands', async () => {
      h.registry.register('tool', 'search', () => 'never');

      const outcome = await h.dispatcher.dispatch('use tool: search {"query": oops}');

      expect(outcome).toMatchObject({ result: 'fallback reply', source: 'fallback', fault: 'parse_fault' });
      expect(h.chat.chat).toHaveBeenCalledWith('use tool: search {"query": oops}', undefined);

      const entries = await h.eventLog.query({}, 10);
      expect(entries.map((e) => e.activity_type)).toEqual(['agent_fallback', 'action_parse_failure']);
      expect(entries[1]).toMatchObject({
        details: { namespace: 'tool', name: 'search' },
        metadata: { level: 'warning' },
      });
      expect(h.logger.warn).toHaveBeenCalledTimes(1);
    });

    it('records a null name when the command has none', async () => {
      await h.dispatcher.dispatch('use capability: {}');
      const [entry] = await h.eventLog.query({ activityType: 'action_parse_failure' }, 1);
      expect(entry?.details['name']).toBeNull();
    });

    it('contains a failing fallback handler', async () => {
      h.chat.chat.mockRejectedValueOnce(new Error('model offline'));

      const outcome = await h.dispatcher.dispatch('hi');

      expect(outcome).toMatchObject({
        result: 'An error occurred: model offline',
        source: 'fallback',
        fault: 'fallback_fault',
      });
      const [entry] = await h.eventLog.query({}, 1);
      expect(entry).toMatchObject({
        activity_type: 'agent_fallback',
        details: { input: 'hi', error: 'model offline' },
      });
    });

    it('faults when the fallback handler returns a non-string', async () => {
      h.chat.chat.mockResolvedValueOnce(JSON.parse('42'));

      const outcome = await h.dispatcher.dispatch('hi');

      expect(outcome).toMatchObject({
        result: 'An error occurred: Chat handler returned number instead of a string',
        source: 'fallback',
        fault: 'fallback_fault',
      });
    });
  });

  // ── concurrency ─────────────────────────────────────────────────────

  describe('concurrency', () => {
    it('keeps concurrent dispatches independent', async () => {
      h.registry.register('tool', 'delay', async (params) => {
        const raw = params['ms'];
        const ms = typeof raw === 'number' ? raw : 0;
        await sleep(ms);
        return `slept ${ms}`;
      });

      const outcomes = await Promise.all([
        h.dispatcher.dispatch('use tool: delay {"ms": 40}'),
        h.dispatcher.dispatch('use tool: delay {"ms": 5}'),
        h.dispatcher.dispatch('chat please'),
        h.dispatcher.dispatch('use tool: missing {}'),
      ]);

      expect(outcomes.map((o) => o.result)).toEqual([
        'slept 40',
        'slept 5',
        'fallback reply',
        "Tool 'missing' not found.",
      ]);
      expect(await h.eventLog.query({}, 10)).toHaveLength(4);
    });
  });

  // ── recentActivity ──────────────────────────────────────────────────

  describe('recentActivity', () => {
    it('proxies filtered queries to the event log', async () => {
      const dispatcher = new Dispatcher({
        registry: new HandlerRegistry(),
        chat: { chat: (text) => text.toUpperCase() },
        eventLog: new EventLogger({ store: new InMemoryLogStore(), logger: silentLogger }),
        agentName: 'other',
      });
      await dispatcher.dispatch('one');
      await dispatcher.dispatch('two');
      await dispatcher.dispatch('use tool: nope {}');

      const fallbacks = await dispatcher.recentActivity({ activityType: 'agent_fallback' }, 5);
      expect(fallbacks.map((e) => e.details['response'])).toEqual(['TWO', 'ONE']);
      expect(await dispatcher.recentActivity({ agentName: 'nobody' })).toEqual([]);
    });
  });
});
