import type {
  Action,
  ChatHandler,
  DispatchOptions,
  DispatchOutcome,
  DispatchSource,
  FaultKind,
  HandlerNamespace,
  LogEntry,
  LogFilter,
  Logger,
} from '@switchyard/core';
import { DEFAULT_DEADLINE_MS, errorMessage, silentLogger } from '@switchyard/core';
import type { EventLogger } from '@switchyard/event-log';
import type { HandlerRegistry } from '@switchyard/handlers';
import { runBounded } from '@switchyard/handlers';
import { parseCommand } from './command-parser.js';

/** Activity types written to the event log. */
export const ACTIVITY = {
  toolUsage: 'tool_usage',
  capabilityUsage: 'capability_usage',
  fallback: 'agent_fallback',
  parseFailure: 'action_parse_failure',
} as const;

export const TIMED_OUT_MESSAGE = 'The action timed out.';
export const CANCELLED_MESSAGE = 'The action was cancelled.';

const NAMESPACE_LABEL: Record<HandlerNamespace, string> = {
  tool: 'Tool',
  capability: 'Capability',
};

export interface DispatcherOptions {
  registry: HandlerRegistry;
  chat: ChatHandler;
  eventLog: EventLogger;
  /** Written as `agent_name` on every entry. */
  agentName: string;
  /** Default: 10 000 ms. */
  deadlineMs?: number;
  logger?: Logger;
}

function isValidDeadline(ms: number): boolean {
  return Number.isFinite(ms) && ms > 0;
}

/** Message returned when an action names an unregistered handler. */
export function notFoundMessage(namespace: HandlerNamespace, name: string): string {
  return `${NAMESPACE_LABEL[namespace]} '${name}' not found.`;
}

/**
 * Routes input to a tool, a capability or the chat handler:
 * parse → resolve → execute under deadline → record → return.
 *
 * Holds no per-call state; concurrent dispatches do not interact.
 * `dispatch` always resolves to an outcome.
 */
export class Dispatcher {
  private readonly registry: HandlerRegistry;
  private readonly chat: ChatHandler;
  private readonly eventLog: EventLogger;
  private readonly agentName: string;
  private readonly deadlineMs: number;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    const deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
    if (!isValidDeadline(deadlineMs)) {
      throw new RangeError(`deadlineMs must be a positive number, got ${deadlineMs}`);
    }
    this.registry = options.registry;
    this.chat = options.chat;
    this.eventLog = options.eventLog;
    this.agentName = options.agentName;
    this.deadlineMs = deadlineMs;
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(text: string, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const startedAt = performance.now();
    this.logger.debug(`Processing input (${text.length} chars)`);

    const parsed = parseCommand(text);

    if (parsed.type === 'fault') {
      const { fault } = parsed;
      this.logger.warn(`Failed to parse action: ${fault.message}`);
      this.eventLog.record(
        ACTIVITY.parseFailure,
        this.agentName,
        {
          input: text,
          namespace: fault.namespace,
          name: fault.handlerName ?? null,
          reason: fault.reason,
        },
        { level: 'warning' },
      );
      return this.fallback(text, options, startedAt, 'parse_fault');
    }

    if (parsed.type === 'none') {
      this.logger.debug('No action detected, forwarding input');
      return this.fallback(text, options, startedAt);
    }

    return this.execute(parsed.action, options, startedAt);
  }

  /** Newest-first entries from the event log. */
  recentActivity(filter: LogFilter = {}, limit?: number): Promise<LogEntry[]> {
    return this.eventLog.query(filter, limit);
  }

  private async execute(
    action: Action,
    options: DispatchOptions,
    startedAt: number,
  ): Promise<DispatchOutcome> {
    const { kind, name, params } = action;
    const activity = kind === 'tool' ? ACTIVITY.toolUsage : ACTIVITY.capabilityUsage;
    const nameField = `${kind}_name`;

    const invoke = this.registry.resolve(kind, name);
    if (!invoke) {
      const result = notFoundMessage(kind, name);
      this.logger.warn(`Action not found: ${kind} ${name}`);
      this.eventLog.record(
        activity,
        this.agentName,
        { [nameField]: name, params, status: 'not_found', result },
        { level: 'error' },
      );
      return outcome(result, kind, startedAt, 'not_found');
    }

    const deadlineMs = this.deadlineFor(options);
    this.logger.debug(`Executing ${kind} ${name} (deadline ${deadlineMs}ms)`);
    const execution = await runBounded(invoke, params, { deadlineMs, signal: options.signal });
    const base = { [nameField]: name, params, status: execution.status, elapsed_ms: execution.elapsedMs };

    switch (execution.status) {
      case 'ok':
        this.logger.info(`${NAMESPACE_LABEL[kind]} ${name} succeeded in ${execution.elapsedMs}ms`);
        this.eventLog.record(
          activity,
          this.agentName,
          { ...base, result: execution.output },
          { level: 'info', deadline_ms: deadlineMs },
        );
        return outcome(execution.output, kind, startedAt);

      case 'timed_out':
        this.logger.error(`${NAMESPACE_LABEL[kind]} ${name} timed out after ${deadlineMs}ms`);
        this.eventLog.record(
          activity,
          this.agentName,
          { ...base, error: TIMED_OUT_MESSAGE },
          { level: 'error', deadline_ms: deadlineMs },
        );
        return outcome(TIMED_OUT_MESSAGE, kind, startedAt, 'timed_out');

      case 'failed': {
        const result = `An error occurred: ${execution.cause}`;
        this.logger.error(`${NAMESPACE_LABEL[kind]} ${name} failed: ${execution.cause}`);
        this.eventLog.record(
          activity,
          this.agentName,
          { ...base, error: execution.cause },
          { level: 'error', deadline_ms: deadlineMs },
        );
        return outcome(result, kind, startedAt, 'handler_fault');
      }

      case 'cancelled':
        this.logger.info(`${NAMESPACE_LABEL[kind]} ${name} cancelled by caller`);
        this.eventLog.record(
          activity,
          this.agentName,
          { ...base, error: CANCELLED_MESSAGE },
          { level: 'warning', deadline_ms: deadlineMs },
        );
        return outcome(CANCELLED_MESSAGE, kind, startedAt, 'cancelled');
    }
  }

  private async fallback(
    text: string,
    options: DispatchOptions,
    startedAt: number,
    fault?: FaultKind,
  ): Promise<DispatchOutcome> {
    try {
      const response: unknown = await this.chat.chat(text, options.signal);
      if (typeof response !== 'string') {
        throw new TypeError(`Chat handler returned ${typeof response} instead of a string`);
      }
      this.eventLog.record(
        ACTIVITY.fallback,
        this.agentName,
        { input: text, response },
        { level: 'info' },
      );
      return outcome(response, 'fallback', startedAt, fault);
    } catch (err) {
      const cause = errorMessage(err);
      this.logger.error(`Fallback handler failed: ${cause}`);
      this.eventLog.record(
        ACTIVITY.fallback,
        this.agentName,
        { input: text, error: cause },
        { level: 'error' },
      );
      return outcome(`An error occurred: ${cause}`, 'fallback', startedAt, 'fallback_fault');
    }
  }

  private deadlineFor(options: DispatchOptions): number {
    if (options.deadlineMs === undefined) return this.deadlineMs;
    if (isValidDeadline(options.deadlineMs)) return options.deadlineMs;
    this.logger.warn(
      `Ignoring invalid deadline ${options.deadlineMs}ms; using ${this.deadlineMs}ms`,
    );
    return this.deadlineMs;
  }
}

function outcome(
  result: string,
  source: DispatchSource,
  startedAt: number,
  fault?: FaultKind,
): DispatchOutcome {
  const elapsedMs = Math.round(performance.now() - startedAt);
  return Object.freeze(fault ? { result, source, elapsedMs, fault } : { result, source, elapsedMs });
}
