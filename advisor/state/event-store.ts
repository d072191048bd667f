/**
 * Advisor Audit Trail
 *
 * Each advisor run is written down as a sequence of events; nothing is
 * updated in place. Quotes are financial advice, so the log records which
 * figures the agent asked for, what the calculator answered and what the
 * customer was finally told. Status and counters are recomputed from the
 * log on demand (Pattern 4.2).
 *
 * On disk the log is JSON Lines, one event per line.
 */

import { promises as fs } from 'fs';

// =============================================================================
// EVENTS
// =============================================================================

export interface AgentStartedEvent {
  type: 'agent_started';
  timestamp: number;
  task: string;
  tools: string[];
}

export interface ToolCalledEvent {
  type: 'tool_called';
  timestamp: number;
  toolCallId: string;
  tool: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultEvent {
  type: 'tool_result';
  timestamp: number;
  toolCallId: string;
  tool: string;
  /** Truncated by the agent before it is stored */
  result: string;
  success: boolean;
  durationMs: number;
}

export interface AgentCompletedEvent {
  type: 'agent_completed';
  timestamp: number;
  result: string;
  success: boolean;
  totalIterations: number;
  totalDurationMs: number;
}

export interface ErrorOccurredEvent {
  type: 'error_occurred';
  timestamp: number;
  error: string;
  recoverable: boolean;
}

export type AgentEvent =
  | AgentStartedEvent
  | ToolCalledEvent
  | ToolResultEvent
  | AgentCompletedEvent
  | ErrorOccurredEvent;

export type AgentEventType = AgentEvent['type'];

/** What callers hand to append(); the store adds the timestamp */
export type NewAgentEvent = AgentEvent extends infer E
  ? E extends AgentEvent
    ? Omit<E, 'timestamp'>
    : never
  : never;

const EVENT_TYPES: ReadonlySet<string> = new Set<AgentEventType>([
  'agent_started',
  'tool_called',
  'tool_result',
  'agent_completed',
  'error_occurred',
]);

function isAgentEvent(value: unknown): value is AgentEvent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('timestamp' in value)) return false;
  const { type, timestamp } = value;
  return typeof type === 'string' && EVENT_TYPES.has(type) && typeof timestamp === 'number';
}

// =============================================================================
// RUN STATE
// =============================================================================

export interface AgentState {
  status: 'running' | 'completed' | 'failed';
  task: string;
  startTime: number;
  endTime?: number;
  iterations: number;
  toolCalls: {
    total: number;
    successful: number;
    failed: number;
    byTool: Record<string, number>;
  };
  errors: string[];
  result?: string;
}

function initialState(): AgentState {
  return {
    status: 'running',
    task: '',
    startTime: 0,
    iterations: 0,
    toolCalls: { total: 0, successful: 0, failed: 0, byTool: {} },
    errors: [],
  };
}

function applyEvent(state: AgentState, event: AgentEvent): AgentState {
  const { toolCalls } = state;

  switch (event.type) {
    case 'agent_started':
      return { ...state, task: event.task, startTime: event.timestamp };

    case 'tool_called':
      return {
        ...state,
        toolCalls: {
          ...toolCalls,
          total: toolCalls.total + 1,
          byTool: { ...toolCalls.byTool, [event.tool]: (toolCalls.byTool[event.tool] ?? 0) + 1 },
        },
      };

    case 'tool_result':
      return {
        ...state,
        toolCalls: event.success
          ? { ...toolCalls, successful: toolCalls.successful + 1 }
          : { ...toolCalls, failed: toolCalls.failed + 1 },
      };

    case 'agent_completed':
      return {
        ...state,
        status: event.success ? 'completed' : 'failed',
        endTime: event.timestamp,
        iterations: event.totalIterations,
        result: event.result,
      };

    case 'error_occurred':
      return {
        ...state,
        status: event.recoverable ? state.status : 'failed',
        errors: [...state.errors, event.error],
      };
  }
}

/**
 * Replay the log from the start. An unrecoverable error marks the run
 * failed even when no completion follows.
 */
export function deriveState(events: AgentEvent[]): AgentState {
  return events.reduce(applyEvent, initialState());
}

// =============================================================================
// STORE
// =============================================================================

/**
 * In-memory log of one or more runs. With a path, the whole log is
 * rewritten to that file after every append.
 *
 *   const store = new EventStore(process.env.EVENT_LOG);
 *   await store.append({ type: 'agent_started', task, tools: ['done'] });
 *   console.log(store.getSummary());
 */
export class EventStore {
  private events: AgentEvent[] = [];

  constructor(
    private readonly persistPath?: string,
    private readonly clock: () => number = Date.now
  ) {}

  async append(event: NewAgentEvent): Promise<void> {
    this.events.push({ ...event, timestamp: this.clock() });
    await this.persist();
  }

  /** A copy; the store's own log cannot be edited through it */
  all(): AgentEvent[] {
    return [...this.events];
  }

  filter<K extends AgentEventType>(type: K): Extract<AgentEvent, { type: K }>[] {
    return this.events.filter((e): e is Extract<AgentEvent, { type: K }> => e.type === type);
  }

  /** Events stamped strictly after the given time */
  since(timestamp: number): AgentEvent[] {
    return this.events.filter(e => e.timestamp > timestamp);
  }

  getState(): AgentState {
    return deriveState(this.events);
  }

  async persist(): Promise<void> {
    if (!this.persistPath) return;
    await fs.writeFile(this.persistPath, this.events.map(e => JSON.stringify(e)).join('\n'));
  }

  /**
   * Replace the in-memory log with the file's contents. A file that does
   * not exist yet is an empty log; any other read error, or a line that is
   * not an event, is thrown.
   */
  async load(): Promise<void> {
    if (!this.persistPath) return;
    const path = this.persistPath;

    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.events = [];
        return;
      }
      throw error;
    }

    const loaded: AgentEvent[] = [];
    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      const parsed: unknown = JSON.parse(line);
      if (!isAgentEvent(parsed)) {
        throw new Error(`Invalid event on line ${index + 1} of ${path}`);
      }
      loaded.push(parsed);
    });
    this.events = loaded;
  }

  clear(): void {
    this.events = [];
  }

  /**
   * Plain-text report for the CLI. A run still in progress is timed
   * against the clock.
   */
  getSummary(): string {
    const state = this.getState();
    const { toolCalls } = state;
    const duration = (state.endTime ?? this.clock()) - state.startTime;
    const byTool = Object.entries(toolCalls.byTool)
      .map(([tool, count]) => `${tool}=${count}`)
      .join(', ');

    const lines = [
      `Status: ${state.status}`,
      `Task: ${state.task}`,
      `Iterations: ${state.iterations}`,
      `Tool Calls: ${toolCalls.total} (${toolCalls.successful} ok, ${toolCalls.failed} failed)`,
    ];
    if (byTool) lines.push(`By Tool: ${byTool}`);
    lines.push(`Duration: ${duration}ms`);
    if (state.errors.length > 0) lines.push(`Errors: ${state.errors.join(', ')}`);

    return lines.join('\n');
  }
}
