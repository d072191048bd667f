/**
 * State Management Module
 *
 * Exports event sourcing utilities for the financing advisor.
 */

export {
  EventStore,
  deriveState,
  type AgentEvent,
  type AgentEventType,
  type AgentStartedEvent,
  type ToolCalledEvent,
  type ToolResultEvent,
  type AgentCompletedEvent,
  type ErrorOccurredEvent,
  type AgentState,
  type NewAgentEvent,
} from './event-store.js';
