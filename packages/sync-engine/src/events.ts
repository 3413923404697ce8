/**
 * Engine Event Bus
 * Typed EventEmitter shared by the workflow, the pusher and the agents
 */

import { EventEmitter } from 'eventemitter3';
import type {
  EngineEvent,
  EngineEventType,
  PosPushFailedEvent,
  PushFailure,
  SweepCompletedEvent,
  SweepResult,
  WorkflowCompletedEvent,
  WorkflowFailedEvent,
  WorkflowResult,
  WorkflowScenario,
  WorkflowStartedEvent,
} from './types.js';

// ============================================================================
// Event Type Mapping
// ============================================================================

export interface EngineEventListeners {
  'workflow:started': (event: WorkflowStartedEvent) => void;
  'workflow:completed': (event: WorkflowCompletedEvent) => void;
  'workflow:failed': (event: WorkflowFailedEvent) => void;
  'pos:push-failed': (event: PosPushFailedEvent) => void;
  'sweep:completed': (event: SweepCompletedEvent) => void;
}

// ============================================================================
// Typed Event Bus
// ============================================================================

export class PackSyncEventBus extends EventEmitter<EngineEventListeners> {
  private debugMode = false;

  constructor(debug = false) {
    super();
    this.debugMode = debug;
  }

  emitWorkflowStarted(payload: {
    operationId: string;
    performanceId: string;
    scenario: WorkflowScenario;
  }): void {
    const event: WorkflowStartedEvent = {
      type: 'workflow:started',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('workflow:started', event);
  }

  /**
   * Emit the result of a finished workflow, on the failed channel when it did not succeed
   */
  emitWorkflowFinished(payload: WorkflowResult): void {
    if (payload.success) {
      const event: WorkflowCompletedEvent = {
        type: 'workflow:completed',
        payload,
        timestamp: new Date(),
      };
      this.log(event);
      this.emit('workflow:completed', event);
      return;
    }

    const event: WorkflowFailedEvent = {
      type: 'workflow:failed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('workflow:failed', event);
  }

  emitPushFailed(payload: PushFailure): void {
    const event: PosPushFailedEvent = {
      type: 'pos:push-failed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('pos:push-failed', event);
  }

  emitSweepCompleted(payload: SweepResult): void {
    const event: SweepCompletedEvent = {
      type: 'sweep:completed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('sweep:completed', event);
  }

  onWorkflowCompleted(listener: (event: WorkflowCompletedEvent) => void): this {
    return this.on('workflow:completed', listener);
  }

  onWorkflowFailed(listener: (event: WorkflowFailedEvent) => void): this {
    return this.on('workflow:failed', listener);
  }

  onPushFailed(listener: (event: PosPushFailedEvent) => void): this {
    return this.on('pos:push-failed', listener);
  }

  onSweepCompleted(listener: (event: SweepCompletedEvent) => void): this {
    return this.on('sweep:completed', listener);
  }

  /**
   * Remove all listeners for a specific event type or all events
   */
  removeAllListenersFor(eventType?: EngineEventType): this {
    if (eventType) {
      return this.removeAllListeners(eventType);
    }
    return this.removeAllListeners();
  }

  private log(event: EngineEvent): void {
    if (this.debugMode) {
      console.log(`[PackSyncEventBus] ${event.type}:`, JSON.stringify(event.payload));
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createEventBus(debug = false): PackSyncEventBus {
  return new PackSyncEventBus(debug);
}

export type { EngineEvent, EngineEventType };
