import { logError } from './telemetry/logger.js';
import { getErrorMessage } from './utils/errors.js';

export type WorkbenchEventType =
  | 'model_loaded'
  | 'workflow_started'
  | 'workflow_completed'
  | 'task_started'
  | 'task_completed'
  | 'task_failed'
  | 'snapshot_saved';

export interface WorkbenchEvent {
  type: WorkbenchEventType;
  timestamp: Date;
  data: Record<string, unknown>;
}

export type WorkbenchEventHandler = (event: WorkbenchEvent) => void | Promise<void>;

export class WorkbenchEventBus {
  private handlers = new Map<WorkbenchEventType | '*', Set<WorkbenchEventHandler>>();

  on(eventType: WorkbenchEventType | '*', handler: WorkbenchEventHandler): () => void {
    let set = this.handlers.get(eventType);
    if (!set) {
      set = new Set();
      this.handlers.set(eventType, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  once(eventType: WorkbenchEventType | '*', handler: WorkbenchEventHandler): () => void {
    const wrappedHandler: WorkbenchEventHandler = async (event) => {
      this.handlers.get(eventType)?.delete(wrappedHandler);
      await handler(event);
    };
    return this.on(eventType, wrappedHandler);
  }

  /**
   * Handlers run in registration order, specific before wildcard. A failing
   * handler is logged and does not stop the others.
   */
  async emit(event: WorkbenchEvent): Promise<void> {
    for (const key of [event.type, '*'] as const) {
      const handlers = this.handlers.get(key);
      if (!handlers) continue;
      for (const handler of [...handlers]) {
        try {
          await handler(event);
        } catch (error: unknown) {
          logError(`Workbench event handler error for ${event.type}`, {
            error: getErrorMessage(error),
          });
        }
      }
    }
  }

  off(eventType: WorkbenchEventType | '*'): void { this.handlers.delete(eventType); }
  clear(): void { this.handlers.clear(); }
}

export function createModelLoadedEvent(model: string, atoms: number, links: number): WorkbenchEvent {
  return { type: 'model_loaded', timestamp: new Date(), data: { model, atoms, links } };
}

export function createWorkflowStartedEvent(workflowId: string, taskCount: number): WorkbenchEvent {
  return { type: 'workflow_started', timestamp: new Date(), data: { workflowId, taskCount } };
}

export function createWorkflowCompletedEvent(workflowId: string, status: string, durationMs: number): WorkbenchEvent {
  return { type: 'workflow_completed', timestamp: new Date(), data: { workflowId, status, durationMs } };
}

export function createTaskStartedEvent(taskId: string, role: string, agentId: string): WorkbenchEvent {
  return { type: 'task_started', timestamp: new Date(), data: { taskId, role, agentId } };
}

export function createTaskCompletedEvent(taskId: string, durationMs: number): WorkbenchEvent {
  return { type: 'task_completed', timestamp: new Date(), data: { taskId, durationMs } };
}

export function createTaskFailedEvent(taskId: string, kind: string, reason: string): WorkbenchEvent {
  return { type: 'task_failed', timestamp: new Date(), data: { taskId, kind, reason } };
}

export function createSnapshotSavedEvent(name: string, atoms: number): WorkbenchEvent {
  return { type: 'snapshot_saved', timestamp: new Date(), data: { name, atoms } };
}
