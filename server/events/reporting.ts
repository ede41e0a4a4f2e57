import type { EventBus } from "./eventBus";
import type { LifecycleEventType } from "@shared/schema";
import type { PipelineError } from "../errors";

export function reportPipelineError(
  bus: EventBus,
  component: string,
  error: PipelineError,
  detail?: Record<string, unknown>
): void {
  bus.publish("pipeline.error", {
    kind: error.kind,
    component,
    message: error.message,
    at: new Date().toISOString(),
    detail,
  });
}

export function publishLifecycle(
  bus: EventBus,
  sessionId: string,
  type: LifecycleEventType,
  reason?: string
): void {
  bus.publish("session.lifecycle", {
    type,
    sessionId,
    at: new Date().toISOString(),
    reason,
  });
}
