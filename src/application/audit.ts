import type { Logger } from '../infra/logging/logger.js';

export type AuditCategory = 'authentication' | 'security' | 'data_access' | 'user_action';

export type AuditSeverity = 'info' | 'low' | 'medium' | 'high';

export interface AuditEvent {
  category: AuditCategory;
  /** Short machine-readable event name, e.g. `invalid_token`. */
  type: string;
  severity: AuditSeverity;
  /** Account the event is about (or the acting account), when known. */
  subjectId?: string;
  description: string;
  details: Record<string, unknown>;
}

/**
 * Destination for audit events. Implementations may be async; callers never await them.
 */
export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

/**
 * Per-request facts that end up in audit details.
 */
export interface RequestContext {
  ip?: string;
  userAgent?: string;
  correlationId?: string;
}

export function contextDetails(context: RequestContext): Record<string, unknown> {
  return {
    client_ip: context.ip ?? 'unknown',
    user_agent: context.userAgent ?? 'unknown',
    ...(context.correlationId ? { correlation_id: context.correlationId } : {}),
  };
}

/**
 * Wraps a sink so that neither a throw nor a rejected promise from it reaches the caller.
 * Failures are reported on the logger instead.
 */
export class SafeAuditSink implements AuditSink {
  constructor(
    private readonly inner: AuditSink,
    private readonly logger: Logger
  ) {}

  record(event: AuditEvent): void {
    try {
      const pending = this.inner.record(event);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => this.reportFailure(event, error));
      }
    } catch (error) {
      this.reportFailure(event, error);
    }
  }

  private reportFailure(event: AuditEvent, error: unknown): void {
    this.logger.error('Audit sink failed to record event', {
      audit_event_type: event.type,
      audit_category: event.category,
      error,
    });
  }
}
