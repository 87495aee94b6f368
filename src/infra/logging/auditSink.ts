import type { AuditEvent, AuditSink } from '../../application/audit.js';
import type { Logger } from './logger.js';

/**
 * Audit sink that writes events as structured log lines.
 * Security events go out at warn level so they stand out in the stream.
 */
export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  record(event: AuditEvent): void {
    const fields = {
      event_type: 'audit',
      event_category: event.category,
      audit_event: event.type,
      severity: event.severity,
      subject_id: event.subjectId,
      details: event.details,
      recorded_at: new Date().toISOString(),
    };

    if (event.category === 'security') {
      this.logger.warn(`Security event: ${event.type} - ${event.description}`, fields);
    } else {
      this.logger.info(`Audit: ${event.type} - ${event.description}`, fields);
    }
  }
}
