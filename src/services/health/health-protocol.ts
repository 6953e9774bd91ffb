// Health-check requests and correlation of the asynchronous replies

import { randomUUID } from 'node:crypto';
import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import type { HealthCheckRequest, HealthStatus, HealthStatusReply } from '../../core/schemas.js';
import { MessageBus, createEnvelope } from '../bus/message-bus.js';
import { ProcessSupervisor } from '../supervisor/process-supervisor.js';

/**
 * What happened to a reply
 */
export type ReplyDisposition = 'accepted' | 'unknown' | 'permanently_failed' | 'stale';

/**
 * Last metrics a department reported about itself
 */
export interface DepartmentMetrics {
  status: HealthStatus;
  uptimeSeconds: number;
  messageCount: number;
  reportedAt: Date;
}

export class HealthProtocol {
  private readonly metrics = new Map<string, DepartmentMetrics>();
  private readonly log: Logger;

  constructor(
    private readonly bus: MessageBus,
    private readonly supervisor: ProcessSupervisor,
    private readonly clock: Clock,
    private readonly sender: string,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('health');
  }

  /**
   * Make this protocol the supervisor's way of sending health checks
   */
  attach(): void {
    this.supervisor.setHealthRequester(name => {
      this.sendCheck(name);
    });
  }

  /**
   * Send a health check to a department. Fire and forget: the reply, if any,
   * arrives through `onReply`.
   */
  sendCheck(name: string): string {
    const checkId = randomUUID();
    const request: HealthCheckRequest = { check_id: checkId, from: this.sender, to: name };

    this.supervisor.noteHealthRequest(name, checkId);

    const envelope = createEnvelope('health_check', this.sender, name, request, new Date(this.clock.now()));
    void this.bus.publish(name, envelope).catch(error => {
      this.log.exception(error, { department: name, checkId });
    });

    return checkId;
  }

  /**
   * Correlate a reply with the outstanding check and forward it to the supervisor
   */
  onReply(reply: HealthStatusReply): ReplyDisposition {
    const name = reply.service_name;
    const record = this.supervisor.get(name);

    if (!record) {
      this.log.debug('Discarding health reply from unknown department', { department: name });
      return 'unknown';
    }
    if (record.status === 'permanently_failed') {
      this.log.debug('Discarding health reply from permanently failed department', { department: name });
      return 'permanently_failed';
    }
    if (record.pendingCheckId !== reply.check_id) {
      this.log.debug('Discarding stale health reply', { department: name, checkId: reply.check_id });
      return 'stale';
    }

    this.metrics.set(name, {
      status: reply.status,
      uptimeSeconds: reply.uptime_seconds,
      messageCount: reply.message_count,
      reportedAt: new Date(this.clock.now())
    });

    const healthy = reply.status === 'healthy';
    this.supervisor.recordHealthReply(name, healthy);
    if (!healthy) {
      this.log.info(`${name} reports ${reply.status}`, { details: reply.details });
    }
    return 'accepted';
  }

  getMetrics(name: string): DepartmentMetrics | undefined {
    return this.metrics.get(name);
  }

  forget(name: string): void {
    this.metrics.delete(name);
  }
}
