/**
 * Notification Dispatcher
 *
 * Turns approved decisions into department change notifications and publishes
 * them to every routing-aware service.
 */

import { randomUUID } from 'node:crypto';
import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import type {
  ConsolidationRecommendation,
  DepartmentChangeNotification,
  TerminationRecommendation
} from '../../core/schemas.js';
import { Decision, Recommendation } from '../../models/recommendation.js';
import { BROADCAST_CHANNEL, MessageBus, createEnvelope } from '../bus/message-bus.js';

/**
 * Emergency types handled by each category of department
 */
const EMERGENCY_TYPES: Array<[RegExp, string[]]> = [
  [/police/, ['crime', 'theft', 'assault', 'traffic_accident']],
  [/fire/, ['fire', 'rescue', 'hazmat']],
  [/health|medical|ems/, ['medical', 'injury', 'illness']],
  [/animal/, ['animal_attack', 'animal_rescue']],
  [/water|utility/, ['water_leak', 'service_outage']],
  [/parks|recreation/, ['park_emergency', 'facility_issue']]
];

const FALLBACKS: Array<[RegExp, string | null]> = [
  [/police|fire/, null],
  [/health|medical/, 'fire_department'],
  [/animal/, 'police_department'],
  [/parks|recreation/, 'public_works_department'],
  [/water|utility/, 'public_works_department']
];

/**
 * Emergency types affected when these departments change. First matching category per name.
 */
export function emergencyTypesFor(names: string[]): string[] {
  const types = new Set<string>();
  for (const name of names) {
    const match = EMERGENCY_TYPES.find(([pattern]) => pattern.test(name.toLowerCase()));
    match?.[1].forEach(type => types.add(type));
  }
  return [...types];
}

/**
 * Where work for a terminated department goes. `null` in the table means the dispatch center.
 */
export function fallbackFor(name: string, dispatchCenter: string): string {
  const match = FALLBACKS.find(([pattern]) => pattern.test(name.toLowerCase()));
  return match?.[1] ?? dispatchCenter;
}

/**
 * The supervisor's view of which departments exist
 */
export interface DepartmentDirectory {
  /** Tracked at all, permanently failed included */
  isTracked(name: string): boolean;
  /** Tracked and not permanently failed */
  has(name: string): boolean;
}

export interface NotificationDispatcherOptions {
  /** Name the notifications are initiated by */
  sender: string;
  dispatchCenter: string;
  /** When positive, notifications take effect this long after they are sent */
  effectiveDelayMs?: number;
}

export class NotificationDispatcher {
  private readonly log: Logger;

  constructor(
    private readonly bus: MessageBus,
    private readonly directory: DepartmentDirectory,
    private readonly clock: Clock,
    private readonly options: NotificationDispatcherOptions,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('notifications');
  }

  /**
   * Build the notification for a decision. Only approved decisions produce one.
   */
  build(decision: Decision, recommendation: Recommendation): DepartmentChangeNotification | null {
    if (decision.outcome !== 'approved') {
      return null;
    }

    return recommendation.kind === 'consolidation'
      ? this.buildConsolidation(recommendation.payload)
      : this.buildTermination(recommendation.payload);
  }

  /**
   * Build and publish the notification for a decision
   */
  async broadcast(decision: Decision, recommendation: Recommendation): Promise<DepartmentChangeNotification | null> {
    const notification = this.build(decision, recommendation);
    if (notification) {
      await this.publish(notification);
    }
    return notification;
  }

  /**
   * Tell routing-aware services that a department exists again and receives its own work
   */
  async announceCreated(name: string): Promise<DepartmentChangeNotification> {
    const notification: DepartmentChangeNotification = {
      ...this.base('created', [name]),
      new_department: name,
      routing_changes: {},
      additional_instructions: `Department ${name} is now available`
    };
    await this.publish(notification);
    return notification;
  }

  private buildConsolidation(recommendation: ConsolidationRecommendation): DepartmentChangeNotification {
    const merged = recommendation.departments_to_merge;
    const target = recommendation.proposed_name;
    const routingChanges: Record<string, string> = {};
    const capabilities: Record<string, string[]> = {};

    for (const name of merged) {
      if (!this.directory.isTracked(name)) {
        this.log.warn(`Skipping routing entry for unknown department ${name}`, { newDepartment: target });
        continue;
      }
      routingChanges[name] = target;
      if (recommendation.unified_capabilities.length > 0) {
        capabilities[name] = recommendation.unified_capabilities;
      }
    }

    return {
      ...this.base('consolidated', merged),
      new_department: target,
      routing_changes: routingChanges,
      capabilities_mapping: capabilities,
      emergency_types_affected: emergencyTypesFor(merged),
      fallback_department: this.options.dispatchCenter,
      additional_instructions: `Departments ${merged.join(', ')} are being merged into ${target}`
    };
  }

  private buildTermination(recommendation: TerminationRecommendation): DepartmentChangeNotification {
    const name = recommendation.department_name;
    const fallback = this.liveFallback(name);
    const routingChanges: Record<string, string> = {};

    if (this.directory.isTracked(name)) {
      routingChanges[name] = fallback;
    } else {
      this.log.warn(`Skipping routing entry for unknown department ${name}`, { fallback });
    }

    const capabilities: Record<string, string> = {};
    for (const reassignment of recommendation.services_to_reassign) {
      capabilities[reassignment.service] = reassignment.reassign_to;
    }

    return {
      ...this.base('terminated', [name]),
      routing_changes: routingChanges,
      capabilities_mapping: capabilities,
      emergency_types_affected: emergencyTypesFor([name]),
      fallback_department: fallback,
      additional_instructions: `Department ${name} is being terminated. Route calls to ${fallback}`,
      rollback_available: true,
      rollback_instructions: { action: 'restore_department', department: name }
    };
  }

  /**
   * Category fallback, unless that department has permanently failed
   */
  private liveFallback(name: string): string {
    const fallback = fallbackFor(name, this.options.dispatchCenter);
    if (this.directory.isTracked(fallback) && !this.directory.has(fallback)) {
      this.log.warn(`Fallback ${fallback} has failed, using ${this.options.dispatchCenter}`, { department: name });
      return this.options.dispatchCenter;
    }
    return fallback;
  }

  private base(changeType: DepartmentChangeNotification['change_type'], affected: string[]) {
    const now = this.clock.now();
    const delay = this.options.effectiveDelayMs ?? 0;

    return {
      change_id: randomUUID(),
      change_type: changeType,
      affected_departments: affected,
      capabilities_mapping: {},
      emergency_types_affected: emergencyTypesFor(affected),
      effective_immediately: delay <= 0,
      effective_date: new Date(now + Math.max(0, delay)).toISOString(),
      initiated_by: this.options.sender,
      change_timestamp: new Date(now).toISOString(),
      rollback_available: false
    };
  }

  private async publish(notification: DepartmentChangeNotification): Promise<void> {
    const envelope = createEnvelope(
      'department_change_notification',
      this.options.sender,
      BROADCAST_CHANNEL,
      notification,
      new Date(this.clock.now())
    );
    await this.bus.publish(BROADCAST_CHANNEL, envelope);
    this.log.info(`Broadcast ${notification.change_type} change`, {
      changeId: notification.change_id,
      routingChanges: notification.routing_changes
    });
  }
}
