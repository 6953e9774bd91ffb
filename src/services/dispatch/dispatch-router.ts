/**
 * Dispatch Router
 *
 * Consumer side of the city. Each emergency call is classified into the
 * departments it needs, every department name is resolved through a local
 * routing table kept current from the council's change notifications, and the
 * call is forwarded to the departments that are live. Departments that do not
 * exist are requested from the council; the call waits for them up to
 * `serviceWaitMs` before it is placed with whatever is available.
 */

import { Clock } from '../../core/clock.js';
import { UndeliverableError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import {
  DepartmentAnnouncementSchema,
  DepartmentChangeNotificationSchema,
  EmergencyCallSchema,
  HealthCheckRequestSchema
} from '../../core/schemas.js';
import type {
  DepartmentAnnouncement,
  DepartmentChangeNotification,
  DispatchOrder,
  EmergencyCall,
  HealthCheckRequest,
  HealthStatusReply,
  MessageEnvelope,
  MessageType,
  Priority,
  ServiceRequest
} from '../../core/schemas.js';
import { LiveDepartmentSet } from '../../models/types.js';
import { BROADCAST_CHANNEL, MessageBus, Unsubscribe, createEnvelope } from '../bus/message-bus.js';
import { MessageRouter } from '../bus/message-router.js';
import { RoutingTable } from '../routing/routing-table.js';
import { EmergencyClassifier, RuleBasedClassifier } from './emergency-classifier.js';

export interface DispatchRouterOptions {
  /** Channel this router listens on and the sender of everything it publishes */
  name: string;
  /** Channel of the council that creates missing departments */
  council: string;
  serviceWaitMs: number;
  defaultDepartment: string;
  classifier?: EmergencyClassifier;
}

/**
 * `partial` means at least one required department could not be reached
 */
export type DispatchOutcome = 'dispatched' | 'partial';

export interface DispatchResult {
  callId: string;
  outcome: DispatchOutcome;
  /** Departments the call was forwarded to, after routing */
  departments: string[];
  /** Departments the classifier asked for */
  required: string[];
  /** Required departments that never became available */
  unavailable: string[];
}

interface Placement {
  department: string;
  requestedAs: string;
}

type Waiter = (available: boolean) => void;

const SEVERITY_TO_URGENCY: Record<NonNullable<EmergencyCall['severity']>, Priority> = {
  low: 'low',
  medium: 'normal',
  high: 'high',
  critical: 'critical'
};

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export class DispatchRouter implements LiveDepartmentSet {
  readonly routing: RoutingTable;

  private readonly available = new Set<string>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  private readonly stats = new Map<string, number>();
  private readonly classifier: EmergencyClassifier;
  private readonly router: MessageRouter;
  private readonly log: Logger;
  private unsubscribes: Unsubscribe[] = [];
  private callCounter = 0;
  private messagesHandled = 0;
  private readonly startedAt: number;

  constructor(
    private readonly bus: MessageBus,
    private readonly clock: Clock,
    private readonly options: DispatchRouterOptions,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('dispatch');
    this.routing = new RoutingTable(this, clock, logger);
    this.classifier = options.classifier ?? new RuleBasedClassifier(options.defaultDepartment);
    this.startedAt = clock.now();

    this.router = new MessageRouter('dispatch', logger)
      .on('department_announcement', DepartmentAnnouncementSchema, announcement =>
        this.onAnnouncement(announcement))
      .on('department_change_notification', DepartmentChangeNotificationSchema, change =>
        this.onChange(change))
      .on('health_check', HealthCheckRequestSchema, (request, envelope) =>
        this.respondToHealthCheck(request, envelope))
      .on('emergency_call', EmergencyCallSchema, async call => {
        await this.receiveCall(call);
      });
  }

  /**
   * Seed the live departments and listen on the broadcast and dispatch channels
   */
  async start(departments: string[] = []): Promise<void> {
    await this.bus.connect();
    for (const name of departments) {
      this.available.add(name);
    }

    const receive = (envelope: MessageEnvelope) => {
      this.messagesHandled++;
      return this.router.dispatch(envelope).then(() => undefined);
    };
    this.unsubscribes.push(await this.bus.subscribe(BROADCAST_CHANNEL, receive));
    this.unsubscribes.push(await this.bus.subscribe(this.options.name, receive));

    this.log.info(`Dispatch center ready with ${this.available.size} departments`, {
      departments: this.departments()
    });
  }

  /**
   * Unsubscribe and release every call still waiting for a department
   */
  async stop(): Promise<void> {
    for (const unsubscribe of this.unsubscribes) {
      await unsubscribe();
    }
    this.unsubscribes = [];

    for (const name of [...this.waiters.keys()]) {
      this.wake(name, false);
    }
    this.log.info('Dispatch center stopped', { calls: this.callCounter });
  }

  has(name: string): boolean {
    return this.available.has(name);
  }

  departments(): string[] {
    return [...this.available].sort();
  }

  /**
   * Departments the router is currently waiting on
   */
  awaiting(): string[] {
    return [...this.waiters.keys()].sort();
  }

  getStats(): Record<string, number> {
    return Object.fromEntries(this.stats);
  }

  getCallCount(): number {
    return this.callCounter;
  }

  /**
   * Place one call. Throws UndeliverableError when no department could take it.
   */
  async route(call: EmergencyCall): Promise<DispatchResult> {
    this.applyDueChanges();
    this.callCounter++;
    const callId = call.call_id ?? this.callIdFor(this.callCounter);

    this.log.info(`911 call ${callId}: ${call.emergency_type} at ${call.caller_location}`, {
      severity: call.severity,
      description: call.description
    });

    const required = [...new Set(await this.classifier.classify(call))];
    const placements = new Map<string, Placement>();
    const missing: Placement[] = [];

    for (const name of required) {
      const { resolved } = this.routing.resolveDetailed(name);
      if (resolved !== name) {
        this.log.info(`Routing redirected: ${name} -> ${resolved}`, { callId });
      }
      if (this.has(resolved)) {
        await this.place(placements, call, callId, { department: resolved, requestedAs: name });
      } else {
        missing.push({ department: resolved, requestedAs: name });
      }
    }

    const unavailable: string[] = [];
    if (missing.length > 0) {
      const arrivals = await this.awaitDepartments(call, callId, missing);
      for (const [index, placement] of missing.entries()) {
        if (arrivals[index]) {
          await this.place(placements, call, callId, placement);
        } else {
          unavailable.push(placement.requestedAs);
        }
      }
    }

    const { defaultDepartment } = this.options;
    if (placements.size === 0 && this.has(defaultDepartment)) {
      this.log.info(`Sending ${callId} to default department ${defaultDepartment}`);
      await this.place(placements, call, callId, { department: defaultDepartment, requestedAs: defaultDepartment });
    }

    if (placements.size === 0) {
      throw new UndeliverableError(callId, required);
    }

    return {
      callId,
      outcome: unavailable.length === 0 ? 'dispatched' : 'partial',
      departments: [...placements.keys()],
      required,
      unavailable
    };
  }

  private async receiveCall(call: EmergencyCall): Promise<void> {
    try {
      const result = await this.route(call);
      if (result.outcome === 'partial') {
        this.log.warn(`Call ${result.callId} only partially dispatched`, { unavailable: result.unavailable });
      }
    } catch (error) {
      if (!(error instanceof UndeliverableError)) throw error;
      this.log.error(error.message, { callId: error.callId, departments: error.departments });
    }
  }

  private async place(
    placements: Map<string, Placement>,
    call: EmergencyCall,
    callId: string,
    placement: Placement
  ): Promise<void> {
    if (placements.has(placement.department)) {
      return;
    }
    placements.set(placement.department, placement);

    const order: DispatchOrder = {
      ...call,
      call_id: callId,
      department: placement.department,
      requested_as: placement.requestedAs,
      dispatched_by: this.options.name
    };
    await this.send('dispatch_order', placement.department, order);
    this.stats.set(placement.department, (this.stats.get(placement.department) ?? 0) + 1);
    this.log.info(`Dispatched ${callId} to ${placement.department}`);
  }

  /**
   * Ask the council for each missing department once and wait for all of them
   */
  private async awaitDepartments(call: EmergencyCall, callId: string, missing: Placement[]): Promise<boolean[]> {
    const waits: Promise<boolean>[] = [];
    for (const { department } of missing) {
      const alreadyRequested = this.waiters.has(department);
      waits.push(this.waitFor(department));
      if (!alreadyRequested) {
        await this.requestDepartment(call, callId, department);
      }
    }
    return Promise.all(waits);
  }

  private waitFor(name: string): Promise<boolean> {
    if (this.has(name)) {
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      let waiters = this.waiters.get(name);
      if (!waiters) {
        waiters = new Set();
        this.waiters.set(name, waiters);
      }
      const group = waiters;

      const timer = this.clock.setTimeout(() => {
        group.delete(waiter);
        if (group.size === 0 && this.waiters.get(name) === group) {
          this.waiters.delete(name);
        }
        this.log.warn(`Gave up waiting for ${name}`, { waitedMs: this.options.serviceWaitMs });
        resolve(false);
      }, this.options.serviceWaitMs);

      const waiter: Waiter = available => {
        timer.cancel();
        resolve(available);
      };
      group.add(waiter);
    });
  }

  private wake(name: string, available: boolean): void {
    const waiters = this.waiters.get(name);
    if (!waiters) {
      return;
    }
    this.waiters.delete(name);
    for (const waiter of waiters) {
      waiter(available);
    }
  }

  private markAvailable(name: string): void {
    if (!this.available.has(name)) {
      this.available.add(name);
      this.log.info(`Now routing calls to ${name}`);
    }
    this.wake(name, true);
  }

  private markUnavailable(name: string): void {
    if (this.available.delete(name)) {
      this.log.info(`No longer routing calls to ${name}`);
    }
  }

  private async requestDepartment(call: EmergencyCall, callId: string, name: string): Promise<void> {
    const service = name.replace(/_department/g, '').replace(/_/g, ' ');
    const request: ServiceRequest = {
      requesting_service: this.options.name,
      emergency_type: call.emergency_type,
      description: `Need ${service} department to handle: ${call.description}`,
      urgency: call.severity ? SEVERITY_TO_URGENCY[call.severity] : 'high',
      original_call_id: callId,
      details: {
        department_needed: name,
        reason: `911 emergency requiring ${service} department`
      }
    };
    this.log.warn(`Missing department ${name}, requesting it from ${this.options.council}`, { callId });
    await this.send('service_request', this.options.council, request);
  }

  private onAnnouncement(announcement: DepartmentAnnouncement): void {
    const name = announcement.department_name;
    switch (announcement.status) {
      case 'launched':
      case 'active':
        this.markAvailable(name);
        break;
      case 'failed':
        this.log.error(`Council could not provide ${name}`, { description: announcement.description });
        this.markUnavailable(name);
        this.wake(name, false);
        break;
      case 'created':
        this.log.info(`Council created ${name}`);
        break;
    }
  }

  private onChange(change: DepartmentChangeNotification): void {
    this.applyDueChanges();

    const outcome = this.routing.apply(change);
    if (outcome === 'duplicate') {
      this.log.debug('Ignoring repeated change notification', { changeId: change.change_id });
      return;
    }

    this.log.info(`Department change: ${change.change_type}`, {
      affected: change.affected_departments,
      newDepartment: change.new_department,
      emergencyTypes: change.emergency_types_affected
    });
    if (outcome === 'applied') {
      this.updateAvailability(change);
    }
  }

  private applyDueChanges(): void {
    for (const change of this.routing.applyDue()) {
      this.updateAvailability(change);
    }
  }

  private updateAvailability(change: DepartmentChangeNotification): void {
    const replacement = change.new_department;

    if (change.change_type !== 'created') {
      for (const name of change.affected_departments) {
        if (name !== replacement) {
          this.markUnavailable(name);
        }
      }
    }
    if (replacement && change.change_type !== 'terminated') {
      this.markAvailable(replacement);
    }
  }

  private async respondToHealthCheck(request: HealthCheckRequest, envelope: MessageEnvelope): Promise<void> {
    const reply: HealthStatusReply = {
      check_id: request.check_id,
      service_name: this.options.name,
      status: 'healthy',
      uptime_seconds: Math.max(0, (this.clock.now() - this.startedAt) / 1000),
      message_count: this.messagesHandled,
      details: { calls: this.callCounter, departments: this.available.size }
    };
    await this.send('health_status', envelope.from, reply);
  }

  /**
   * 911-YYYYMMDD-HHMMSS-NNNN in UTC
   */
  private callIdFor(sequence: number): string {
    const at = new Date(this.clock.now());
    const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
    const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
    return `911-${date}-${time}-${pad(sequence, 4)}`;
  }

  private async send(type: MessageType, to: string, payload: unknown): Promise<void> {
    await this.bus.publish(to, createEnvelope(type, this.options.name, to, payload, new Date(this.clock.now())));
  }
}
