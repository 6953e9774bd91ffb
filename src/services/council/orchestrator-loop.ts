/**
 * Orchestrator Loop
 *
 * The city council. On a fixed cadence it rescans the registry, supervises
 * department processes and asks the analyzers for efficiency reviews. Between
 * beats it answers health checks, creates departments on request and turns
 * analyzer recommendations into binding routing changes. The cadence beat and
 * every message handler run one at a time.
 */

import { randomUUID } from 'node:crypto';
import { Clock, Ticker, TimerHandle } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { Mutex } from '../../core/mutex.js';
import {
  ConsolidationRecommendationSchema,
  HealthCheckRequestSchema,
  HealthStatusReplySchema,
  ServiceRequestSchema,
  TerminationRecommendationSchema
} from '../../core/schemas.js';
import type {
  CouncilDecision,
  DepartmentChangeNotification,
  DepartmentAnalysisRequest,
  DepartmentAnnouncement,
  HealthCheckRequest,
  HealthStatus,
  HealthStatusReply,
  MessageEnvelope,
  MessageType,
  ServiceRequest
} from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';
import { validateDepartmentName } from '../../core/validation.js';
import { Decision, Recommendation } from '../../models/recommendation.js';
import { DepartmentRecord, SupervisionSummary } from '../../models/department.js';
import { BROADCAST_CHANNEL, MessageBus, Unsubscribe, createEnvelope } from '../bus/message-bus.js';
import { MessageRouter } from '../bus/message-router.js';
import type { CityConfig } from '../config/config-service.js';
import { HealthProtocol } from '../health/health-protocol.js';
import { ProcessLauncher } from '../process/process-launcher.js';
import { RegistryScanner, ScanResult } from '../registry/registry-scanner.js';
import { RoutingTable } from '../routing/routing-table.js';
import { ProcessSupervisor } from '../supervisor/process-supervisor.js';
import { NotificationDispatcher } from './notification-dispatcher.js';
import { RecommendationEvaluator } from './recommendation-evaluator.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrchestratorDependencies {
  bus: MessageBus;
  launcher: ProcessLauncher;
  registry: RegistryScanner;
  clock: Clock;
  config: CityConfig;
  logger?: Logger;
}

/**
 * How a service request was handled
 */
export type ServiceRequestOutcome = 'launched' | 'active' | 'failed' | 'ignored';

/**
 * A request either settles inside the lock or continues once its spawn does
 */
type ServiceRequestStep =
  | { outcome: ServiceRequestOutcome }
  | { completion: Promise<ServiceRequestOutcome> };

export class OrchestratorLoop {
  readonly supervisor: ProcessSupervisor;
  readonly health: HealthProtocol;
  readonly routing: RoutingTable;
  readonly evaluator: RecommendationEvaluator;
  readonly notifications: NotificationDispatcher;

  private readonly bus: MessageBus;
  private readonly registry: RegistryScanner;
  private readonly clock: Clock;
  private readonly config: CityConfig;
  private readonly name: string;
  private readonly log: Logger;
  private readonly router: MessageRouter;
  private readonly ticker: Ticker;
  private readonly mutex = new Mutex();
  /** Departments retired by council decision; rescans do not bring them back */
  private readonly retired = new Set<string>();
  /** Retirements held until their change takes effect */
  private readonly retirements = new Set<TimerHandle>();
  /** Service requests waiting on a spawn */
  private readonly followUps = new Set<Promise<unknown>>();
  private unsubscribes: Unsubscribe[] = [];
  private status: HealthStatus = 'critical';
  private startedAt: number;
  private lastAnalysis: number | null = null;
  private messagesHandled = 0;

  constructor(deps: OrchestratorDependencies) {
    const logger = deps.logger ?? rootLogger;
    this.bus = deps.bus;
    this.registry = deps.registry;
    this.clock = deps.clock;
    this.config = deps.config;
    this.name = deps.config.council.name;
    this.log = logger.child('council');
    this.startedAt = deps.clock.now();

    this.supervisor = new ProcessSupervisor(deps.launcher, deps.clock, deps.config.supervision, logger);
    this.health = new HealthProtocol(deps.bus, this.supervisor, deps.clock, this.name, logger);
    this.routing = new RoutingTable(this.supervisor, deps.clock, logger);
    this.evaluator = new RecommendationEvaluator(deps.config.policy, deps.clock, logger);
    this.notifications = new NotificationDispatcher(deps.bus, this.supervisor, deps.clock, {
      sender: this.name,
      dispatchCenter: deps.config.council.dispatchCenter,
      effectiveDelayMs: deps.config.council.changeDelayMs
    }, logger);

    this.router = new MessageRouter('council', logger)
      .on('health_status', HealthStatusReplySchema, reply =>
        this.exclusive(() => { this.health.onReply(reply); }))
      .on('health_check', HealthCheckRequestSchema, (request, envelope) =>
        this.respondToHealthCheck(request, envelope))
      .on('service_request', ServiceRequestSchema, async (request, envelope) => {
        await this.submitServiceRequest(request, envelope.from);
      })
      .on('consolidation_recommendation', ConsolidationRecommendationSchema, async payload => {
        await this.submitRecommendation({ kind: 'consolidation', payload });
      })
      .on('termination_recommendation', TerminationRecommendationSchema, async payload => {
        await this.submitRecommendation({ kind: 'termination', payload });
      });

    this.ticker = new Ticker(
      deps.clock,
      deps.config.supervision.tickIntervalMs,
      () => this.tick(),
      error => this.log.exception(error, { phase: 'tick' })
    );
  }

  getName(): string {
    return this.name;
  }

  /**
   * Discover and launch departments, subscribe to the council channel and start the cadence
   */
  async start(): Promise<void> {
    await this.bus.connect();
    this.startedAt = this.clock.now();

    const { departments } = await this.registry.scan();
    for (const name of departments) {
      await this.supervisor.register(name);
    }

    this.health.attach();
    this.unsubscribes.push(await this.bus.subscribe(this.name, envelope => this.receive(envelope)));
    this.status = this.determineStatus();

    this.log.info(`Council governing ${departments.length} departments`, { departments });
    this.ticker.start(true);
  }

  /**
   * Stop the cadence, drain the supervisor and unsubscribe
   */
  async stop(): Promise<void> {
    this.ticker.stop();
    await this.ticker.drain();
    for (const retirement of this.retirements) {
      retirement.cancel();
    }
    this.retirements.clear();
    await this.exclusive(() => this.supervisor.shutdown());
    await this.supervisor.settled();
    await Promise.allSettled([...this.followUps]);

    for (const unsubscribe of this.unsubscribes) {
      await unsubscribe();
    }
    this.unsubscribes = [];
    this.log.info('Council stopped');
  }

  isRunning(): boolean {
    return this.ticker.isRunning();
  }

  /**
   * Resolves once the beat, every handler queued so far and the spawns they
   * started have finished
   */
  async whenIdle(): Promise<void> {
    do {
      await this.exclusive(() => undefined);
      await this.supervisor.settled();
      await Promise.allSettled([...this.followUps]);
    } while (this.followUps.size > 0);
  }

  /**
   * One cadence beat
   */
  tick(): Promise<void> {
    return this.exclusive(async () => {
      await this.rescan();
      for (const name of this.supervisor.tick()) {
        await this.announce({ department_name: name, status: 'failed', description: 'Department has permanently failed' });
      }
      this.routing.applyDue();
      this.reportHealth();

      if (this.analysisDue()) {
        await this.requestAnalysis();
      }
    });
  }

  /**
   * Decide a recommendation and, once approved, make it binding. Serialized
   * with the cadence beat.
   */
  submitRecommendation(recommendation: Recommendation): Promise<Decision> {
    return this.exclusive(() => this.handleRecommendation(recommendation));
  }

  /**
   * Create a department on request. The decision is serialized with the cadence
   * beat; a spawn it starts is awaited outside the lock.
   */
  async submitServiceRequest(request: ServiceRequest, from: string): Promise<ServiceRequestOutcome> {
    const step = await this.exclusive(() => this.handleServiceRequest(request, from));
    return 'outcome' in step ? step.outcome : step.completion;
  }

  /**
   * critical below 3 live departments, warning below 6, healthy from 6
   */
  determineStatus(): HealthStatus {
    const count = this.liveDepartments().length;
    if (count <= 2) return 'critical';
    if (count <= 5) return 'warning';
    return 'healthy';
  }

  getStatus(): HealthStatus {
    return this.status;
  }

  liveDepartments(): string[] {
    return this.supervisor.names().filter(name => this.supervisor.has(name));
  }

  private async receive(envelope: MessageEnvelope): Promise<void> {
    this.messagesHandled++;
    await this.router.dispatch(envelope);
  }

  private exclusive<T>(section: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(section);
  }

  private async rescan(): Promise<void> {
    let scan: ScanResult;
    try {
      scan = await this.registry.scan();
    } catch (error) {
      this.log.exception(error, { phase: 'rescan' });
      return;
    }

    for (const name of scan.added) {
      if (this.retired.has(name) || this.supervisor.isTracked(name)) {
        continue;
      }
      this.log.info(`New department detected: ${name}`);
      this.supervisor.enroll(name);
    }

    for (const name of scan.removed) {
      if (this.supervisor.isTracked(name)) {
        this.log.warn(`Department removed from registry: ${name}`);
        this.supervisor.retire(name);
        this.health.forget(name);
        await this.announce({ department_name: name, status: 'failed', description: 'Department removed from registry' });
      }
    }
  }

  private reportHealth(): void {
    const summary: SupervisionSummary = this.supervisor.summary();
    if (summary.unhealthy > 0 || summary.warning > 0) {
      const issues: string[] = [];
      if (summary.unhealthy > 0) issues.push(`${summary.unhealthy} unhealthy`);
      if (summary.warning > 0) issues.push(`${summary.warning} warning`);
      this.log.warn(`Department health issues - ${issues.join(', ')}`, { healthy: summary.healthy });
    } else if (summary.total > 0) {
      this.log.debug(`All ${summary.healthy} departments healthy`);
    }

    const previous = this.status;
    this.status = this.determineStatus();
    if (previous !== this.status) {
      this.log.info(`Council status changed from ${previous} to ${this.status}`);
    }
  }

  private analysisDue(): boolean {
    if (this.liveDepartments().length < this.config.council.analysisMinDepartments) {
      return false;
    }
    return this.lastAnalysis === null ||
      this.clock.now() - this.lastAnalysis >= this.config.council.analysisIntervalMs;
  }

  private async requestAnalysis(): Promise<void> {
    this.lastAnalysis = this.clock.now();

    for (const analyzer of this.config.council.analyzers) {
      const request: DepartmentAnalysisRequest = {
        request_id: randomUUID(),
        analysis_type: 'periodic_audit',
        requested_by: this.name,
        target_departments: [],
        focus_areas: ['cost_reduction', 'service_overlap', 'utilization'],
        similarity_threshold: 0.15,
        include_cost_analysis: true,
        include_usage_metrics: true,
        urgency: 'normal',
        reason: 'Periodic efficiency review to optimize city services'
      };
      await this.send('department_analysis_request', analyzer, request);
    }
    this.log.info('Requested efficiency analysis', { analyzers: this.config.council.analyzers });
  }

  private async respondToHealthCheck(request: HealthCheckRequest, envelope: MessageEnvelope): Promise<void> {
    const summary = this.supervisor.summary();
    const reply: HealthStatusReply = {
      check_id: request.check_id,
      service_name: this.name,
      status: this.determineStatus(),
      uptime_seconds: Math.max(0, (this.clock.now() - this.startedAt) / 1000),
      message_count: this.messagesHandled,
      details: {
        departments_count: summary.total,
        departments: this.supervisor.names(),
        health_summary: { healthy: summary.healthy, warning: summary.warning, unhealthy: summary.unhealthy },
        ready: true
      }
    };
    await this.send('health_status', envelope.from, reply);
  }

  private async handleServiceRequest(request: ServiceRequest, from: string): Promise<ServiceRequestStep> {
    const needed = request.details.department_needed;
    if (!needed) {
      this.log.info(`Service request from ${from} names no department`, { description: request.description });
      return { outcome: 'ignored' };
    }

    let name: string;
    try {
      name = validateDepartmentName(needed);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.log.warn(`Ignoring service request from ${from}: ${error.message}`);
      return { outcome: 'ignored' };
    }

    if (this.supervisor.has(name)) {
      await this.announce({ department_name: name, status: 'active', process_id: this.supervisor.get(name)?.handle?.pid });
      return { outcome: 'active' };
    }
    if (this.supervisor.isTracked(name)) {
      this.log.warn(`Cannot provide ${name}: department has permanently failed`, { requestedBy: from });
      await this.announce({ department_name: name, status: 'failed', description: 'Department has permanently failed' });
      return { outcome: 'failed' };
    }

    this.log.info(`Creating ${name} for ${from}`, { reason: request.details.reason ?? request.description });
    this.retired.delete(name);
    this.supervisor.enroll(name);
    const completion = this.supervisor.whenLaunched(name)
      .then(record => this.exclusive(() => this.completeServiceRequest(name, record, request.description)));
    return { completion: this.follow(completion) };
  }

  private async completeServiceRequest(
    name: string,
    record: DepartmentRecord | undefined,
    description: string
  ): Promise<ServiceRequestOutcome> {
    if (!record?.handle) {
      await this.announce({ department_name: name, status: 'failed', description: 'Department process could not be launched' });
      return 'failed';
    }

    await this.announce({ department_name: name, status: 'launched', process_id: record.handle.pid, description });
    const created = await this.notifications.announceCreated(name);
    this.routing.apply(created);
    return 'launched';
  }

  private follow<T>(work: Promise<T>): Promise<T> {
    const tracked: Promise<T> = work.finally(() => {
      this.followUps.delete(tracked);
    });
    this.followUps.add(tracked);
    return tracked;
  }

  private async handleRecommendation(recommendation: Recommendation): Promise<Decision> {
    const { decision, isNew } = this.evaluator.evaluate(recommendation);
    if (!isNew) {
      return decision;
    }

    await this.publishDecision(decision, recommendation.payload.analyzed_by);

    if (decision.outcome === 'approved') {
      const notification = await this.notifications.broadcast(decision, recommendation);
      if (notification) {
        this.routing.apply(notification);
      }
      this.implement(recommendation, effectiveAt(notification));
    }
    return decision;
  }

  private async publishDecision(decision: Decision, proposer: string): Promise<void> {
    const message: CouncilDecision = {
      decision_id: randomUUID(),
      recommendation_id: decision.recommendationId,
      recommendation_type: decision.recommendationType,
      decision: decision.outcome,
      decision_rationale: decision.rationale,
      effective_date: new Date(this.clock.now() + this.config.council.decisionLeadDays * DAY_MS).toISOString().slice(0, 10),
      decided_by: this.name
    };
    await this.send('council_decision', proposer, message);
    this.log.info(`Council decision: ${decision.outcome}`, {
      recommendationId: decision.recommendationId,
      type: decision.recommendationType
    });
  }

  /**
   * Register the consolidated department and retire the departments it replaces.
   * Retirement waits for a deferred change to take effect.
   */
  private implement(recommendation: Recommendation, effective: number | null): void {
    const leaving: string[] = [];
    if (recommendation.kind === 'consolidation') {
      const target = recommendation.payload.proposed_name;
      this.retired.delete(target);
      this.supervisor.enroll(target);
      leaving.push(...recommendation.payload.departments_to_merge.filter(name => name !== target));
    } else {
      leaving.push(recommendation.payload.department_name);
    }

    if (effective === null || effective <= this.clock.now()) {
      leaving.forEach(name => this.retireDepartment(name));
      return;
    }

    for (const name of leaving) {
      this.retired.add(name);
    }
    const delayMs = effective - this.clock.now();
    this.log.info('Retirement scheduled', { departments: leaving, effectiveDate: new Date(effective).toISOString() });
    const handle = this.clock.setTimeout(() => {
      this.retirements.delete(handle);
      void this.exclusive(() => leaving.forEach(name => this.retireDepartment(name)))
        .catch(error => this.log.exception(error, { phase: 'retirement' }));
    }, delayMs);
    this.retirements.add(handle);
  }

  private retireDepartment(name: string): void {
    this.retired.add(name);
    if (this.supervisor.retire(name)) {
      this.health.forget(name);
    }
  }

  private async announce(announcement: DepartmentAnnouncement): Promise<void> {
    await this.send('department_announcement', BROADCAST_CHANNEL, announcement);
  }

  private async send(type: MessageType, to: string, payload: unknown): Promise<void> {
    const envelope = createEnvelope(type, this.name, to, payload, new Date(this.clock.now()));
    await this.bus.publish(to, envelope);
  }
}

/**
 * When a change notification takes effect, or null if it already has
 */
function effectiveAt(notification: DepartmentChangeNotification | null): number | null {
  if (!notification || notification.effective_immediately || !notification.effective_date) {
    return null;
  }
  return Date.parse(notification.effective_date);
}
