/**
 * Tests for the council orchestrator loop
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { OrchestratorLoop } from './orchestrator-loop.js';
import { DispatchRouter } from '../dispatch/dispatch-router.js';
import { resolveConfig, CityConfigInput } from '../config/config-service.js';
import { MemoryBus } from '../bus/memory-bus.js';
import { createEnvelope } from '../bus/message-bus.js';
import { InMemoryProcessLauncher } from '../process/in-memory-launcher.js';
import { RegistryScanner, StaticDepartmentSource } from '../registry/registry-scanner.js';
import { ManualClock } from '../../core/clock.js';
import { Logger, LogLevel } from '../../core/logger.js';
import {
  ConsolidationRecommendationSchema,
  CouncilDecisionSchema,
  DepartmentAnnouncementSchema,
  DepartmentChangeNotificationSchema,
  EmergencyCallSchema,
  HealthCheckRequestSchema,
  HealthStatusReplySchema,
  TerminationRecommendationSchema
} from '../../core/schemas.js';
import { Recommendation } from '../../models/recommendation.js';

const TICK_MS = 30_000;
const HOUR_MS = 60 * 60 * 1000;

interface Harness {
  clock: ManualClock;
  bus: MemoryBus;
  launcher: InMemoryProcessLauncher;
  source: StaticDepartmentSource;
  council: OrchestratorLoop;
  logger: Logger;
  lines: string[];
}

function setup(departments: string[], config: CityConfigInput = {}): Harness {
  const lines: string[] = [];
  const logger = new Logger({ level: LogLevel.DEBUG, sink: (_level, line) => lines.push(line) });
  const clock = new ManualClock();
  const bus = new MemoryBus(logger);
  const launcher = new InMemoryProcessLauncher(clock);
  const source = new StaticDepartmentSource(departments);
  const council = new OrchestratorLoop({
    bus,
    launcher,
    registry: new RegistryScanner(source, logger),
    clock,
    config: resolveConfig(config),
    logger
  });
  return { clock, bus, launcher, source, council, logger, lines };
}

/**
 * Make departments answer every health check as healthy
 */
async function respondHealthy(bus: MemoryBus, names: string[]): Promise<void> {
  for (const name of names) {
    await bus.subscribe(name, async envelope => {
      if (envelope.type !== 'health_check') return;
      const request = HealthCheckRequestSchema.parse(envelope.payload);
      await bus.publish(envelope.from, createEnvelope('health_status', name, envelope.from, {
        check_id: request.check_id,
        service_name: name,
        status: 'healthy'
      }));
    });
  }
}

function consolidation(id: string, merge: string[], proposed: string, similarity: number, savings: number): Recommendation {
  return {
    kind: 'consolidation',
    payload: ConsolidationRecommendationSchema.parse({
      recommendation_id: id,
      proposed_name: proposed,
      departments_to_merge: merge,
      similarity_score: similarity,
      estimated_annual_savings: savings
    })
  };
}

function announcements(bus: MemoryBus) {
  return bus.getHistory('broadcast')
    .filter(m => m.envelope.type === 'department_announcement')
    .map(m => DepartmentAnnouncementSchema.parse(m.envelope.payload));
}

/**
 * Dispatch center on the council's bus, seeded with the council's live departments
 */
async function startDispatch({ bus, clock, council, logger }: Harness, required: string[]): Promise<DispatchRouter> {
  const dispatch = new DispatchRouter(bus, clock, {
    name: 'emergency_dispatch_center',
    council: 'city_council',
    serviceWaitMs: TICK_MS,
    defaultDepartment: 'a_department',
    classifier: { classify: async () => required }
  }, logger);
  await dispatch.start(council.liveDepartments());
  return dispatch;
}

function termination(id: string, name: string, reason: 'redundant' | 'inefficient'): Recommendation {
  return {
    kind: 'termination',
    payload: TerminationRecommendationSchema.parse({
      recommendation_id: id,
      department_name: name,
      termination_reason: reason
    })
  };
}

describe('OrchestratorLoop', () => {
  let harness: Harness;

  afterEach(async () => {
    if (harness.council.isRunning()) {
      await harness.council.stop();
    }
  });

  describe('start', () => {
    beforeEach(() => {
      harness = setup(['police_department', 'fire_department', 'water_department']);
    });

    it('should launch every scanned department and check its health', async () => {
      const { council, bus, launcher } = harness;
      await council.start();
      await council.whenIdle();

      expect(council.supervisor.names().sort()).toEqual(['fire_department', 'police_department', 'water_department']);
      expect(launcher.getSpawnCount('fire_department')).toBe(1);
      expect(bus.getHistory('fire_department').map(m => m.envelope.type)).toEqual(['health_check']);
      expect(council.getStatus()).toBe('warning');
    });

    it('should mark departments running once they answer', async () => {
      const { council, bus } = harness;
      await respondHealthy(bus, ['police_department', 'fire_department', 'water_department']);
      await council.start();
      await council.whenIdle();

      expect(council.supervisor.list().map(r => r.status)).toEqual(['running', 'running', 'running']);
    });
  });

  describe('supervision', () => {
    it('should demote a dead department after its restart budget and keep the others running', async () => {
      harness = setup(['a_department', 'b_department', 'c_department'], {
        supervision: { restartThreshold: 1, maxRestarts: 3 }
      });
      const { council, bus, launcher, clock } = harness;
      await respondHealthy(bus, ['a_department', 'c_department']);
      launcher.markDead('b_department');

      await council.start();
      await clock.advance(3 * TICK_MS);
      await council.whenIdle();

      expect(council.supervisor.get('b_department')?.status).toBe('permanently_failed');
      expect(council.supervisor.get('a_department')?.status).toBe('running');
      expect(council.supervisor.get('c_department')?.status).toBe('running');
      expect(launcher.getSpawnCount('b_department')).toBe(4);

      await clock.advance(2 * TICK_MS);
      expect(launcher.getSpawnCount('b_department')).toBe(4);
    });

    it('should register departments that appear in the registry and retire those that vanish', async () => {
      harness = setup(['police_department', 'fire_department']);
      const { council, source, clock } = harness;
      await council.start();

      source.set(['police_department', 'parks_department']);
      await clock.advance(TICK_MS);
      await council.whenIdle();

      expect(council.supervisor.names().sort()).toEqual(['parks_department', 'police_department']);
    });

    it('should stop checking departments after stop', async () => {
      harness = setup(['police_department']);
      const { council, bus, clock, launcher } = harness;
      await council.start();
      await council.stop();

      const sent = bus.getHistory('police_department').length;
      await clock.advance(5 * TICK_MS);

      expect(bus.getHistory('police_department')).toHaveLength(sent);
      expect(launcher.getTerminated().map(h => h.name)).toEqual(['police_department']);
      expect(council.isRunning()).toBe(false);
    });
  });

  describe('failure announcements', () => {
    it('should tell consumers when a department is demoted', async () => {
      harness = setup(['a_department', 'b_department', 'c_department'], {
        supervision: { restartThreshold: 1, maxRestarts: 3 }
      });
      const { council, bus, launcher, clock, lines } = harness;
      await respondHealthy(bus, ['a_department', 'c_department']);
      launcher.markDead('b_department');
      await council.start();
      const dispatch = await startDispatch(harness, ['b_department']);
      expect(dispatch.has('b_department')).toBe(true);

      await clock.advance(5 * TICK_MS);
      await council.whenIdle();

      expect(announcements(bus)).toEqual([
        { department_name: 'b_department', status: 'failed', description: 'Department has permanently failed' }
      ]);
      expect(dispatch.has('b_department')).toBe(false);
      expect(dispatch.departments()).toEqual(['a_department', 'c_department']);
      expect(lines).toContain('[city:dispatch] [INFO] No longer routing calls to b_department');

      const result = await dispatch.route(EmergencyCallSchema.parse({
        caller_location: '12 Oak St',
        emergency_type: 'fire'
      }));
      expect(result.departments).toEqual(['a_department']);
      expect(result.outcome).toBe('partial');
      expect(result.unavailable).toEqual(['b_department']);
      await dispatch.stop();
    });

    it('should tell consumers when a department leaves the registry', async () => {
      harness = setup(['a_department', 'b_department', 'c_department']);
      const { council, bus, source, clock } = harness;
      await respondHealthy(bus, ['a_department', 'b_department', 'c_department']);
      await council.start();
      await council.whenIdle();
      const dispatch = await startDispatch(harness, ['c_department']);

      source.set(['a_department', 'b_department']);
      await clock.advance(TICK_MS);
      await council.whenIdle();

      expect(announcements(bus)).toEqual([
        { department_name: 'c_department', status: 'failed', description: 'Department removed from registry' }
      ]);
      expect(dispatch.departments()).toEqual(['a_department', 'b_department']);
      await dispatch.stop();
    });
  });

  describe('deferred changes', () => {
    it('should keep a terminated department running until the change takes effect', async () => {
      const departments = ['police_department', 'fire_department', 'water_department', 'parks_department'];
      harness = setup(departments, { council: { changeDelayMs: HOUR_MS } });
      const { council, bus, clock, lines } = harness;
      await respondHealthy(bus, departments);
      await council.start();
      await council.whenIdle();

      const decision = await council.submitRecommendation(termination('rec-parks', 'parks_department', 'redundant'));

      expect(decision.outcome).toBe('approved');
      expect(council.supervisor.isTracked('parks_department')).toBe(true);
      expect(council.routing.pendingCount()).toBe(1);
      expect(council.routing.resolve('parks_department')).toBe('parks_department');
      expect(lines).toContain(
        '[city:council] [INFO] Retirement scheduled {"departments":["parks_department"],"effectiveDate":"2024-01-15T10:30:00.000Z"}'
      );

      await clock.advance(HOUR_MS - TICK_MS);
      await council.whenIdle();
      expect(council.supervisor.isTracked('parks_department')).toBe(true);

      await clock.advance(2 * TICK_MS);
      await council.whenIdle();
      expect(council.supervisor.isTracked('parks_department')).toBe(false);
      expect(council.routing.pendingCount()).toBe(0);
      expect(council.routing.resolve('parks_department')).toBe('public_works_department');
    });

    it('should drop scheduled retirements on stop', async () => {
      const departments = ['police_department', 'fire_department', 'water_department', 'parks_department'];
      harness = setup(departments, { council: { changeDelayMs: HOUR_MS } });
      const { council, clock } = harness;
      await council.start();
      await council.submitRecommendation(termination('rec-parks', 'parks_department', 'redundant'));

      await council.stop();
      expect(clock.pendingTimers()).toBe(0);
    });
  });

  describe('recommendations', () => {
    beforeEach(async () => {
      harness = setup(['water', 'utilities', 'police_department', 'parks_department']);
      await harness.council.start();
      await harness.council.whenIdle();
    });

    it('should approve the water and utilities merge and route both to the new department', async () => {
      const { council, bus } = harness;
      const decision = await council.submitRecommendation(
        consolidation('rec-water', ['water', 'utilities'], 'water_utilities_department', 80, 200000)
      );

      expect(decision.outcome).toBe('approved');
      expect(council.routing.resolve('water')).toBe('water_utilities_department');
      expect(council.routing.resolve('utilities')).toBe('water_utilities_department');
      expect(council.supervisor.has('water_utilities_department')).toBe(true);
      expect(council.supervisor.isTracked('water')).toBe(false);
      expect(council.supervisor.isTracked('utilities')).toBe(false);

      const notices = bus.getHistory('broadcast').filter(m => m.envelope.type === 'department_change_notification');
      expect(notices).toHaveLength(1);
      expect(DepartmentChangeNotificationSchema.parse(notices[0].envelope.payload).routing_changes).toEqual({
        water: 'water_utilities_department',
        utilities: 'water_utilities_department'
      });
    });

    it('should send the decision to the analyzer that proposed it', async () => {
      const { council, bus } = harness;
      await council.submitRecommendation(consolidation('rec-water', ['water', 'utilities'], 'water_utilities_department', 80, 200000));

      const decisions = bus.getHistory('doge').filter(m => m.envelope.type === 'council_decision');
      expect(decisions).toHaveLength(1);
      const message = CouncilDecisionSchema.parse(decisions[0].envelope.payload);
      expect(message).toMatchObject({
        recommendation_id: 'rec-water',
        recommendation_type: 'consolidation',
        decision: 'approved',
        decision_rationale: 'Recommendation approved based on cost-benefit analysis and efficiency goals',
        effective_date: '2024-02-14',
        decided_by: 'city_council'
      });
    });

    it('should not bring retired departments back on rescan', async () => {
      const { council, source, clock } = harness;
      await council.submitRecommendation(consolidation('rec-water', ['water', 'utilities'], 'water_utilities_department', 80, 200000));

      source.set(['police_department', 'parks_department']);
      await clock.advance(TICK_MS);
      source.set(['water', 'utilities', 'police_department', 'parks_department']);
      await clock.advance(TICK_MS);
      await council.whenIdle();

      expect(council.supervisor.isTracked('water')).toBe(false);
    });

    it('should reject terminating a protected department without broadcasting', async () => {
      const { council, bus } = harness;
      bus.clearHistory();
      const decision = await council.submitRecommendation(termination('rec-police', 'police_department', 'redundant'));

      expect(decision.outcome).toBe('rejected');
      expect(council.supervisor.has('police_department')).toBe(true);
      expect(bus.getHistory('broadcast')).toEqual([]);
      expect(bus.getHistory('doge')).toHaveLength(1);
    });

    it('should retire a terminated department and route it to its fallback', async () => {
      const { council } = harness;
      const decision = await council.submitRecommendation(termination('rec-parks', 'parks_department', 'redundant'));

      expect(decision.outcome).toBe('approved');
      expect(council.supervisor.isTracked('parks_department')).toBe(false);
      expect(council.routing.targetOf('parks_department')).toBe('public_works_department');
      expect(council.routing.resolve('parks_department')).toBe('public_works_department');
    });

    it('should act on a redelivered recommendation only once', async () => {
      const { council, bus } = harness;
      const first = await council.submitRecommendation(termination('rec-parks', 'parks_department', 'redundant'));
      const second = await council.submitRecommendation(termination('rec-parks', 'parks_department', 'redundant'));

      expect(second).toBe(first);
      expect(bus.getHistory('doge').filter(m => m.envelope.type === 'council_decision')).toHaveLength(1);
      expect(bus.getHistory('broadcast').filter(m => m.envelope.type === 'department_change_notification')).toHaveLength(1);
    });

    it('should accept recommendations from the bus and drop malformed ones', async () => {
      const { council, bus, lines } = harness;
      await bus.publish('city_council', createEnvelope('termination_recommendation', 'doge', 'city_council', {
        recommendation_id: 'rec-bus',
        department_name: 'parks_department',
        termination_reason: 'inefficient'
      }));
      await bus.publish('city_council', createEnvelope('consolidation_recommendation', 'doge', 'city_council', {
        recommendation_id: 'rec-bad'
      }));
      await council.whenIdle();

      expect(council.evaluator.decisions().map(d => [d.recommendationId, d.outcome])).toEqual([['rec-bus', 'deferred']]);
      expect(lines.some(line => line.startsWith('[city:council:router] [WARN] Malformed consolidation_recommendation message'))).toBe(true);
    });
  });

  describe('service requests', () => {
    beforeEach(async () => {
      harness = setup(['police_department', 'fire_department'], { supervision: { restartThreshold: 1, maxRestarts: 0 } });
      await harness.council.start();
      await harness.council.whenIdle();
      harness.bus.clearHistory();
    });

    it('should create a missing department and announce it', async () => {
      const { council, bus } = harness;
      await bus.publish('city_council', createEnvelope('service_request', 'emergency_dispatch_center', 'city_council', {
        requesting_service: 'emergency_dispatch_center',
        description: 'Animal attack reported downtown',
        details: { department_needed: 'animal_control_department' }
      }));
      await council.whenIdle();

      expect(council.supervisor.has('animal_control_department')).toBe(true);

      const broadcast = bus.getHistory('broadcast');
      expect(broadcast.map(m => m.envelope.type)).toEqual(['department_announcement', 'department_change_notification']);
      expect(DepartmentAnnouncementSchema.parse(broadcast[0].envelope.payload)).toEqual({
        department_name: 'animal_control_department',
        status: 'launched',
        process_id: 1002,
        description: 'Animal attack reported downtown'
      });
      expect(DepartmentChangeNotificationSchema.parse(broadcast[1].envelope.payload).change_type).toBe('created');
    });

    it('should report an existing department as active', async () => {
      const outcome = await harness.council.submitServiceRequest({
        requesting_service: 'emergency_dispatch_center',
        description: 'Need police',
        urgency: 'high',
        details: { department_needed: 'police_department' }
      }, 'emergency_dispatch_center');

      expect(outcome).toBe('active');
      expect(harness.launcher.getSpawnCount('police_department')).toBe(1);
    });

    it('should report a permanently failed department as failed', async () => {
      const { council, launcher, clock } = harness;
      launcher.markDead('fire_department');
      await clock.advance(TICK_MS);
      await council.whenIdle();
      expect(council.supervisor.get('fire_department')?.status).toBe('permanently_failed');

      const outcome = await council.submitServiceRequest({
        requesting_service: 'emergency_dispatch_center',
        description: 'Structure fire',
        urgency: 'critical',
        details: { department_needed: 'fire_department' }
      }, 'emergency_dispatch_center');

      expect(outcome).toBe('failed');
    });

    it('should ignore requests that name no department', async () => {
      const outcome = await harness.council.submitServiceRequest({
        requesting_service: 'emergency_dispatch_center',
        description: 'Something odd',
        urgency: 'low',
        details: {}
      }, 'emergency_dispatch_center');

      expect(outcome).toBe('ignored');
    });
  });

  describe('council health and analysis', () => {
    it('should answer health checks with a status from the department count', async () => {
      harness = setup(['police_department', 'fire_department', 'water_department']);
      const { council, bus } = harness;
      await council.start();
      await council.whenIdle();

      await bus.publish('city_council', createEnvelope('health_check', 'monitor', 'city_council', {
        check_id: 'monitor-1',
        from: 'monitor',
        to: 'city_council'
      }));
      await council.whenIdle();

      const replies = bus.getHistory('monitor');
      expect(replies).toHaveLength(1);
      const reply = HealthStatusReplySchema.parse(replies[0].envelope.payload);
      expect(reply.check_id).toBe('monitor-1');
      expect(reply.service_name).toBe('city_council');
      expect(reply.status).toBe('warning');
      expect(reply.message_count).toBe(1);
    });

    it('should be critical with fewer than three departments', async () => {
      harness = setup(['police_department']);
      await harness.council.start();
      expect(harness.council.determineStatus()).toBe('critical');
    });

    it('should request analysis from each analyzer on its interval', async () => {
      harness = setup(['police_department', 'fire_department', 'water_department']);
      const { council, bus, clock } = harness;
      await council.start();
      await council.whenIdle();

      expect(bus.getHistory('doge').map(m => m.envelope.type)).toEqual(['department_analysis_request']);
      expect(bus.getHistory('doge_vsm')).toHaveLength(1);

      await clock.advance(270_000);
      expect(bus.getHistory('doge')).toHaveLength(1);

      await clock.advance(30_000);
      expect(bus.getHistory('doge')).toHaveLength(2);
    });

    it('should not request analysis with too few departments', async () => {
      harness = setup(['police_department', 'fire_department']);
      await harness.council.start();
      await harness.council.whenIdle();

      expect(harness.bus.getHistory('doge')).toEqual([]);
    });
  });
});
