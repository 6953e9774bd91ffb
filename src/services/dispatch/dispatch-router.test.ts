/**
 * Tests for call routing in the dispatch center
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DispatchRouter } from './dispatch-router.js';
import { MemoryBus } from '../bus/memory-bus.js';
import { createEnvelope } from '../bus/message-bus.js';
import { ManualClock, settle } from '../../core/clock.js';
import { UndeliverableError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';
import {
  DispatchOrderSchema,
  EmergencyCallSchema,
  HealthStatusReplySchema,
  ServiceRequestSchema
} from '../../core/schemas.js';
import type { DepartmentAnnouncement, DepartmentChangeNotification } from '../../core/schemas.js';

const CENTER = 'emergency_dispatch_center';
const HOUR_MS = 60 * 60 * 1000;

function call(fields: Record<string, unknown>) {
  return EmergencyCallSchema.parse({ caller_location: '12 Oak St', description: 'Caller needs help', ...fields });
}

function change(fields: Partial<DepartmentChangeNotification> & Pick<DepartmentChangeNotification, 'change_id' | 'change_type' | 'affected_departments'>): DepartmentChangeNotification {
  return {
    routing_changes: {},
    capabilities_mapping: {},
    emergency_types_affected: [],
    effective_immediately: true,
    initiated_by: 'city_council',
    change_timestamp: '2024-01-15T09:30:00.000Z',
    rollback_available: false,
    ...fields
  };
}

describe('DispatchRouter', () => {
  let clock: ManualClock;
  let bus: MemoryBus;
  let router: DispatchRouter;
  let lines: string[];

  async function broadcast(notification: DepartmentChangeNotification): Promise<void> {
    await bus.publish('broadcast', createEnvelope('department_change_notification', 'city_council', 'broadcast', notification));
  }

  /**
   * Council stand-in that answers every service request with an announcement
   */
  async function councilAnswers(status: DepartmentAnnouncement['status']): Promise<void> {
    await bus.subscribe('city_council', async envelope => {
      if (envelope.type !== 'service_request') return;
      const request = ServiceRequestSchema.parse(envelope.payload);
      const announcement: DepartmentAnnouncement = {
        department_name: request.details.department_needed ?? 'unknown_department',
        status,
        process_id: status === 'launched' ? 4242 : undefined,
        description: status === 'failed' ? 'Department process could not be launched' : undefined
      };
      await bus.publish('broadcast', createEnvelope('department_announcement', 'city_council', 'broadcast', announcement));
    });
  }

  function ordersFor(department: string) {
    return bus.getHistory(department)
      .filter(m => m.envelope.type === 'dispatch_order')
      .map(m => DispatchOrderSchema.parse(m.envelope.payload));
  }

  beforeEach(async () => {
    lines = [];
    const logger = new Logger({ level: LogLevel.DEBUG, sink: (_level, line) => lines.push(line) });
    clock = new ManualClock();
    bus = new MemoryBus(logger);
    router = new DispatchRouter(bus, clock, {
      name: CENTER,
      council: 'city_council',
      serviceWaitMs: 30_000,
      defaultDepartment: 'police_department'
    }, logger);
    await router.start(['police_department', 'fire_department']);
  });

  afterEach(async () => {
    await router.stop();
  });

  describe('route', () => {
    it('should forward a call to the live department it needs', async () => {
      const result = await router.route(call({ emergency_type: 'fire' }));

      expect(result).toEqual({
        callId: '911-20240115-093000-0001',
        outcome: 'dispatched',
        departments: ['fire_department'],
        required: ['fire_department'],
        unavailable: []
      });

      const orders = ordersFor('fire_department');
      expect(orders).toHaveLength(1);
      expect(orders[0]).toMatchObject({
        call_id: '911-20240115-093000-0001',
        department: 'fire_department',
        requested_as: 'fire_department',
        dispatched_by: CENTER,
        caller_location: '12 Oak St'
      });
    });

    it('should number calls and stamp them with the current time', async () => {
      await router.route(call({ emergency_type: 'fire' }));
      await clock.advance(61_000);
      const second = await router.route(call({ emergency_type: 'crime' }));

      expect(second.callId).toBe('911-20240115-093101-0002');
      expect(router.getCallCount()).toBe(2);
    });

    it('should keep a call id supplied with the call', async () => {
      const result = await router.route(call({ emergency_type: 'fire', call_id: 'external-7' }));
      expect(result.callId).toBe('external-7');
    });

    it('should dispatch to every department a call needs and count them', async () => {
      await router.route(call({ emergency_type: 'crime', injuries_reported: true }));
      await router.route(call({ emergency_type: 'fire' }));

      expect(router.getStats()).toEqual({ police_department: 1, fire_department: 2 });
    });

    it('should follow routing changes announced by the council', async () => {
      await broadcast(change({
        change_id: 'merge-1',
        change_type: 'consolidated',
        affected_departments: ['police_department', 'fire_department'],
        new_department: 'public_safety_department',
        routing_changes: { police_department: 'public_safety_department', fire_department: 'public_safety_department' }
      }));

      const result = await router.route(call({ emergency_type: 'fire', weapons_involved: true }));

      expect(result.departments).toEqual(['public_safety_department']);
      expect(ordersFor('public_safety_department')[0].requested_as).toBe('fire_department');
      expect(router.departments()).toEqual(['public_safety_department']);
    });

    it('should ignore a notification it has already applied', async () => {
      const terminated = change({
        change_id: 'term-1',
        change_type: 'terminated',
        affected_departments: ['fire_department'],
        routing_changes: { fire_department: 'police_department' },
        fallback_department: 'police_department'
      });
      await broadcast(terminated);
      await broadcast(terminated);

      expect(lines.filter(line => line.includes('Department change: terminated'))).toHaveLength(1);
      expect(lines).toContain('[city:dispatch] [DEBUG] Ignoring repeated change notification {"changeId":"term-1"}');

      const result = await router.route(call({ emergency_type: 'fire' }));
      expect(result.departments).toEqual(['police_department']);
    });

    it('should hold a change until it takes effect', async () => {
      await broadcast(change({
        change_id: 'term-later',
        change_type: 'terminated',
        affected_departments: ['fire_department'],
        routing_changes: { fire_department: 'police_department' },
        effective_immediately: false,
        effective_date: '2024-01-15T10:30:00.000Z'
      }));

      expect((await router.route(call({ emergency_type: 'fire' }))).departments).toEqual(['fire_department']);

      await clock.advance(HOUR_MS);
      expect((await router.route(call({ emergency_type: 'fire' }))).departments).toEqual(['police_department']);
      expect(router.has('fire_department')).toBe(false);
    });
  });

  describe('missing departments', () => {
    it('should request a missing department and dispatch once it is launched', async () => {
      await councilAnswers('launched');

      const result = await router.route(call({ emergency_type: 'animal_emergency', description: 'Dog loose' }));

      expect(result.outcome).toBe('dispatched');
      expect(result.departments).toEqual(['animal_control_department']);
      expect(router.has('animal_control_department')).toBe(true);

      const requests = bus.getHistory('city_council').map(m => ServiceRequestSchema.parse(m.envelope.payload));
      expect(requests).toHaveLength(1);
      expect(requests[0]).toMatchObject({
        requesting_service: CENTER,
        emergency_type: 'animal_emergency',
        description: 'Need animal control department to handle: Dog loose',
        urgency: 'high',
        original_call_id: '911-20240115-093000-0001',
        details: {
          department_needed: 'animal_control_department',
          reason: '911 emergency requiring animal control department'
        }
      });
    });

    it('should fall back to the default department when the wait times out', async () => {
      const pending = router.route(call({ emergency_type: 'water_emergency', severity: 'medium' }));
      await settle();

      expect(router.awaiting()).toEqual(['water_department']);
      const request = ServiceRequestSchema.parse(bus.getHistory('city_council')[0].envelope.payload);
      expect(request.urgency).toBe('normal');

      await clock.advance(30_000);
      const result = await pending;

      expect(result.outcome).toBe('partial');
      expect(result.departments).toEqual(['police_department']);
      expect(result.unavailable).toEqual(['water_department']);
      expect(router.awaiting()).toEqual([]);
    });

    it('should not wait once the council reports the department failed', async () => {
      await councilAnswers('failed');

      const result = await router.route(call({ emergency_type: 'sanitation_emergency' }));

      expect(result).toMatchObject({ outcome: 'partial', departments: ['police_department'], unavailable: ['sanitation_department'] });
      expect(lines).toContain(
        '[city:dispatch] [ERROR] Council could not provide sanitation_department {"description":"Department process could not be launched"}'
      );
    });

    it('should request a department once for concurrent calls', async () => {
      const first = router.route(call({ emergency_type: 'parks_emergency' }));
      const second = router.route(call({ emergency_type: 'parks_emergency' }));
      await settle();

      expect(bus.getHistory('city_council')).toHaveLength(1);

      await bus.publish('broadcast', createEnvelope('department_announcement', 'city_council', 'broadcast', {
        department_name: 'parks_department',
        status: 'active'
      }));

      expect((await first).departments).toEqual(['parks_department']);
      expect((await second).departments).toEqual(['parks_department']);
    });

    it('should report a call no live department can take as undeliverable', async () => {
      await router.stop();
      router = new DispatchRouter(bus, clock, {
        name: CENTER,
        council: 'city_council',
        serviceWaitMs: 30_000,
        defaultDepartment: 'police_department'
      }, new Logger({ level: LogLevel.SILENT }));
      await router.start([]);

      const pending = router.route(call({ emergency_type: 'crime' })).catch((error: unknown) => error);
      await settle();
      await clock.advance(30_000);
      const error = await pending;

      expect(error).toBeInstanceOf(UndeliverableError);
      expect(error).toMatchObject({ callId: '911-20240115-093000-0001', departments: ['police_department'] });
    });

    it('should release waiting calls on stop', async () => {
      const pending = router.route(call({ emergency_type: 'transportation_emergency' }));
      await settle();

      await router.stop();
      const result = await pending;

      expect(result.outcome).toBe('partial');
      expect(result.departments).toEqual(['police_department']);
    });
  });

  describe('bus', () => {
    it('should route emergency calls published to its channel', async () => {
      await bus.publish(CENTER, createEnvelope('emergency_call', 'caller', CENTER, {
        caller_location: '9 Elm St',
        emergency_type: 'fire',
        description: 'Kitchen fire'
      }));
      await settle();

      expect(ordersFor('fire_department').map(o => o.description)).toEqual(['Kitchen fire']);
    });

    it('should log undeliverable calls instead of failing', async () => {
      await broadcast(change({
        change_id: 'term-police',
        change_type: 'terminated',
        affected_departments: ['police_department'],
        routing_changes: {}
      }));

      await bus.publish(CENTER, createEnvelope('emergency_call', 'caller', CENTER, {
        call_id: 'call-1',
        caller_location: '9 Elm St',
        emergency_type: 'crime'
      }));
      await settle();
      await clock.advance(30_000);

      expect(lines).toContain(
        '[city:dispatch] [ERROR] Call call-1 is undeliverable: no live department among police_department {"callId":"call-1","departments":["police_department"]}'
      );
    });

    it('should answer health checks', async () => {
      await bus.publish(CENTER, createEnvelope('health_check', 'city_council', CENTER, {
        check_id: 'check-1',
        from: 'city_council',
        to: CENTER
      }));

      const reply = HealthStatusReplySchema.parse(bus.getHistory('city_council')[0].envelope.payload);
      expect(reply).toMatchObject({ check_id: 'check-1', service_name: CENTER, status: 'healthy', message_count: 1 });
    });
  });
});
