// Stand-in department programs for `city run --simulate`

import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { DispatchOrderSchema, HealthCheckRequestSchema } from '../../core/schemas.js';
import type { HealthStatusReply } from '../../core/schemas.js';
import { ProcessHandle } from '../../models/department.js';
import { MessageBus, Unsubscribe, createEnvelope } from '../bus/message-bus.js';
import { MessageRouter } from '../bus/message-router.js';
import { InMemoryProcessLauncher } from './in-memory-launcher.js';
import { ProcessLauncher } from './process-launcher.js';

/**
 * Answers health checks as healthy and acknowledges dispatch orders
 */
export class SimulatedDepartment {
  private readonly router: MessageRouter;
  private readonly log: Logger;
  private unsubscribe: Unsubscribe | null = null;
  private handled = 0;
  private readonly startedAt: number;

  constructor(
    readonly name: string,
    private readonly bus: MessageBus,
    private readonly clock: Clock,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child(name);
    this.startedAt = clock.now();
    this.router = new MessageRouter(name, logger)
      .on('health_check', HealthCheckRequestSchema, async (request, envelope) => {
        const reply: HealthStatusReply = {
          check_id: request.check_id,
          service_name: this.name,
          status: 'healthy',
          uptime_seconds: (this.clock.now() - this.startedAt) / 1000,
          message_count: this.handled
        };
        await this.bus.publish(envelope.from,
          createEnvelope('health_status', this.name, envelope.from, reply, new Date(this.clock.now())));
      })
      .on('dispatch_order', DispatchOrderSchema, order => {
        this.log.info(`Responding to ${order.call_id}: ${order.emergency_type} at ${order.caller_location}`);
      });
  }

  async start(): Promise<void> {
    this.unsubscribe = await this.bus.subscribe(this.name, envelope => {
      this.handled++;
      return this.router.dispatch(envelope).then(() => undefined);
    });
  }

  async stop(): Promise<void> {
    if (this.unsubscribe) {
      await this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  isListening(): boolean {
    return this.unsubscribe !== null;
  }
}

/**
 * Simulated processes that come with a simulated department on the bus
 */
export class SimulatedLauncher implements ProcessLauncher {
  private readonly departments = new Map<number, SimulatedDepartment>();
  private readonly log: Logger;

  constructor(
    private readonly processes: InMemoryProcessLauncher,
    private readonly bus: MessageBus,
    private readonly clock: Clock,
    private readonly logger: Logger = rootLogger
  ) {
    this.log = logger.child('simulator');
  }

  async spawn(name: string): Promise<ProcessHandle> {
    const handle = await this.processes.spawn(name);
    const department = new SimulatedDepartment(name, this.bus, this.clock, this.logger);
    await department.start();
    this.departments.set(handle.pid, department);
    return handle;
  }

  isAlive(handle: ProcessHandle): boolean {
    return this.processes.isAlive(handle);
  }

  terminate(handle: ProcessHandle): void {
    this.processes.terminate(handle);

    const department = this.departments.get(handle.pid);
    if (department) {
      this.departments.delete(handle.pid);
      void department.stop().catch(error => {
        this.log.exception(error, { department: handle.name, pid: handle.pid });
      });
    }
  }

  /**
   * Simulated departments currently on the bus
   */
  running(): string[] {
    return [...this.departments.values()].map(d => d.name).sort();
  }
}
