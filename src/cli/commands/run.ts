// Run command - Start the city council

import { Command } from 'commander';
import { SystemClock } from '../../core/clock.js';
import { logger } from '../../core/logger.js';
import { createMessageBus } from '../../services/bus/bus-factory.js';
import { OrchestratorLoop } from '../../services/council/orchestrator-loop.js';
import { DispatchRouter } from '../../services/dispatch/dispatch-router.js';
import { InMemoryProcessLauncher } from '../../services/process/in-memory-launcher.js';
import { ChildProcessLauncher, ProcessLauncher } from '../../services/process/process-launcher.js';
import { SimulatedLauncher } from '../../services/process/simulated-department.js';
import { DirectoryDepartmentSource, RegistryScanner } from '../../services/registry/registry-scanner.js';
import { departmentsDirectory, dispatchOptions, loadConfig } from '../utils/context.js';
import { report, withErrorHandling } from '../utils/error-handler.js';
import { waitForShutdown } from '../utils/shutdown.js';

interface RunOptions {
  path: string;
  simulate?: boolean;
  dispatch?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Start the city council: supervise departments and decide recommendations')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .option('--simulate', 'Simulate department processes instead of launching programs')
    .option('--dispatch', 'Also run the dispatch center in this process')
    .action(withErrorHandling(async (options: RunOptions) => {
      const config = await loadConfig(options.path);
      const clock = new SystemClock();
      const bus = createMessageBus(config.bus, logger);
      const directory = departmentsDirectory(options.path, config);

      const launcher: ProcessLauncher = options.simulate
        ? new SimulatedLauncher(new InMemoryProcessLauncher(clock), bus, clock, logger)
        : new ChildProcessLauncher({
          command: config.departments.command,
          args: config.departments.args,
          cwd: directory,
          clock
        });

      const council = new OrchestratorLoop({
        bus,
        launcher,
        registry: new RegistryScanner(new DirectoryDepartmentSource(directory), logger),
        clock,
        config,
        logger
      });
      const dispatch = options.dispatch ? new DispatchRouter(bus, clock, dispatchOptions(config), logger) : null;

      await council.start();
      if (dispatch) {
        await dispatch.start(council.liveDepartments());
      }

      report('note', `${council.getName()} governing ${council.liveDepartments().length} departments. Press Ctrl+C to stop.`);
      const signal = await waitForShutdown();
      report('note', `Received ${signal}, shutting down`);

      if (dispatch) {
        await dispatch.stop();
      }
      await council.stop();
      await bus.close();
    }));
}
