// Dispatch command - Run the dispatch center or route a single call

import { Command } from 'commander';
import { SystemClock } from '../../core/clock.js';
import { logger } from '../../core/logger.js';
import { EmergencyCallSchema } from '../../core/schemas.js';
import { parseMessage } from '../../core/validation.js';
import { createMessageBus } from '../../services/bus/bus-factory.js';
import { DispatchResult, DispatchRouter } from '../../services/dispatch/dispatch-router.js';
import { DirectoryDepartmentSource, RegistryScanner } from '../../services/registry/registry-scanner.js';
import { departmentsDirectory, dispatchOptions, loadConfig } from '../utils/context.js';
import { report, withErrorHandling } from '../utils/error-handler.js';
import { readStructuredFile } from '../utils/input.js';
import { waitForShutdown } from '../utils/shutdown.js';

interface DispatchCommandOptions {
  path: string;
  call?: string;
  json?: boolean;
}

function printResult(result: DispatchResult): void {
  report('done', `${result.callId} ${result.outcome}: ${result.departments.join(', ')}`);
  if (result.unavailable.length > 0) {
    report('warning', `Unavailable: ${result.unavailable.join(', ')}`);
  }
}

export const dispatchCommand = new Command('dispatch')
  .description('Run the dispatch center, or route one call with --call')
  .option('-p, --path <path>', 'Base path', process.cwd())
  .option('--call <file>', 'Route the emergency call in this YAML or JSON file and exit')
  .option('--json', 'Output the dispatch result as JSON')
  .action(withErrorHandling(async (options: DispatchCommandOptions) => {
    const config = await loadConfig(options.path);
    const clock = new SystemClock();
    const bus = createMessageBus(config.bus, logger);
    const registry = new RegistryScanner(
      new DirectoryDepartmentSource(departmentsDirectory(options.path, config)),
      logger
    );
    const { departments } = await registry.scan();

    const router = new DispatchRouter(bus, clock, dispatchOptions(config), logger);
    await router.start(departments);

    try {
      if (options.call) {
        const call = parseMessage(EmergencyCallSchema, 'emergency_call', await readStructuredFile(options.call));
        const result = await router.route(call);
        if (options.json) {
          console.log(JSON.stringify(result, null, 2)); // eslint-disable-line no-console
        } else {
          printResult(result);
        }
        return;
      }

      report('note', `${config.dispatch.name} listening with ${departments.length} departments. Press Ctrl+C to stop.`);
      const signal = await waitForShutdown();
      report('note', `Received ${signal}, shutting down`);
    } finally {
      await router.stop();
      await bus.close();
    }
  }));
