// Departments command - List the departments in the registry

import { Command } from 'commander';
import { logger } from '../../core/logger.js';
import { ChildProcessLauncher } from '../../services/process/process-launcher.js';
import { DirectoryDepartmentSource, RegistryScanner } from '../../services/registry/registry-scanner.js';
import { departmentsDirectory, loadConfig } from '../utils/context.js';
import { report, withErrorHandling } from '../utils/error-handler.js';

interface DepartmentsOptions {
  path: string;
  json?: boolean;
}

export const departmentsCommand = new Command('departments')
  .description('List the departments found in the registry and how each is launched')
  .option('-p, --path <path>', 'Base path', process.cwd())
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(async (options: DepartmentsOptions) => {
    const config = await loadConfig(options.path);
    const directory = departmentsDirectory(options.path, config);
    const source = new DirectoryDepartmentSource(directory);
    const { departments } = await new RegistryScanner(source, logger).scan();

    const launcher = new ChildProcessLauncher({
      command: config.departments.command,
      args: config.departments.args,
      cwd: directory
    });
    const rows = departments.map(name => {
      const { command, args } = launcher.commandFor(name);
      return { name, command: [command, ...args].join(' ') };
    });

    if (options.json) {
      console.log(JSON.stringify(rows, null, 2)); // eslint-disable-line no-console
      return;
    }

    if (rows.length === 0) {
      report('note', `No departments found in ${source.describe()}`);
      return;
    }

    console.log(`\n${rows.length} departments in ${source.describe()}:\n`); // eslint-disable-line no-console
    const width = Math.max(...rows.map(row => row.name.length));
    for (const row of rows) {
      console.log(`  ${row.name.padEnd(width)}  ${row.command}`); // eslint-disable-line no-console
    }
    console.log(''); // eslint-disable-line no-console
  }));
