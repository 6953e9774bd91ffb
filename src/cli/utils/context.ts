// Configuration and wiring shared by the commands

import * as path from 'path';
import { ConfigService, CityConfig } from '../../services/config/config-service.js';
import { DispatchRouterOptions } from '../../services/dispatch/dispatch-router.js';

/**
 * Load `.city/config.yaml` under the base path
 */
export function loadConfig(basePath: string): Promise<CityConfig> {
  return new ConfigService({ baseDir: path.join(basePath, '.city') }).load();
}

/**
 * Directory holding the department templates and programs
 */
export function departmentsDirectory(basePath: string, config: CityConfig): string {
  return path.resolve(basePath, config.departments.directory);
}

export function dispatchOptions(config: CityConfig): DispatchRouterOptions {
  return {
    name: config.dispatch.name,
    council: config.council.name,
    serviceWaitMs: config.dispatch.serviceWaitMs,
    defaultDepartment: config.dispatch.defaultDepartment
  };
}
