/**
 * Registry Scanner
 *
 * Enumerates the department identities that are currently deployable. A
 * department is known by its template (`*_department.yml`, `*_department.yaml`)
 * or its program (`*_department.js`); the generic program that runs templates
 * is not itself a department.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { ValidationError } from '../../core/errors.js';
import { validateDepartmentName } from '../../core/validation.js';

/**
 * Supplies the raw list of department names
 */
export interface DepartmentSource {
  list(): Promise<string[]>;
  describe(): string;
}

const DEPARTMENT_FILE = /^(.+_department)\.(ya?ml|js)$/;
const GENERIC_PROGRAM = 'generic_department';

/**
 * Reads department templates and programs from one directory
 */
export class DirectoryDepartmentSource implements DepartmentSource {
  constructor(private readonly directory: string) {}

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const names: string[] = [];
    for (const entry of entries) {
      const match = DEPARTMENT_FILE.exec(entry);
      if (match && match[1] !== GENERIC_PROGRAM) {
        names.push(match[1]);
      }
    }
    return names;
  }

  describe(): string {
    return path.resolve(this.directory);
  }
}

/**
 * Fixed list, for simulations and tests
 */
export class StaticDepartmentSource implements DepartmentSource {
  private names: string[];

  constructor(names: string[]) {
    this.names = [...names];
  }

  set(names: string[]): void {
    this.names = [...names];
  }

  async list(): Promise<string[]> {
    return [...this.names];
  }

  describe(): string {
    return 'static list';
  }
}

/**
 * Outcome of one scan compared with the previous one
 */
export interface ScanResult {
  departments: string[];
  added: string[];
  removed: string[];
}

export class RegistryScanner {
  private known = new Set<string>();
  private readonly log: Logger;

  constructor(private readonly source: DepartmentSource, logger: Logger = rootLogger) {
    this.log = logger.child('registry');
  }

  /**
   * Current department names, sorted and de-duplicated. Invalid names are skipped.
   */
  async scan(): Promise<ScanResult> {
    const raw = await this.source.list();
    const valid = new Set<string>();

    for (const name of raw) {
      try {
        valid.add(validateDepartmentName(name));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.log.warn('Skipping invalid department name', { name, reason: error.message });
      }
    }

    const departments = [...valid].sort();
    const added = departments.filter(name => !this.known.has(name));
    const removed = [...this.known].filter(name => !valid.has(name)).sort();

    this.known = valid;

    if (added.length > 0 || removed.length > 0) {
      this.log.debug('Registry changed', { source: this.source.describe(), added, removed });
    }

    return { departments, added, removed };
  }

  /**
   * Names seen by the most recent scan
   */
  getKnown(): string[] {
    return [...this.known].sort();
  }
}
