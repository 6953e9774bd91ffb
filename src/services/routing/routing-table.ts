/**
 * Routing Table
 *
 * Mapping from logical department name to the department that should receive
 * its work, built from change notifications. Edges are a set keyed by source,
 * so applying a notification again changes nothing. Resolution follows chains
 * of edges and stops at the first repeated department.
 */

import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import type { DepartmentChangeNotification } from '../../core/schemas.js';
import { FallbackEntry, Resolution, RoutingEntry } from '../../models/routing.js';
import { LiveDepartmentSet } from '../../models/types.js';

/**
 * What `apply` did with a notification
 */
export type ApplyOutcome = 'applied' | 'deferred' | 'duplicate';

interface Undo {
  table: 'edge' | 'fallback';
  key: string;
  previous: string | undefined;
}

interface PendingChange {
  change: DepartmentChangeNotification;
  effectiveAt: number;
}

/** Applied changes remembered for revert and duplicate detection */
export const DEFAULT_HISTORY_LIMIT = 500;

/**
 * Only the most recent `historyLimit` applied changes can be reverted or
 * recognised as repeats.
 */
export class RoutingTable {
  private readonly edges = new Map<string, string>();
  private readonly fallbacks = new Map<string, string>();
  private readonly applied = new Map<string, Undo[]>();
  private pending: PendingChange[] = [];
  private readonly log: Logger;

  constructor(
    private live: LiveDepartmentSet,
    private readonly clock: Clock,
    logger: Logger = rootLogger,
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT
  ) {
    this.log = logger.child('routing');
  }

  setLiveSet(live: LiveDepartmentSet): void {
    this.live = live;
  }

  /**
   * Merge a change notification. A notification that takes effect later is held
   * until `applyDue` runs after its effective date.
   */
  apply(change: DepartmentChangeNotification): ApplyOutcome {
    if (this.applied.has(change.change_id) || this.pending.some(p => p.change.change_id === change.change_id)) {
      return 'duplicate';
    }

    const effectiveAt = change.effective_date ? Date.parse(change.effective_date) : NaN;
    if (!change.effective_immediately && Number.isFinite(effectiveAt) && effectiveAt > this.clock.now()) {
      this.pending.push({ change, effectiveAt });
      this.log.info(`Holding ${change.change_type} change until ${change.effective_date}`, {
        changeId: change.change_id
      });
      return 'deferred';
    }

    this.merge(change);
    return 'applied';
  }

  /**
   * Apply held notifications whose effective date has passed, returning them in the order applied
   */
  applyDue(): DepartmentChangeNotification[] {
    const now = this.clock.now();
    const due = this.pending.filter(p => p.effectiveAt <= now).sort((a, b) => a.effectiveAt - b.effectiveAt);
    this.pending = this.pending.filter(p => p.effectiveAt > now);

    for (const { change } of due) {
      this.merge(change);
    }
    return due.map(p => p.change);
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Undo the edges and fallbacks a notification introduced
   */
  revert(changeId: string): boolean {
    const pendingIndex = this.pending.findIndex(p => p.change.change_id === changeId);
    if (pendingIndex >= 0) {
      this.pending.splice(pendingIndex, 1);
      return true;
    }

    const undo = this.applied.get(changeId);
    if (!undo) {
      return false;
    }

    for (const step of [...undo].reverse()) {
      const table = step.table === 'edge' ? this.edges : this.fallbacks;
      if (step.previous === undefined) {
        table.delete(step.key);
      } else {
        table.set(step.key, step.previous);
      }
    }
    this.applied.delete(changeId);
    this.log.info('Reverted routing change', { changeId });
    return true;
  }

  resolve(name: string): string {
    return this.resolveDetailed(name).resolved;
  }

  /**
   * Follow edges from `name`. On a cycle the last department reached before
   * re-entering it is the result. A dead result is replaced by the fallback of
   * the requested name, or failing that of the resolved name.
   */
  resolveDetailed(name: string): Resolution {
    const visited = new Set<string>();
    const path = [name];
    let current = name;
    let previous = name;
    let cycleDetected = false;

    for (;;) {
      const next = this.edges.get(current);
      if (next === undefined) {
        break;
      }
      if (visited.has(current)) {
        cycleDetected = true;
        break;
      }
      visited.add(current);
      previous = current;
      current = next;
      path.push(current);
    }

    let resolved = cycleDetected ? previous : current;
    if (cycleDetected) {
      this.log.warn(`Routing cycle detected for ${name}`, { path, resolved });
    }

    let usedFallback = false;
    if (!this.live.has(resolved)) {
      const fallback = this.fallbacks.get(name) ?? this.fallbacks.get(resolved);
      if (fallback !== undefined) {
        resolved = fallback;
        usedFallback = true;
      }
    }

    return { requested: name, resolved, path, cycleDetected, usedFallback };
  }

  /**
   * Direct successor of a department, if any
   */
  targetOf(name: string): string | undefined {
    return this.edges.get(name);
  }

  fallbackOf(name: string): string | undefined {
    return this.fallbacks.get(name);
  }

  entries(): RoutingEntry[] {
    return [...this.edges].map(([source, target]) => ({ source, target }));
  }

  fallbackEntries(): FallbackEntry[] {
    return [...this.fallbacks].map(([name, fallback]) => ({ name, fallback }));
  }

  private merge(change: DepartmentChangeNotification): void {
    const undo: Undo[] = [];
    const setEdge = (source: string, target: string | undefined) => {
      undo.push({ table: 'edge', key: source, previous: this.edges.get(source) });
      if (target === undefined) {
        this.edges.delete(source);
      } else {
        this.edges.set(source, target);
      }
    };
    const setFallback = (name: string, fallback: string) => {
      undo.push({ table: 'fallback', key: name, previous: this.fallbacks.get(name) });
      this.fallbacks.set(name, fallback);
    };

    // The new department receives work itself from now on
    if (change.new_department && (change.change_type === 'created' || change.change_type === 'consolidated')) {
      if (this.edges.has(change.new_department)) {
        setEdge(change.new_department, undefined);
      }
    }

    for (const [source, target] of Object.entries(change.routing_changes)) {
      if (source === target) {
        continue;
      }
      setEdge(source, target);

      if (change.change_type === 'renamed') {
        for (const [other, otherTarget] of [...this.edges]) {
          if (otherTarget === source && other !== source) {
            setEdge(other, other === target ? undefined : target);
          }
        }
      }
    }

    if (change.fallback_department) {
      if (change.change_type === 'consolidated' && change.new_department) {
        setFallback(change.new_department, change.fallback_department);
      } else if (change.change_type === 'terminated') {
        for (const name of change.affected_departments) {
          setFallback(name, change.fallback_department);
        }
      }
    }

    this.applied.set(change.change_id, undo);
    for (const changeId of this.applied.keys()) {
      if (this.applied.size <= this.historyLimit) break;
      this.applied.delete(changeId);
    }
    this.log.info(`Applied ${change.change_type} change`, {
      changeId: change.change_id,
      affected: change.affected_departments,
      newDepartment: change.new_department
    });
  }
}
