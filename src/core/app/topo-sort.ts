/**
 * Topological ordering of the package graph with deterministic cycle
 * reporting.
 */
import { CyclicDependencyError } from '../../utils/errors.js';
import type { Application } from './application.js';
import { compareImportPaths } from './graph.js';
import type { PackageId } from './types.js';

/**
 * Order `ids` so that every package follows its dependencies.
 *
 * Works in rounds over the unselected tail of the list: a package whose
 * dependencies are all selected is selected and swapped to the front of the
 * tail. Selection is visible to the rest of the same round. An input that
 * is already in dependency order comes back unchanged.
 *
 * Throws CyclicDependencyError when a round selects nothing.
 */
export function topologicalOrder(
  ids: readonly PackageId[],
  dependenciesOf: (id: PackageId) => readonly PackageId[],
  importPathOf: (id: PackageId) => string
): PackageId[] {
  const order = [...ids];
  const selected = new Set<PackageId>();
  let start = 0;

  while (start < order.length) {
    // n marks the first tail position that can take a selected package.
    let n = start;
    for (let i = start; i < order.length; i++) {
      const id = order[i];
      if (id === undefined) continue;
      if (!dependenciesOf(id).every(dep => selected.has(dep))) {
        continue;
      }
      selected.add(id);
      const displaced = order[n];
      if (displaced !== undefined) {
        order[i] = displaced;
      }
      order[n] = id;
      n++;
    }

    if (n === start) {
      const cycle = findCycle(order.slice(start), dependenciesOf, importPathOf);
      const paths = cycle.map(importPathOf);
      throw new CyclicDependencyError([...paths, paths[0] ?? '']);
    }
    start = n;
  }

  return order;
}

/**
 * Find a cycle among `remaining`, every one of which has at least one
 * dependency inside `remaining`.
 *
 * The walk starts at the lexicographically smallest import path and keeps
 * stepping to the first dependency that is still remaining, until a
 * dependency points back into the walk.
 */
export function findCycle(
  remaining: readonly PackageId[],
  dependenciesOf: (id: PackageId) => readonly PackageId[],
  importPathOf: (id: PackageId) => string
): PackageId[] {
  const pending = new Set(remaining);
  let min: PackageId | undefined;
  for (const id of remaining) {
    if (min === undefined || compareImportPaths(importPathOf(id), importPathOf(min)) < 0) {
      min = id;
    }
  }
  if (min === undefined) {
    return [];
  }

  const cycle: PackageId[] = [min];
  const seen = new Map<PackageId, number>([[min, 0]]);
  for (;;) {
    const last = cycle[cycle.length - 1] ?? min;
    const deps = dependenciesOf(last);

    for (const dep of deps) {
      const at = seen.get(dep);
      if (at !== undefined) {
        return cycle.slice(at);
      }
    }

    const next = deps.find(dep => pending.has(dep));
    if (next === undefined) {
      throw new Error(`package ${importPathOf(last)} is not part of a cycle`);
    }
    seen.set(next, cycle.length);
    cycle.push(next);
  }
}

/**
 * Sort the application's packages into build order in place.
 */
export function sortApplication(app: Application): void {
  const order = topologicalOrder(
    app.getOrder(),
    id => app.get(id).dependencies,
    id => app.get(id).importPath
  );
  app.setOrder(order);
}
