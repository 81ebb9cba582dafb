import { ConfigurationError, CycleError, UnknownDependencyError } from "../errors.js";
import { INPUTS_ROOT } from "./template.js";
import type { TaskSpec, TaskStatus } from "./types.js";

export type StatusOf = (taskId: string) => TaskStatus;

/** Map each task id to the ids of the tasks that depend on it. */
export function dependentsIndex(tasks: readonly TaskSpec[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/**
 * Validate a task graph: reserved and duplicate ids, unknown dependencies,
 * then cycles. Throws before anything runs.
 */
export function validateGraph(tasks: readonly TaskSpec[]): void {
  const ids = new Set<string>();
  const duplicates: string[] = [];
  for (const task of tasks) {
    if (task.id === INPUTS_ROOT) {
      // {{inputs.*}} always resolves to the run inputs
      throw new ConfigurationError("RESERVED_ID", `Task id "${INPUTS_ROOT}" is reserved for run inputs`);
    }
    if (ids.has(task.id)) duplicates.push(task.id);
    ids.add(task.id);
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError(
      "DUPLICATE_ID",
      "Duplicate task ids",
      duplicates.map((id) => `"${id}"`),
    );
  }

  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (!ids.has(dep)) throw new UnknownDependencyError(task.id, dep);
    }
  }

  const cycle = findCycle(tasks);
  if (cycle) throw new CycleError(cycle);
}

/** Detect a cycle using DFS with coloring. Returns the cycle path, first node repeated at the end. */
export function findCycle(tasks: readonly TaskSpec[]): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  const color = new Map<string, number>();
  for (const task of tasks) color.set(task.id, WHITE);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of taskMap.get(id)?.dependsOn ?? []) {
      const c = color.get(dep);
      if (c === GRAY) {
        // back edge: the cycle is the stack segment starting at dep
        return [...stack.slice(stack.indexOf(dep)), dep].reverse();
      }
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const task of tasks) {
    if (color.get(task.id) === WHITE) {
      const found = dfs(task.id);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Return tasks in topological order (dependencies first). Among tasks that
 * are ready at the same time, declaration order wins, so a chain keeps its
 * declared order.
 */
export function topologicalOrder(tasks: readonly TaskSpec[]): TaskSpec[] {
  const placed = new Set<string>();
  const remaining = [...tasks];
  const sorted: TaskSpec[] = [];

  while (remaining.length > 0) {
    const idx = remaining.findIndex((t) => t.dependsOn.every((d) => placed.has(d)));
    if (idx === -1) {
      throw new CycleError(findCycle(remaining) ?? remaining.map((t) => t.id));
    }
    const [next] = remaining.splice(idx, 1);
    placed.add(next.id);
    sorted.push(next);
  }

  return sorted;
}

/** Whether a dependency in this state lets `task` start. */
export function dependencySatisfied(task: TaskSpec, status: TaskStatus): boolean {
  return status === "succeeded" || (status === "skipped" && task.tolerateSkipped === true);
}

/** Get pending tasks whose dependencies are all terminal and satisfied. */
export function readyTasks(tasks: readonly TaskSpec[], statusOf: StatusOf): TaskSpec[] {
  return tasks.filter(
    (t) => statusOf(t.id) === "pending" && t.dependsOn.every((d) => dependencySatisfied(t, statusOf(d))),
  );
}

/**
 * Ids of pending tasks that can no longer run because `failedId` failed:
 * its direct dependents, then dependents of those, except tasks that
 * tolerate skipped dependencies.
 */
export function skipDownstream(tasks: readonly TaskSpec[], statusOf: StatusOf, failedId: string): string[] {
  const dependents = dependentsIndex(tasks);
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  const skipped: string[] = [];
  const visited = new Set<string>();
  const queue = [...(dependents.get(failedId) ?? [])];
  const direct = new Set(queue);

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    const task = taskMap.get(id);
    if (!task || statusOf(id) !== "pending") continue;
    if (!direct.has(id) && task.tolerateSkipped) continue;
    skipped.push(id);
    for (const next of dependents.get(id) ?? []) {
      queue.push(next);
    }
  }

  return skipped;
}
