import type { SubTaskPart } from "@agentline/shared";
import { errorMessage } from "../errors/SessionErrors.js";
import {
  blockSubTask,
  completeSubTask,
  isSubTaskEligible,
  startSubTask,
} from "../model/Parts.js";

export type SubTaskExecutor = (task: SubTaskPart) => Promise<string>;

export interface SubTaskScheduleOptions {
  maxConcurrent?: number;
  onUpdate?: (task: SubTaskPart) => Promise<void> | void;
}

/** Ids of pending tasks that sit on a dependency cycle. */
export const findCyclicSubTasks = (tasks: Map<string, SubTaskPart>): Set<string> => {
  const cyclic = new Set<string>();
  const state = new Map<string, "visiting" | "done">();

  const visit = (id: string, stack: string[]): void => {
    const mark = state.get(id);
    if (mark === "done") return;
    if (mark === "visiting") {
      for (const member of stack.slice(stack.indexOf(id))) cyclic.add(member);
      return;
    }
    state.set(id, "visiting");
    const task = tasks.get(id);
    for (const dependency of task?.dependsOn ?? []) {
      if (tasks.has(dependency)) visit(dependency, [...stack, id]);
    }
    state.set(id, "done");
  };

  for (const id of tasks.keys()) visit(id, []);
  return cyclic;
};

/**
 * Runs sub-tasks in dependency order. Tasks whose dependencies are all
 * completed run concurrently; a failed task is blocked, and so is everything
 * that depends on it.
 */
export class SubTaskScheduler {
  async run(
    subtasks: SubTaskPart[],
    execute: SubTaskExecutor,
    options: SubTaskScheduleOptions = {},
  ): Promise<SubTaskPart[]> {
    const maxConcurrent = Math.max(1, options.maxConcurrent ?? 4);
    const tasks = new Map<string, SubTaskPart>(subtasks.map((task) => [task.id, task]));
    const order = subtasks.map((task) => task.id);
    const running = new Map<string, Promise<void>>();

    const update = async (task: SubTaskPart): Promise<void> => {
      tasks.set(task.id, task);
      await options.onUpdate?.(task);
    };

    for (const task of subtasks) {
      if (task.status !== "pending") continue;
      const unknown = task.dependsOn.find((dependency) => !tasks.has(dependency));
      if (unknown) await update(blockSubTask(task, `Unknown dependency: ${unknown}`));
    }
    for (const id of findCyclicSubTasks(tasks)) {
      const task = tasks.get(id);
      if (task?.status === "pending") await update(blockSubTask(task, "Dependency cycle"));
    }

    const statusOf = (id: string) => tasks.get(id)?.status;

    const launch = (task: SubTaskPart): void => {
      const run = (async () => {
        const started = startSubTask(task);
        await update(started);
        try {
          const conclusion = await execute(started);
          await update(completeSubTask(started, conclusion));
        } catch (error) {
          await update(blockSubTask(started, errorMessage(error)));
        }
      })().finally(() => {
        running.delete(task.id);
      });
      running.set(task.id, run);
    };

    while (true) {
      const pending = order
        .map((id) => tasks.get(id))
        .filter((task): task is SubTaskPart => task?.status === "pending");

      for (const task of pending) {
        const failed = task.dependsOn.find((dependency) => {
          const status = statusOf(dependency);
          return status === "blocked" || status === "cancelled";
        });
        if (failed) await update(blockSubTask(task, `Dependency ${failed} is ${statusOf(failed)}`));
      }

      const eligible = order
        .map((id) => tasks.get(id))
        .filter(
          (task): task is SubTaskPart =>
            task?.status === "pending" && !running.has(task.id) && isSubTaskEligible(task, statusOf),
        );
      for (const task of eligible.slice(0, maxConcurrent - running.size)) {
        launch(task);
      }

      if (running.size === 0) {
        for (const id of order) {
          const task = tasks.get(id);
          if (task?.status === "pending") await update(blockSubTask(task, "Dependencies never completed"));
        }
        break;
      }
      await Promise.race(running.values());
    }

    return order.map((id) => tasks.get(id)).filter((task): task is SubTaskPart => task !== undefined);
  }
}
