import type { Task, TaskHandler } from './types.js';

/**
 * Ordered, append-only list of tasks. Later tasks see the committed edits of
 * earlier ones.
 */
export class TaskRegistry {
  private readonly tasks: Task[] = [];

  register(handler: TaskHandler, pattern?: string): this {
    const task: Task = { name: handler.name || 'anonymous', handler };
    if (pattern) {
      task.pattern = pattern;
    }
    this.tasks.push(task);
    return this;
  }

  all(): readonly Task[] {
    return [...this.tasks];
  }

  get size(): number {
    return this.tasks.length;
  }
}
