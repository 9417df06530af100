import type { NewTask, Task, TaskStatus } from '../../../shared/database'

export interface TaskFilter {
  status?: TaskStatus
  minPriority?: number
}

export type TaskChanges = Partial<
  Pick<Task, 'title' | 'description' | 'status' | 'priority' | 'imageUrl'>
>

/**
 * Persistence boundary for tasks.
 *
 * Injected by class token; the production binding is
 * DrizzleTasksRepository.
 */
export abstract class TasksRepository {
  abstract create(data: NewTask): Promise<Task>

  /** Highest priority first, then newest first */
  abstract findMany(filter: TaskFilter): Promise<Task[]>

  abstract findById(id: string): Promise<Task | null>

  /** @returns null when no task has this id */
  abstract update(id: string, changes: TaskChanges): Promise<Task | null>

  /** @returns the deleted task, or null when no task has this id */
  abstract delete(id: string): Promise<Task | null>
}
