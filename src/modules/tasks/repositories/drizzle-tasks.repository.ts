import { Injectable } from '@nestjs/common'
import { and, desc, eq, gte, type SQL } from 'drizzle-orm'

import { DatabaseService, type NewTask, type Task, tasks } from '../../../shared/database'
import { type TaskChanges, type TaskFilter, TasksRepository } from './tasks.repository'

@Injectable()
export class DrizzleTasksRepository extends TasksRepository {
  constructor(private readonly database: DatabaseService) {
    super()
  }

  async create(data: NewTask): Promise<Task> {
    const [task] = await this.database.db.insert(tasks).values(data).returning()
    return task
  }

  async findMany(filter: TaskFilter): Promise<Task[]> {
    const conditions: SQL[] = []

    if (filter.status) {
      conditions.push(eq(tasks.status, filter.status))
    }
    if (filter.minPriority !== undefined) {
      conditions.push(gte(tasks.priority, filter.minPriority))
    }

    return this.database.db
      .select()
      .from(tasks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(tasks.priority), desc(tasks.createdAt))
  }

  async findById(id: string): Promise<Task | null> {
    const [task] = await this.database.db.select().from(tasks).where(eq(tasks.id, id)).limit(1)
    return task ?? null
  }

  async update(id: string, changes: TaskChanges): Promise<Task | null> {
    const [task] = await this.database.db
      .update(tasks)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(tasks.id, id))
      .returning()
    return task ?? null
  }

  async delete(id: string): Promise<Task | null> {
    const [task] = await this.database.db.delete(tasks).where(eq(tasks.id, id)).returning()
    return task ?? null
  }
}
