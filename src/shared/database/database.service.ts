import {
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
  ServiceUnavailableException,
} from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { sql } from 'drizzle-orm'
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'

import * as schema from './schema'

export type Database = NodePgDatabase<typeof schema>

/**
 * Database Service
 *
 * Owns the PostgreSQL pool and the drizzle instance on top of it.
 * Disabled unless DATABASE_ENABLED=true and DATABASE_URL is set; any query
 * attempted while disabled answers 503.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseService.name)
  private readonly pool: Pool | null
  private readonly database: Database | null

  constructor(configService: ConfigService) {
    const enabled = configService.get<boolean>('config.database.enabled') ?? false
    const url = configService.get<string>('config.database.url')

    this.pool = enabled && url ? new Pool({ connectionString: url }) : null
    this.database = this.pool ? drizzle(this.pool, { schema }) : null

    this.pool?.on('error', (error) => {
      this.logger.error('Idle database client error', error)
    })
  }

  isEnabled(): boolean {
    return this.database !== null
  }

  get db(): Database {
    if (!this.database) {
      throw new ServiceUnavailableException('Database is not enabled')
    }
    return this.database
  }

  async onModuleInit(): Promise<void> {
    if (!this.database) {
      this.logger.log('Database disabled, skipping connection')
      return
    }

    try {
      await this.ensureSchema(this.database)
      this.logger.log('Successfully connected to database')
    } catch (error) {
      this.logger.error('Failed to connect to database', error)
      throw error
    }
  }

  // After onModuleDestroy, so the queue consumer has drained its last batch
  async onApplicationShutdown(): Promise<void> {
    if (!this.pool) {
      return
    }

    try {
      await this.pool.end()
      this.logger.log('Disconnected from database')
    } catch (error) {
      this.logger.error('Error disconnecting from database', error)
    }
  }

  /**
   * Health check method to verify database connectivity
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`)
      return true
    } catch (error) {
      this.logger.error('Database health check failed', error)
      return false
    }
  }

  private async ensureSchema(database: Database): Promise<void> {
    await database.execute(sql`
      CREATE TABLE IF NOT EXISTS tasks (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        title text NOT NULL,
        description text,
        status text NOT NULL DEFAULT 'PENDING',
        priority integer NOT NULL DEFAULT 0,
        image_url text,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now()
      )
    `)
  }
}
