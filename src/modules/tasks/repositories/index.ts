export * from './drizzle-tasks.repository'
export * from './tasks.repository'
