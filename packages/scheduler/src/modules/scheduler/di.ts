import { asFunction, asValue } from 'awilix'
import { MikroORM } from '@mikro-orm/postgresql'
import { createAppContainer, type AppContainer } from '@sqlcron/shared/lib/di/container'
import { describeDatabaseUrl } from '@sqlcron/shared/lib/db/connection'
import type { SchedulerConfig } from './config'
import {
  EntityManagerStatementExecutor,
  type SqlConnectionSource,
  type StatementExecutor,
} from './lib/statementExecutor'
import { CronScheduler } from './services/cronScheduler'

export type SchedulerCradle = {
  config: SchedulerConfig
  em: SqlConnectionSource
  statementExecutor: StatementExecutor
  cronScheduler: CronScheduler
}

export type SchedulerContainer = AppContainer<SchedulerCradle>

/**
 * Scheduler module DI registration. `em` is whatever connection source the
 * host provides; the CLI passes a forked MikroORM entity manager.
 */
export function register(container: SchedulerContainer, config: SchedulerConfig, em: SqlConnectionSource): void {
  container.register({
    config: asValue(config),
    em: asValue(em),
    statementExecutor: asFunction(
      (cradle: SchedulerCradle) => new EntityManagerStatementExecutor(() => cradle.em),
    ).singleton(),
    cronScheduler: asFunction(
      (cradle: SchedulerCradle) =>
        new CronScheduler({
          resultBufferSize: cradle.config.resultBufferSize,
          timezone: cradle.config.timezone,
        }),
    ).singleton(),
  })
}

/**
 * Connect to PostgreSQL and build a container for one CLI run.
 * `close` disposes the container and the connection pool.
 */
export async function createSchedulerContainer(
  config: SchedulerConfig,
): Promise<{ container: SchedulerContainer; close: () => Promise<void> }> {
  const orm = await MikroORM.init({
    clientUrl: config.databaseUrl,
    entities: [],
    discovery: { warnWhenNoEntities: false },
    debug: false,
  })
  console.log(`[cronjobs] Connected to ${describeDatabaseUrl(config.databaseUrl)}`)

  const container = createAppContainer<SchedulerCradle>()
  register(container, config, orm.em.fork())

  return {
    container,
    close: async () => {
      await container.dispose()
      await orm.close(true)
    },
  }
}
