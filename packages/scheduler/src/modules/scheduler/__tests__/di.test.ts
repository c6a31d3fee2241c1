import { describe, it, expect, jest } from '@jest/globals'
import { createAppContainer } from '@sqlcron/shared/lib/di/container'
import { register, type SchedulerCradle } from '../di'
import { EntityManagerStatementExecutor } from '../lib/statementExecutor'
import { CronScheduler } from '../services/cronScheduler'
import type { SchedulerConfig } from '../config'

const config: SchedulerConfig = {
  databaseUrl: 'postgres://localhost:5432/postgres',
  jobsDir: './cronjobs',
  resultBufferSize: 8,
  timezone: 'UTC',
}

describe('scheduler DI registration', () => {
  it('should wire the statement executor to the registered entity manager', async () => {
    const execute = jest.fn(async (_query: string) => [])
    const container = createAppContainer<SchedulerCradle>()
    register(container, config, { getConnection: () => ({ execute }) })

    const executor = container.resolve('statementExecutor')
    await executor.execute('SELECT 1')

    expect(executor).toBeInstanceOf(EntityManagerStatementExecutor)
    expect(execute).toHaveBeenCalledWith('SELECT 1')
  })

  it('should build one scheduler per container from the config', () => {
    const container = createAppContainer<SchedulerCradle>()
    register(container, config, { getConnection: () => ({ execute: async () => [] }) })

    const scheduler = container.resolve('cronScheduler')

    expect(scheduler).toBeInstanceOf(CronScheduler)
    expect(container.resolve('cronScheduler')).toBe(scheduler)
    expect(container.resolve('config')).toBe(config)
  })
})
