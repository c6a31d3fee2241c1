import { z } from 'zod'
import type { ModuleCli } from '@sqlcron/shared/modules/registry'
import { loadSchedulerConfig } from './config'
import { createSchedulerContainer } from './di'
import { toError, UnknownJobError } from './lib/errors'
import { describeFailure, jobNameFromPath, loadJobsFromDirectory, readJobFiles } from './lib/jobFileReader'
import { SqlStatementJob } from './lib/statementExecutor'
import { listOccurrences, parseTimeSpec } from './lib/timeSpec'
import { formatRunResult } from './services/consoleRunLogger'

const DEFAULT_OCCURRENCE_COUNT = 5

const countSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => Number.parseInt(value, 10))
  .pipe(z.number().int().positive())
  .default(DEFAULT_OCCURRENCE_COUNT)

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      resolve(signal)
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}

const runCommand: ModuleCli = {
  command: 'run',
  description: 'Load job files and run them on schedule until interrupted',
  usage: 'sqlcron scheduler run [dir]',
  async run(rest) {
    const config = loadSchedulerConfig()
    const dirname = rest[0] ?? config.jobsDir
    const { container, close } = await createSchedulerContainer(config)

    try {
      const scheduler = container.resolve('cronScheduler')
      const report = await loadJobsFromDirectory(scheduler, dirname, container.resolve('statementExecutor'))
      if (report.registered.length === 0) {
        throw new Error(`No jobs to run in ${dirname}`)
      }

      scheduler.start()
      console.log('Press Ctrl+C to stop.')

      const signal = await waitForShutdownSignal()
      console.log(`\n[cronjobs] ${signal} received, waiting for running jobs...`)
      await scheduler.stop()
    } finally {
      await close()
    }
  },
}

const listCommand: ModuleCli = {
  command: 'list',
  description: 'Show job files with their spec and next run',
  usage: 'sqlcron scheduler list [dir]',
  async run(rest) {
    const config = loadSchedulerConfig()
    const dirname = rest[0] ?? config.jobsDir
    const { definitions, failed } = await readJobFiles(dirname)

    for (const failure of failed) {
      console.error(describeFailure(failure))
    }
    if (definitions.length === 0) {
      console.log('No job files found.')
      return
    }

    const now = new Date()
    console.log('Name'.padEnd(30) + 'Spec'.padEnd(24) + 'Next Run')
    console.log('-'.repeat(80))
    for (const definition of definitions) {
      let nextRun: string
      try {
        nextRun = parseTimeSpec(definition.spec, { timezone: config.timezone }).next(now).toISOString()
      } catch (error: unknown) {
        nextRun = `invalid (${toError(error).message})`
      }
      console.log(definition.name.padEnd(30) + definition.spec.padEnd(24) + nextRun)
    }
  },
}

const nextCommand: ModuleCli = {
  command: 'next',
  description: 'Print the next occurrences of a time spec',
  usage: 'sqlcron scheduler next <spec> [count]',
  async run(rest) {
    const [specText, countArg] = rest
    if (!specText) {
      console.error('Usage: sqlcron scheduler next <spec> [count]')
      process.exitCode = 1
      return
    }
    const parsedCount = countSchema.safeParse(countArg)
    if (!parsedCount.success) {
      throw new Error(`Count must be a positive integer, got "${countArg}"`)
    }
    const count = parsedCount.data

    const config = loadSchedulerConfig()
    const spec = parseTimeSpec(specText, { timezone: config.timezone })
    for (const occurrence of listOccurrences(spec, count)) {
      console.log(occurrence.toISOString())
    }
  },
}

const execCommand: ModuleCli = {
  command: 'exec',
  description: 'Run one job file once, outside its schedule',
  usage: 'sqlcron scheduler exec <dir> <job>',
  async run(rest) {
    const [dirname, jobName] = rest
    if (!dirname || !jobName) {
      console.error('Usage: sqlcron scheduler exec <dir> <job>')
      process.exitCode = 1
      return
    }

    const config = loadSchedulerConfig()
    const { definitions, failed } = await readJobFiles(dirname)
    const definition = definitions.find((item) => item.name === jobName)
    if (!definition) {
      const failure = failed.find((item) => jobNameFromPath(item.path) === jobName)
      if (failure) throw failure.error
      throw new UnknownJobError(jobName)
    }

    const { container, close } = await createSchedulerContainer(config)
    try {
      const scheduler = container.resolve('cronScheduler')
      scheduler.register(definition.name, definition.spec, new SqlStatementJob(definition.body, container.resolve('statementExecutor')))
      // The single result is printed here instead
      scheduler.setConsumer(() => undefined)
      scheduler.start()
      const result = await scheduler.trigger(definition.name)
      await scheduler.stop()

      console.log(formatRunResult(result))
      if (result.error) {
        process.exitCode = 1
      }
    } finally {
      await close()
    }
  },
}

export default [runCommand, listCommand, nextCommand, execCommand]
