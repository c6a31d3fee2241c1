import fs from 'node:fs/promises'
import path from 'node:path'
import { jobDefinitionSchema, formatIssues, type JobDefinition } from '../data/validators'
import type { JobAction } from '../data/types'
import { JobFileError, toError } from './errors'
import { SqlStatementJob, type StatementExecutor } from './statementExecutor'

/**
 * The marker must be on the first line; any comment prefix is allowed:
 * `-- cron: @daily`, `# cron: 0 3 * * *`
 */
const CRON_MARKER = /^.*cron:\s+(.*)(?:\r?\n|$)/

export type JobFileFailure = {
  path: string
  error: Error
}

export type JobFileScan = {
  definitions: JobDefinition[]
  failed: JobFileFailure[]
}

export type JobLoadReport = {
  registered: string[]
  failed: JobFileFailure[]
}

export type JobRegistrar = {
  register(name: string, spec: string, action: JobAction): unknown
}

/**
 * Job name for a file: its base name without extension
 */
export function jobNameFromPath(filePath: string): string {
  const base = path.basename(filePath)
  return base.slice(0, base.length - path.extname(base).length)
}

/**
 * Build a job definition from a file's content
 *
 * @throws JobFileError when the marker line is missing or the result is invalid
 */
export function parseJobFile(filePath: string, content: string): JobDefinition {
  const match = CRON_MARKER.exec(content)
  const spec = match?.[1]?.trim()
  if (!spec) {
    throw new JobFileError(filePath, 'Cron spec ("[...]cron: [spec]") was not found')
  }

  const parsed = jobDefinitionSchema.safeParse({
    name: jobNameFromPath(filePath),
    spec,
    body: content,
    path: filePath,
  })
  if (!parsed.success) {
    throw new JobFileError(filePath, formatIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Regular, non-hidden files of a directory, sorted by name
 */
export async function listJobFiles(dirname: string): Promise<string[]> {
  const entries = await fs.readdir(dirname, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(dirname, name))
}

/**
 * One line per failure, always naming the file
 */
export function describeFailure(failure: JobFileFailure): string {
  if (failure.error instanceof JobFileError) return failure.error.message
  return `File ${failure.path}: ${failure.error.message}`
}

/**
 * Read every job file of a directory. A bad file is reported, not fatal.
 * A missing directory still rejects.
 */
export async function readJobFiles(dirname: string): Promise<JobFileScan> {
  const definitions: JobDefinition[] = []
  const failed: JobFileFailure[] = []

  for (const filePath of await listJobFiles(dirname)) {
    try {
      const content = await fs.readFile(filePath, 'utf8')
      definitions.push(parseJobFile(filePath, content))
    } catch (error: unknown) {
      failed.push({ path: filePath, error: toError(error) })
    }
  }

  return { definitions, failed }
}

/**
 * Register one SQL job per file of `dirname`
 */
export async function loadJobsFromDirectory(
  scheduler: JobRegistrar,
  dirname: string,
  executor: StatementExecutor,
): Promise<JobLoadReport> {
  const { definitions, failed } = await readJobFiles(dirname)
  const registered: string[] = []

  for (const definition of definitions) {
    try {
      scheduler.register(definition.name, definition.spec, new SqlStatementJob(definition.body, executor))
      registered.push(definition.name)
    } catch (error: unknown) {
      failed.push({ path: definition.path, error: toError(error) })
    }
  }

  for (const failure of failed) {
    console.error(`[cronjobs:loader] ${describeFailure(failure)}`)
  }
  console.log(`[cronjobs:loader] Registered ${registered.length} job(s) from ${dirname}`)

  return { registered, failed }
}
