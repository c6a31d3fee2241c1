import type { ExecutableJob } from '../data/types'

/**
 * The one thing the scheduler needs from a database: run a statement body.
 * Failure is a rejected promise.
 */
export interface StatementExecutor {
  execute(statement: string): Promise<void>
}

/**
 * Anything exposing a MikroORM-style connection, such as an `EntityManager`
 */
export type SqlConnectionSource = {
  getConnection(): {
    execute(query: string): Promise<unknown>
  }
}

/**
 * Runs statements through the entity manager's connection. The body is sent
 * without bindings, so a file holding several statements runs as one batch.
 */
export class EntityManagerStatementExecutor implements StatementExecutor {
  constructor(private em: () => SqlConnectionSource) {}

  async execute(statement: string): Promise<void> {
    await this.em().getConnection().execute(statement)
  }
}

/**
 * Job whose body is a fixed SQL text
 */
export class SqlStatementJob implements ExecutableJob {
  constructor(
    readonly statement: string,
    private readonly executor: StatementExecutor,
  ) {}

  run(): Promise<void> {
    return this.executor.execute(this.statement)
  }
}
