import type { RunResult, RunResultConsumer } from '../data/types'

export function formatRunResult(run: RunResult): string {
  const duration = `${Math.round(run.durationMs)}ms`
  if (run.error) {
    return `Running ${run.name}: error=${run.error.message} (${duration})`
  }
  return `Running ${run.name}: OK (${duration})`
}

/**
 * Default consumer: one line per run on stdout
 */
export const consoleRunLogger: RunResultConsumer = (run) => {
  console.log(formatRunResult(run))
}
