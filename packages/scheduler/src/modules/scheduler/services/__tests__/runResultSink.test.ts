import { describe, it, expect, jest, afterEach } from '@jest/globals'
import { QueueClosedError } from '@sqlcron/queue'
import type { RunResult } from '../../data/types'
import { consoleRunLogger, formatRunResult } from '../consoleRunLogger'
import { DEFAULT_RESULT_BUFFER_SIZE, RunResultSink } from '../runResultSink'

function result(name: string, error: Error | null = null, durationMs = 5): RunResult {
  return { name, error, durationMs, startedAt: new Date('2025-03-10T15:30:00Z') }
}

describe('RunResultSink', () => {
  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should default to a buffer of 128', () => {
    expect(DEFAULT_RESULT_BUFFER_SIZE).toBe(128)
    expect(new RunResultSink().capacity).toBe(128)
  })

  it('should deliver every result in order and drain on close', async () => {
    const sink = new RunResultSink(4)
    const seen: string[] = []
    sink.start((run) => {
      seen.push(run.name)
    })

    await sink.send(result('a'))
    await sink.send(result('b'))
    await sink.send(result('c'))
    await sink.close()

    expect(seen).toEqual(['a', 'b', 'c'])
  })

  it('should hold senders back while the buffer is full', async () => {
    const sink = new RunResultSink(1)
    await sink.send(result('first'))

    let released = false
    const second = sink.send(result('second')).then(() => {
      released = true
    })
    await Promise.resolve()

    expect(released).toBe(false)
    expect(sink.pending).toBe(2)

    const seen: string[] = []
    sink.start((run) => {
      seen.push(run.name)
    })
    await second
    await sink.close()

    expect(released).toBe(true)
    expect(seen).toEqual(['first', 'second'])
  })

  it('should keep consuming after the consumer throws', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    const sink = new RunResultSink()
    const seen: string[] = []
    sink.start((run) => {
      if (run.name === 'bad') throw new Error('render failed')
      seen.push(run.name)
    })

    await sink.send(result('bad'))
    await sink.send(result('good'))
    await sink.close()

    expect(seen).toEqual(['good'])
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0][0]).toBe('[cronjobs:results] Consumer failed on bad:')
  })

  it('should wait for async consumers before close resolves', async () => {
    const sink = new RunResultSink()
    const seen: string[] = []
    sink.start(async (run) => {
      await new Promise((resolve) => setImmediate(resolve))
      seen.push(run.name)
    })

    await sink.send(result('slow'))
    await sink.close()

    expect(seen).toEqual(['slow'])
  })

  it('should ignore a second consumer', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    const sink = new RunResultSink()
    const first: string[] = []
    const second: string[] = []
    sink.start((run) => {
      first.push(run.name)
    })
    sink.start((run) => {
      second.push(run.name)
    })

    await sink.send(result('x'))
    await sink.close()

    expect(first).toEqual(['x'])
    expect(second).toEqual([])
    expect(warnSpy).toHaveBeenCalledWith('[cronjobs:results] Consumer already running')
  })

  it('should close without a consumer and reject later sends', async () => {
    const sink = new RunResultSink()

    await sink.close()
    await sink.close()

    await expect(sink.send(result('late'))).rejects.toBeInstanceOf(QueueClosedError)
  })
})

describe('consoleRunLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should format successes and failures', () => {
    expect(formatRunResult(result('vacuum', null, 12.6))).toBe('Running vacuum: OK (13ms)')
    expect(formatRunResult(result('report', new Error('relation "sales" does not exist'), 3))).toBe(
      'Running report: error=relation "sales" does not exist (3ms)',
    )
  })

  it('should print one line per result', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined)

    consoleRunLogger(result('vacuum'))

    expect(logSpy).toHaveBeenCalledWith('Running vacuum: OK (5ms)')
  })
})
