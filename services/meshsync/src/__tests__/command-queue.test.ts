import { afterEach, describe, expect, it, vi } from 'vitest'

import type { Command } from '~/mesh/commands'
import { createMeshCliExecutor, createMeshClient, type MeshCliExecutor } from '~/mesh/command-queue'
import { deferred, silentLogger } from './fakes'

const command = (overrides: Partial<Command> = {}): Command => ({
  queue: 'control',
  args: ['apply', '--kind', 'cluster', '-f', '-'],
  stdin: '{"cluster_key":"a"}',
  requeueOnFailure: true,
  log: vi.fn(),
  ...overrides,
})

afterEach(() => {
  vi.useRealTimers()
})

describe('mesh cli executor', () => {
  it('prefixes base args and joins output streams', async () => {
    const runner = vi.fn(async () => ({ stdout: 'created\n', stderr: ' warning: deprecated flag ', exitCode: 0 }))
    const execute = createMeshCliExecutor({ binary: 'meshctl', baseArgs: ['--addr', 'control:9000'], runner })

    await expect(execute(['apply', '--kind', 'cluster', '-f', '-'], '{}')).resolves.toEqual({
      ok: true,
      output: 'created\nwarning: deprecated flag',
    })
    expect(runner).toHaveBeenCalledWith(
      'meshctl',
      ['--addr', 'control:9000', 'apply', '--kind', 'cluster', '-f', '-'],
      '{}',
    )
  })

  it('reports a non-zero exit as a failure', async () => {
    const runner = vi.fn(async () => ({ stdout: '', stderr: 'not found', exitCode: 1 }))
    const execute = createMeshCliExecutor({ binary: 'meshctl', runner })

    await expect(execute(['delete', 'cluster', '--cluster-key', 'a'], null)).resolves.toEqual({
      ok: false,
      output: 'not found',
    })
    expect(runner).toHaveBeenCalledWith('meshctl', ['delete', 'cluster', '--cluster-key', 'a'], undefined)
  })
})

describe('mesh client', () => {
  it('runs each queue in order and reports success', async () => {
    const seen: string[] = []
    const execute: MeshCliExecutor = async (args) => {
      seen.push(args.join(' '))
      return { ok: true, output: '' }
    }
    const client = createMeshClient({ execute, logger: silentLogger })
    const first = command()
    const second = command({ args: ['delete', 'cluster', '--cluster-key', 'b'], stdin: null })

    client.enqueue(first)
    client.enqueue(second)
    await client.whenIdle()

    expect(seen).toEqual(['apply --kind cluster -f -', 'delete cluster --cluster-key b'])
    expect(first.log).toHaveBeenCalledWith('', null)
    await client.close()
  })

  it('requeues a failed apply until the attempt limit', async () => {
    vi.useFakeTimers()
    const execute = vi.fn(async (): Promise<{ ok: boolean; output: string }> => ({ ok: false, output: 'unavailable' }))
    const client = createMeshClient({ execute, logger: silentLogger, requeueDelayMs: 5_000, maxAttempts: 3 })
    const apply = command()

    client.enqueue(apply)
    await vi.advanceTimersByTimeAsync(0)
    expect(execute).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(5_000)
    expect(execute).toHaveBeenCalledTimes(2)
    await vi.advanceTimersByTimeAsync(5_000)
    expect(execute).toHaveBeenCalledTimes(3)
    await vi.advanceTimersByTimeAsync(20_000)
    expect(execute).toHaveBeenCalledTimes(3)

    expect(apply.log).toHaveBeenCalledTimes(3)
    expect(apply.log).toHaveBeenLastCalledWith('unavailable', new Error('unavailable'))
    await client.close()
  })

  it('does not requeue deletes', async () => {
    vi.useFakeTimers()
    const execute = vi.fn(async (): Promise<{ ok: boolean; output: string }> => ({ ok: false, output: '' }))
    const client = createMeshClient({ execute, logger: silentLogger, requeueDelayMs: 5_000 })
    const remove = command({ args: ['delete', 'cluster', '--cluster-key', 'a'], stdin: null, requeueOnFailure: false })

    client.enqueue(remove)
    await vi.advanceTimersByTimeAsync(60_000)

    expect(execute).toHaveBeenCalledTimes(1)
    expect(remove.log).toHaveBeenCalledWith('', new Error('delete failed'))
    await client.close()
  })

  it('treats a throwing executor as a failed command', async () => {
    const execute: MeshCliExecutor = async () => {
      throw new Error('spawn meshctl ENOENT')
    }
    const client = createMeshClient({ execute, logger: silentLogger })
    const apply = command({ requeueOnFailure: false })

    client.enqueue(apply)
    await client.whenIdle()

    expect(apply.log).toHaveBeenCalledWith('spawn meshctl ENOENT', new Error('spawn meshctl ENOENT'))
    await client.close()
  })

  it('keeps the queues apart and drops queued commands on close', async () => {
    const gate = deferred()
    const execute = vi.fn(async (args: string[]) => {
      if (args[0] === 'apply') await gate.promise
      return { ok: true, output: '' }
    })
    const client = createMeshClient({ execute, logger: silentLogger })

    client.enqueue(command())
    client.enqueue(command())
    client.enqueue(command({ queue: 'catalog', args: ['delete', 'catalogservice'], stdin: null }))
    await vi.waitFor(() => expect(execute).toHaveBeenCalledTimes(2))
    expect(client.pending()).toEqual({ control: 1, catalog: 0 })

    const closing = client.close()
    gate.resolve()
    await closing
    expect(execute).toHaveBeenCalledTimes(2)
    expect(client.pending()).toEqual({ control: 0, catalog: 0 })
  })
})
