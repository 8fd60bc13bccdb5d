/**
 * Sink lifecycle tests for the SectionManager pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { FileLogSink } from '../../output/log-sink.js'
import { releaseOutput } from '../../output/output-selector.js'
import { createSectionManager } from '../section-manager-impl.js'
import type { SectionManagerResult } from '../section-manager.js'

const { openedSinks } = vi.hoisted(() => {
  const openedSinks: FileLogSink[] = []
  return { openedSinks }
})

vi.mock('../../output/log-sink.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../output/log-sink.js')>()
  return {
    ...actual,
    tryCreateFileSink: (...args: Parameters<typeof actual.tryCreateFileSink>) => {
      const attempt = actual.tryCreateFileSink(...args)
      if (!attempt.ok) return attempt
      const sink: FileLogSink = { ...attempt.sink, close: vi.fn(attempt.sink.close) }
      openedSinks.push(sink)
      return { ok: true as const, sink }
    },
  }
})

describe('SectionManager output lifecycle', () => {
  let root: string
  let project: string
  let result: SectionManagerResult | null

  async function run(argv: string[]): Promise<SectionManagerResult> {
    result = await createSectionManager({
      paths: {
        systemCoafile: join(root, 'default_coafile'),
        userCoafile: join(root, 'user.coafile'),
        bearsRoot: join(root, 'bears'),
      },
      cwd: project,
    }).run(argv)
    return result
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bearconf-output-'))
    project = join(root, 'project')
    await mkdir(project)
    await mkdir(join(root, 'bears'))
    await writeFile(join(project, '.coafile'), '[default]\n', 'utf-8')
    openedSinks.length = 0
    result = null
  })

  afterEach(async () => {
    if (result !== null) {
      releaseOutput({ logSink: result.logSink, interactor: result.interactor })
    }
    await rm(root, { recursive: true, force: true })
  })

  it('closes the command line sink when the merged level differs', async () => {
    await writeFile(join(root, 'default_coafile'), '[default]\nlog_level = INFO\n', 'utf-8')

    const { logSink } = await run(['-l', join(root, 'a.log'), '-o', 'none'])

    expect(openedSinks).toHaveLength(2)
    expect(openedSinks[0]?.close).toHaveBeenCalledTimes(1)
    expect(openedSinks[1]?.close).not.toHaveBeenCalled()
    expect(logSink).toBe(openedSinks[1])
  })

  it('keeps the command line sink when the output settings are unchanged', async () => {
    await writeFile(join(root, 'default_coafile'), '[default]\n', 'utf-8')

    const { logSink } = await run(['-l', join(root, 'a.log'), '-o', 'none'])

    expect(openedSinks).toHaveLength(1)
    expect(openedSinks[0]?.close).not.toHaveBeenCalled()
    expect(logSink).toBe(openedSinks[0])
  })
})
