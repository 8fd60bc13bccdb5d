/**
 * Unit tests for bear-collector.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { BearManifestError } from '../../../core/errors.js'
import { createLogger } from '../../../utils/logger.js'
import { collectBears, findBearManifests, loadBearManifest } from '../bear-collector.js'

interface LogEntry {
  level: string
  msg: string
  manifestPath?: string
}

function captureLog() {
  const entries: LogEntry[] = []
  const log = createLogger('test', {
    level: 'debug',
    destination: {
      write: (line: string) => {
        const entry: LogEntry = JSON.parse(line)
        entries.push(entry)
      },
    },
  })
  return { log, entries }
}

const STYLE_BEAR_A = [
  'name: StyleBear',
  'kind: local',
  'description: first',
  'required_settings:',
  '  Use_Spaces: Indent with spaces',
  'optional_settings:',
  '  tab_width:',
].join('\n')

const STYLE_BEAR_B = ['name: stylebear', 'kind: LOCAL', 'description: second'].join('\n')

const GLOBAL_BEAR = ['name: GlobalBear', 'kind: Global'].join('\n')

const BROKEN_BEAR = ['name: BrokenBear', 'kind: sideways'].join('\n')

describe('bear-collector', () => {
  let root: string
  let dirA: string
  let dirB: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bearconf-bears-'))
    dirA = join(root, 'a')
    dirB = join(root, 'b')
    await mkdir(join(dirA, 'nested'), { recursive: true })
    await mkdir(dirB, { recursive: true })
    await writeFile(join(dirA, 'StyleBear.bear.yaml'), STYLE_BEAR_A, 'utf-8')
    await writeFile(join(dirA, 'nested', 'GlobalBear.bear.yml'), GLOBAL_BEAR, 'utf-8')
    await writeFile(join(dirB, 'StyleBear.bear.yaml'), STYLE_BEAR_B, 'utf-8')
    await writeFile(join(dirB, 'Broken.bear.yaml'), BROKEN_BEAR, 'utf-8')
    await writeFile(join(dirB, 'readme.txt'), 'not a bear', 'utf-8')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  describe('loadBearManifest', () => {
    it('reads a manifest into a frozen descriptor', async () => {
      const path = join(dirA, 'StyleBear.bear.yaml')
      const bear = await loadBearManifest(path)

      expect(bear).toEqual({
        name: 'StyleBear',
        kind: 'LOCAL',
        description: 'first',
        requiredSettings: [{ name: 'use_spaces', help: 'Indent with spaces' }],
        optionalSettings: [{ name: 'tab_width', help: '' }],
        source: path,
      })
      expect(Object.isFrozen(bear)).toBe(true)
      expect(Object.isFrozen(bear.requiredSettings)).toBe(true)
    })

    it('fills optional fields with defaults', async () => {
      const bear = await loadBearManifest(join(dirA, 'nested', 'GlobalBear.bear.yml'))
      expect(bear.kind).toBe('GLOBAL')
      expect(bear.description).toBe('')
      expect(bear.requiredSettings).toEqual([])
    })

    it('rejects an invalid kind', async () => {
      await expect(loadBearManifest(join(dirB, 'Broken.bear.yaml'))).rejects.toBeInstanceOf(
        BearManifestError
      )
    })

    it('rejects unknown manifest fields', async () => {
      const path = join(root, 'Extra.bear.yaml')
      await writeFile(path, 'name: ExtraBear\nkind: local\nlanguage: python\n', 'utf-8')
      await expect(loadBearManifest(path)).rejects.toBeInstanceOf(BearManifestError)
    })

    it('rejects text that is not YAML', async () => {
      const path = join(root, 'Bad.bear.yaml')
      await writeFile(path, 'name: [unclosed\n', 'utf-8')
      await expect(loadBearManifest(path)).rejects.toThrow('Cannot read bear manifest at')
    })
  })

  describe('findBearManifests', () => {
    it('searches a directory recursively for manifest files only', async () => {
      expect(await findBearManifests(dirA)).toEqual([
        join(dirA, 'StyleBear.bear.yaml'),
        join(dirA, 'nested', 'GlobalBear.bear.yml'),
      ])
    })

    it('uses an entry with glob characters as the pattern', async () => {
      expect(await findBearManifests(join(root, '*', '*.bear.yaml'))).toEqual([
        join(dirA, 'StyleBear.bear.yaml'),
        join(dirB, 'Broken.bear.yaml'),
        join(dirB, 'StyleBear.bear.yaml'),
      ])
    })

    it('treats glob characters in an existing directory literally', async () => {
      const bracketDir = join(root, 'pkg[1]', 'bears')
      await mkdir(bracketDir, { recursive: true })
      await writeFile(join(bracketDir, 'XBear.bear.yaml'), 'name: XBear\nkind: local', 'utf-8')

      expect(await findBearManifests(bracketDir)).toEqual([join(bracketDir, 'XBear.bear.yaml')])
    })

    it('finds nothing in a missing directory', async () => {
      expect(await findBearManifests(join(root, 'missing'))).toEqual([])
    })
  })

  describe('collectBears', () => {
    it('returns each bear name once, the first search dir winning', async () => {
      const { log } = captureLog()
      const bears = await collectBears([dirA, dirB], [], ['LOCAL'], log)

      expect(bears.map((bear) => bear.description)).toEqual(['first'])
    })

    it('filters by kind', async () => {
      const { log } = captureLog()
      const bears = await collectBears([dirA, dirB], [], ['GLOBAL'], log)
      expect(bears.map((bear) => bear.name)).toEqual(['GlobalBear'])
    })

    it('filters by name case-insensitively', async () => {
      const { log } = captureLog()
      const bears = await collectBears([dirB, dirA], ['STYLEBEAR'], ['LOCAL', 'GLOBAL'], log)
      expect(bears.map((bear) => bear.description)).toEqual(['second'])
    })

    it('does not return a bear twice when a directory is listed twice', async () => {
      const { log } = captureLog()
      const bears = await collectBears([dirA, dirA], [], ['LOCAL', 'GLOBAL'], log)
      expect(bears.map((bear) => bear.name)).toEqual(['StyleBear', 'GlobalBear'])
    })

    it('collects bears from a directory whose path has brackets', async () => {
      const { log } = captureLog()
      const bracketDir = join(root, 'pkg[1]', 'bears')
      await mkdir(bracketDir, { recursive: true })
      await writeFile(join(bracketDir, 'XBear.bear.yaml'), 'name: XBear\nkind: local', 'utf-8')

      const bears = await collectBears([bracketDir], [], ['LOCAL'], log)
      expect(bears.map((bear) => bear.name)).toEqual(['XBear'])
    })

    it('yields nothing for missing directories', async () => {
      const { log, entries } = captureLog()
      expect(await collectBears([join(root, 'missing')], [], ['LOCAL'], log)).toEqual([])
      expect(entries).toHaveLength(0)
    })

    it('warns about an invalid manifest and skips it', async () => {
      const { log, entries } = captureLog()
      const brokenPath = join(dirB, 'Broken.bear.yaml')

      const bears = await collectBears([dirB], [], ['LOCAL', 'GLOBAL'], log)

      expect(bears.map((bear) => bear.name)).toEqual(['stylebear'])
      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe('warn')
      expect(entries[0]?.manifestPath).toBe(brokenPath)
      expect(entries[0]?.msg.startsWith(`Unable to collect bears from '${brokenPath}': `)).toBe(true)
    })
  })
})
