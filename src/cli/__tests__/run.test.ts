/**
 * Tests for the bearconf command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { Writable } from 'node:stream'
import { tmpdir } from 'os'
import { join } from 'path'
import yaml from 'js-yaml'
import type { BearDescriptor } from '../../modules/bears/types.js'
import { Section } from '../../modules/settings/section.js'
import { createSectionDict, resolveSections } from '../../modules/settings/section-dict.js'
import { CLI_ORIGIN } from '../../modules/settings/setting.js'
import { CLI_EXIT_INVALID, CLI_EXIT_SUCCESS, runCli, summarizeRun, type RunCliOptions } from '../run.js'

function captureStream() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, text: () => chunks.join('') }
}

describe('summarizeRun', () => {
  it('lists own settings and bear names per section', () => {
    const dict = createSectionDict()
    const python = new Section('python')
    python.set('max_line_length', '80', CLI_ORIGIN)
    dict.set('python', python)
    const sections = resolveSections(dict)
    const bear: BearDescriptor = {
      name: 'StyleBear',
      kind: 'LOCAL',
      description: '',
      requiredSettings: [],
      optionalSettings: [],
      source: '/bears/StyleBear.bear.yaml',
    }

    const summary = summarizeRun({
      sections,
      localBears: new Map([['python', [bear]]]),
      globalBears: new Map<string, readonly BearDescriptor[]>(),
      targets: ['python', 'missing'],
    })

    expect(summary).toEqual({
      python: { settings: { max_line_length: '80' }, local_bears: ['StyleBear'], global_bears: [] },
    })
  })
})

describe('runCli', () => {
  let root: string
  let project: string
  let stdout: ReturnType<typeof captureStream>
  let stderr: ReturnType<typeof captureStream>

  function options(): RunCliOptions {
    return {
      paths: {
        systemCoafile: join(root, 'default_coafile'),
        userCoafile: join(root, 'user.coafile'),
        bearsRoot: join(root, 'bears'),
      },
      cwd: project,
      consoleStream: { write: () => undefined },
      stdout: stdout.stream,
      stderr: stderr.stream,
    }
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bearconf-cli-'))
    project = join(root, 'project')
    await mkdir(project)
    await mkdir(join(root, 'bears'))
    await writeFile(join(root, 'default_coafile'), '[default]\nlog_level = INFO\n', 'utf-8')
    await writeFile(
      join(root, 'bears', 'StyleBear.bear.yaml'),
      'name: StyleBear\nkind: local\n',
      'utf-8'
    )
    await writeFile(join(project, '.coafile'), '[python]\nmax_line_length = 80\n', 'utf-8')
    stdout = captureStream()
    stderr = captureStream()
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('prints usage for --help', async () => {
    expect(await runCli(['--help'], options())).toBe(CLI_EXIT_SUCCESS)
    expect(stdout.text()).toContain('Usage: bearconf')
  })

  it('prints a YAML summary of every section', async () => {
    expect(await runCli(['-o', 'none'], options())).toBe(CLI_EXIT_SUCCESS)

    expect(yaml.load(stdout.text())).toEqual({
      default: {
        settings: { log_level: 'INFO', output: 'none' },
        local_bears: ['StyleBear'],
        global_bears: [],
      },
      python: {
        settings: { max_line_length: '80' },
        local_bears: ['StyleBear'],
        global_bears: [],
      },
    })
    expect(stderr.text()).toBe('')
  })

  it('restricts the summary to the requested targets', async () => {
    expect(await runCli(['Python', '-o', 'none'], options())).toBe(CLI_EXIT_SUCCESS)
    expect(yaml.load(stdout.text())).toEqual({
      python: {
        settings: { max_line_length: '80' },
        local_bears: ['StyleBear'],
        global_bears: [],
      },
    })
  })

  it('exits with 2 on malformed arguments', async () => {
    expect(await runCli(['-S', 'bad'], options())).toBe(CLI_EXIT_INVALID)
    expect(stderr.text()).toBe('Error: Setting "bad" must have the form [section.]key=value\n')
    expect(stdout.text()).toBe('')
  })

  it('exits with 2 when --save is given an empty path', async () => {
    expect(await runCli(['--save=', '-o', 'none'], options())).toBe(CLI_EXIT_INVALID)
    expect(stderr.text()).toBe('Error: Setting "save" is empty, so there is no file to save to\n')
    expect(stdout.text()).toBe('')
  })

  it('exits with 2 on a malformed coafile', async () => {
    await writeFile(join(project, '.coafile'), '[python\n', 'utf-8')

    expect(await runCli(['-o', 'none'], options())).toBe(CLI_EXIT_INVALID)
    expect(stderr.text()).toBe(
      `Error: ${join(project, '.coafile')}:1: Unterminated section header\n`
    )
  })
})
