import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, test } from 'vitest'
import { ToolDefinitionError } from '../src/errors.js'
import { ToolLoader } from '../src/index/loader.js'
import { parseToolDefinition } from '../src/index/validation.js'

let testDir: string

describe('ToolLoader', () => {
  beforeAll(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'toolscout-loader-'))

    await writeFile(
      join(testDir, 'array.json'),
      JSON.stringify([
        { name: 'read_file', description: 'Read a file', inputSchema: { type: 'object', properties: { path: { type: 'string' } } } },
        { name: 'write_file', description: 'Write a file' },
      ]),
    )

    await writeFile(
      join(testDir, 'wrapped.yaml'),
      [
        'tools:',
        '  - name: git_commit',
        '    description: Create a git commit',
        '    input_schema:',
        '      type: object',
        '      properties:',
        '        message:',
        '          type: string',
        '          description: Commit message',
      ].join('\n'),
    )

    await writeFile(join(testDir, 'single.json'), JSON.stringify({ name: 'ping', description: 'Ping the server' }))
    await writeFile(join(testDir, 'bad.json'), JSON.stringify([{ name: 'ok' }, { description: 'no name' }]))
    await writeFile(join(testDir, 'notes.txt'), 'not a tool file')

    const dir = join(testDir, 'dir')
    await mkdir(join(dir, 'sub'), { recursive: true })
    await writeFile(join(dir, 'b.json'), JSON.stringify([{ name: 'b1' }]))
    await writeFile(join(dir, 'a.yaml'), '- name: a1\n')
    await writeFile(join(dir, 'readme.txt'), 'ignored')
    await writeFile(join(dir, 'sub', 'c.yml'), 'name: c1\ndescription: nested\n')
  })

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  test('should load a JSON array', async () => {
    const tools = await new ToolLoader().load(join(testDir, 'array.json'))

    expect(tools).toEqual([
      { name: 'read_file', description: 'Read a file', inputSchema: { type: 'object', properties: { path: { type: 'string' } } } },
      { name: 'write_file', description: 'Write a file' },
    ])
  })

  test('should load a YAML object with a tools array', async () => {
    const tools = await new ToolLoader().load(join(testDir, 'wrapped.yaml'))

    expect(tools).toEqual([
      {
        name: 'git_commit',
        description: 'Create a git commit',
        input_schema: {
          type: 'object',
          properties: {
            message: { type: 'string', description: 'Commit message' },
          },
        },
      },
    ])
  })

  test('should load a single tool object', async () => {
    const tools = await new ToolLoader().load(join(testDir, 'single.json'))

    expect(tools).toEqual([{ name: 'ping', description: 'Ping the server' }])
  })

  test('should walk directories recursively in name order', async () => {
    const tools = await new ToolLoader().load(join(testDir, 'dir'))

    expect(tools.map(t => t.name)).toEqual(['a1', 'b1', 'c1'])
  })

  test('should concatenate sources without deduplicating', async () => {
    const single = join(testDir, 'single.json')
    const tools = await new ToolLoader().loadFromSources([single, join(testDir, 'array.json'), single])

    expect(tools.map(t => t.name)).toEqual(['ping', 'read_file', 'write_file', 'ping'])
  })

  test('should report the location of an invalid entry', async () => {
    const file = join(testDir, 'bad.json')

    await expect(new ToolLoader().load(file)).rejects.toThrow(ToolDefinitionError)
    await expect(new ToolLoader().load(file)).rejects.toMatchObject({
      code: 'INVALID_TOOL',
      location: `${file}[1]`,
    })
  })

  test('should reject unsupported file extensions', async () => {
    await expect(new ToolLoader().load(join(testDir, 'notes.txt'))).rejects.toThrow('Unsupported file extension: .txt')
  })

  test('should reject data that is not a tool collection', () => {
    expect(() => new ToolLoader().parseToolDefinitions(42, 'inline')).toThrow(ToolDefinitionError)
  })
})

describe('parseToolDefinition', () => {
  test('should drop unknown top-level keys and keep extra schema keys', () => {
    const tool = parseToolDefinition(
      {
        name: 'x',
        annotations: { readOnlyHint: true },
        inputSchema: { type: 'object', additionalProperties: false },
      },
      'inline',
    )

    expect(tool).toEqual({ name: 'x', inputSchema: { type: 'object', additionalProperties: false } })
    expect(tool).not.toHaveProperty('annotations')
  })

  test('should reject an empty name', () => {
    expect(() => parseToolDefinition({ name: '' }, 'inline')).toThrow('Invalid tool at inline: name: missing or invalid \'name\'')
  })
})
