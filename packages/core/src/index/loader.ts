import type { ToolDefinition } from '../types/index.js'
import { readdir, readFile, stat } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { ToolDefinitionError } from '../errors.js'
import { parseToolDefinition } from './validation.js'

/**
 * Supported file extensions
 */
const SUPPORTED_EXTENSIONS = ['.json', '.yaml', '.yml']

/**
 * Load tool definitions from JSON or YAML files
 */
export class ToolLoader {
  /**
   * Load tools from a file or directory
   */
  async load(path: string): Promise<ToolDefinition[]> {
    const stats = await stat(path)

    if (stats.isDirectory()) {
      return this.loadFromDirectory(path)
    }

    return this.loadFromFile(path)
  }

  /**
   * Load tools from multiple sources, concatenated in source order.
   * Duplicate names are kept; the index rejects them.
   */
  async loadFromSources(sources: string[]): Promise<ToolDefinition[]> {
    const allTools: ToolDefinition[] = []

    for (const source of sources) {
      const tools = await this.load(source)
      allTools.push(...tools)
    }

    return allTools
  }

  /**
   * Load tools from a single file
   */
  private async loadFromFile(filePath: string): Promise<ToolDefinition[]> {
    const ext = extname(filePath).toLowerCase()

    if (!SUPPORTED_EXTENSIONS.includes(ext)) {
      throw new Error(`Unsupported file extension: ${ext}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`)
    }

    const content = await readFile(filePath, 'utf-8')

    let data: unknown
    if (ext === '.json') {
      data = JSON.parse(content)
    }
    else {
      data = parseYaml(content)
    }

    return this.parseToolDefinitions(data, filePath)
  }

  /**
   * Load tools from a directory (recursive), in name order
   */
  private async loadFromDirectory(dirPath: string): Promise<ToolDefinition[]> {
    const entries = await readdir(dirPath, { withFileTypes: true })
    entries.sort((a, b) => a.name.localeCompare(b.name))
    const tools: ToolDefinition[] = []

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name)

      if (entry.isDirectory()) {
        const subTools = await this.loadFromDirectory(fullPath)
        tools.push(...subTools)
      }
      else if (entry.isFile()) {
        const ext = extname(entry.name).toLowerCase()
        if (SUPPORTED_EXTENSIONS.includes(ext)) {
          const fileTools = await this.loadFromFile(fullPath)
          tools.push(...fileTools)
        }
      }
    }

    return tools
  }

  /**
   * Parse raw data into tool definitions
   */
  parseToolDefinitions(data: unknown, source: string): ToolDefinition[] {
    if (Array.isArray(data)) {
      return data.map((item, index) => parseToolDefinition(item, `${source}[${index}]`))
    }

    if (typeof data === 'object' && data !== null) {
      // An object with a tools array, or a single tool
      if ('tools' in data && Array.isArray(data.tools)) {
        return data.tools.map((item: unknown, index: number) => parseToolDefinition(item, `${source}.tools[${index}]`))
      }

      if ('name' in data) {
        return [parseToolDefinition(data, source)]
      }
    }

    throw new ToolDefinitionError(source, 'expected a tool, an array of tools, or an object with a \'tools\' array')
  }
}
