import { promises as fs } from 'fs'
import path from 'path'
import { ConfigError } from './errors.js'
import { isPlainObject, type PlainObject } from './merge.js'

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load a JSON config file. The top level must be an object.
 */
export async function loadConfigFile(filePath: string): Promise<PlainObject> {
  const content = await fs.readFile(filePath, 'utf-8')

  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid JSON in ${filePath}: ${reason}`, filePath)
  }

  if (!isPlainObject(data)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`, filePath)
  }
  return data
}

/**
 * Save a JSON config file.
 */
export async function saveConfigFile(filePath: string, config: PlainObject): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, JSON.stringify(config, null, 2), 'utf-8')
}
