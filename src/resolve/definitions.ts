import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { DefinitionsNotFoundError, DefinitionsParseError, MissingDefinitionsKeyError, errorMessage } from '../core/errors.js'
import { hasOwn, isJsonObject, type JsonObject, type JsonValue } from '../core/json.js'

/** Reserved file name supplying the definitions pool for a subtree. */
export const DEFINITIONS_FILE = 'definitions.json'

/** Reserved schema key the resolved closure is injected under. */
export const DEFINITIONS_KEY = 'definitions'

/**
 * Named definitions parsed from one definitions file.
 * A pool is only ever constructed fully loaded.
 */
export class DefinitionPool {
  private readonly entries: ReadonlyMap<string, JsonValue>

  constructor(readonly source: string, definitions: JsonObject) {
    this.entries = new Map(Object.entries(definitions))
  }

  get size(): number {
    return this.entries.size
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  get(name: string): JsonValue | undefined {
    return this.entries.get(name)
  }

  names(): string[] {
    return [...this.entries.keys()]
  }
}

/**
 * Load `<dir>/definitions.json`.
 *
 * Throws DefinitionsNotFoundError when the file does not exist; callers treat that
 * one as "no pool here" and keep going. Unparseable content or a missing object-valued
 * `definitions` field are hard failures.
 */
export async function loadDefinitionPool(dir: string): Promise<DefinitionPool> {
  const path = join(dir, DEFINITIONS_FILE)

  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) {
      throw new DefinitionsNotFoundError(path)
    }
    throw error
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new DefinitionsParseError(path, errorMessage(error))
  }

  if (!isJsonObject(parsed) || !hasOwn(parsed, DEFINITIONS_KEY)) {
    throw new MissingDefinitionsKeyError(path)
  }
  const definitions = parsed[DEFINITIONS_KEY]
  if (!isJsonObject(definitions)) {
    throw new MissingDefinitionsKeyError(path)
  }

  return new DefinitionPool(path, definitions)
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
