import { PoolUnusableError, UnknownDefinitionError } from '../core/errors.js'
import { compareNames } from '../core/order.js'
import type { JsonObject, JsonValue } from '../core/json.js'
import type { DefinitionPool } from './definitions.js'
import { scanReferences } from './references.js'

/**
 * Pick exactly the requested definitions out of a pool.
 *
 * Stops at the first name the pool lacks. Entries are copied verbatim; `$ref`s
 * inside the copied definitions are left alone here.
 */
export function resolveDefinitions(pool: DefinitionPool | undefined, names: readonly string[]): Record<string, JsonValue> {
  if (names.length === 0) {
    return {}
  }
  if (!pool || pool.size === 0) {
    throw new PoolUnusableError()
  }

  const resolved: [string, JsonValue][] = []
  for (const name of names) {
    const definition = pool.get(name)
    if (definition === undefined) {
      throw new UnknownDefinitionError(name)
    }
    resolved.push([name, structuredClone(definition)])
  }
  // fromEntries defines own properties, so a definition named "__proto__" survives
  return Object.fromEntries(resolved)
}

/**
 * Resolve the definitions a document references directly, keyed in name order.
 * References made by the definitions themselves are not followed.
 */
export function resolveDocumentDefinitions(pool: DefinitionPool | undefined, document: JsonObject): Record<string, JsonValue> {
  const resolved = resolveDefinitions(pool, [...new Set(scanReferences(document))])
  return Object.fromEntries(Object.entries(resolved).sort(([a], [b]) => compareNames(a, b)))
}
