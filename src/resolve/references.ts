import { isJsonObject, type JsonObject } from '../core/json.js'

const REF_KEY = '$ref'

/**
 * Extract the definition name from a local reference of the exact form
 * "#/definitions/<name>". Any other reference shape yields undefined.
 */
export function parseDefinitionRef(ref: string): string | undefined {
  const tokens = ref.split('/')
  if (tokens.length === 3 && tokens[0] === '#' && tokens[1] === 'definitions') {
    return tokens[2]
  }
  return undefined
}

/**
 * Collect the names of local definitions a document references.
 *
 * Only object-valued members are descended into. `$ref` entries inside array
 * elements (e.g. under `allOf` or `oneOf`) are not collected. Duplicates are kept.
 */
export function scanReferences(document: JsonObject): string[] {
  const refs: string[] = []
  for (const [key, value] of Object.entries(document)) {
    if (isJsonObject(value)) {
      refs.push(...scanReferences(value))
    } else if (key === REF_KEY && typeof value === 'string') {
      const name = parseDefinitionRef(value)
      if (name !== undefined) {
        refs.push(name)
      }
    }
  }
  return refs
}
