// Loader (bind.ts): parses the embedded schemas once, when the consuming
// program imports it. Any failure throws from module evaluation.

import { quote } from './quote.js'

export const BIND_FILE = 'bind.ts'

export function generateBindTs(service: string): string {
  return `// Code generated by schemabind. DO NOT EDIT.

import { asset, assetNames } from './schema.js'

export type JsonSchema = { [key: string]: unknown }

const SERVICE = ${quote(service)}

function isJsonSchema(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function loadSchemas(): Map<string, JsonSchema> {
  const decoder = new TextDecoder()
  const schemas = new Map<string, JsonSchema>()
  for (const name of assetNames()) {
    let parsed: unknown
    try {
      parsed = JSON.parse(decoder.decode(asset(name)))
    } catch (error) {
      throw new Error(\`\${SERVICE}: \${error instanceof Error ? error.message : String(error)}\`)
    }
    if (!isJsonSchema(parsed)) {
      throw new Error(\`\${SERVICE}: schema \${name} is not a JSON object\`)
    }
    schemas.set(name, parsed)
  }
  return schemas
}

/** Resolved schemas of this service keyed by their file basename. */
export const Schemas: ReadonlyMap<string, JsonSchema> = loadSchemas()
`
}
