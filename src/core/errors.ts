/**
 * Error classes raised while resolving and emitting schemas.
 * Everything except DefinitionsNotFoundError aborts the current run.
 */

/**
 * No definitions.json in the walked root.
 * Callers continue without a pool; only schemas that use $ref fail later.
 */
export class DefinitionsNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`cannot read definitions file ${path}`)
    this.name = 'DefinitionsNotFoundError'
    Object.setPrototypeOf(this, DefinitionsNotFoundError.prototype)
  }
}

export class DefinitionsParseError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`invalid JSON in definitions file ${path}: ${reason}`)
    this.name = 'DefinitionsParseError'
    Object.setPrototypeOf(this, DefinitionsParseError.prototype)
  }
}

export class MissingDefinitionsKeyError extends Error {
  constructor(readonly path: string) {
    super(`invalid ${path} file format (missing definitions)`)
    this.name = 'MissingDefinitionsKeyError'
    Object.setPrototypeOf(this, MissingDefinitionsKeyError.prototype)
  }
}

/** A schema references definitions but no usable pool is active. */
export class PoolUnusableError extends Error {
  constructor() {
    super('missing definitions')
    this.name = 'PoolUnusableError'
    Object.setPrototypeOf(this, PoolUnusableError.prototype)
  }
}

export class UnknownDefinitionError extends Error {
  constructor(readonly definition: string) {
    super(`missing definition ${definition}`)
    this.name = 'UnknownDefinitionError'
    Object.setPrototypeOf(this, UnknownDefinitionError.prototype)
  }
}

export class SchemaParseError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`cannot parse schema ${path}: ${reason}`)
    this.name = 'SchemaParseError'
    Object.setPrototypeOf(this, SchemaParseError.prototype)
  }
}

/** The `definitions` key is reserved for injection. */
export class SchemaHasDefinitionsError extends Error {
  constructor(readonly path: string) {
    super(`${path} file must not have "definitions" field`)
    this.name = 'SchemaHasDefinitionsError'
    Object.setPrototypeOf(this, SchemaHasDefinitionsError.prototype)
  }
}

export class OutputWriteError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`cannot write generated file ${path}: ${reason}`)
    this.name = 'OutputWriteError'
    Object.setPrototypeOf(this, OutputWriteError.prototype)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
