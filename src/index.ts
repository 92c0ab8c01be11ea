export { runCodegen, type CodegenOptions, type CodegenResult } from './codegen/index.js'
export { runGlobCodegen, discoverGlobTargets, type GlobTarget, type GlobCodegenOptions } from './codegen/glob.js'
export { TempDirBlobStore, createTempDirBlobStore, type BlobStore, type BlobStoreFactory, type BlobEntry } from './codegen/blobStore.js'
export { SCHEMA_FILE, encodeArchive, decodeArchive, generateSchemaTs } from './codegen/generateSchemaFile.js'
export { BIND_FILE, generateBindTs } from './codegen/generateBindFile.js'
export { DefinitionPool, loadDefinitionPool, DEFINITIONS_FILE, DEFINITIONS_KEY } from './resolve/definitions.js'
export { scanReferences, parseDefinitionRef } from './resolve/references.js'
export { resolveDefinitions, resolveDocumentDefinitions } from './resolve/closure.js'
export { walkSchemaTree, resolveSchemaDocument, type SchemaSink, type WalkOptions, type WalkResult } from './resolve/walker.js'
export { PartitionRouter, type PartitionPolicy, type PartitionRouterOptions, type RoutedSchema } from './resolve/router.js'
export { runPool, lastFailure, type Settled } from './core/pool.js'
export * from './core/errors.js'
export * from './core/logger.js'
export * from './core/config.js'
export type { JsonValue, JsonObject, JsonPrimitive } from './core/json.js'
