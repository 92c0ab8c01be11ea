import { resolve } from 'node:path'
import { describe, expect, it, vi } from 'vitest'
import type { runCodegen } from './codegen/index.js'
import type { runGlobCodegen } from './codegen/glob.js'
import { SchemaHasDefinitionsError } from './core/errors.js'
import { createRecordingLogger } from './test-utils/tree.js'
import { runCli, type CliDependencies } from './program.js'

function createDeps(env: Record<string, string | undefined> = {}) {
  const logger = createRecordingLogger()
  const deps = {
    runCodegen: vi.fn<typeof runCodegen>().mockResolvedValue({ services: ['svc'], files: [], schemas: [], shadowed: [] }),
    runGlobCodegen: vi.fn<typeof runGlobCodegen>().mockResolvedValue([]),
    env,
    cwd: resolve('/work'),
    createLogger: vi.fn<CliDependencies['createLogger']>().mockReturnValue(logger),
  }
  return { deps, logger }
}

describe('runCli', () => {
  it('generates one explicit tree', async () => {
    const { deps, logger } = createDeps({ SCHEMABIND_WORKERS: '2' })

    const code = await runCli(['node', 'schemabind', 'generate', '--input', 'schemas', '--output', 'gen', '--separate'], deps)

    expect(code).toBe(0)
    expect(deps.runCodegen).toHaveBeenCalledWith({
      input: resolve('/work', 'schemas'),
      outputDir: resolve('/work', 'gen'),
      policy: 'separate',
      logger,
      concurrency: 2,
    })
    expect(deps.runGlobCodegen).not.toHaveBeenCalled()
  })

  it('merges unless --separate is given', async () => {
    const { deps } = createDeps()

    await runCli(['node', 'schemabind', 'generate', '-i', 'schemas', '-o', 'gen'], deps)

    expect(deps.runCodegen).toHaveBeenCalledWith(expect.objectContaining({ policy: 'merge' }))
  })

  it('runs glob mode without --input and --output', async () => {
    const { deps } = createDeps({ SCHEMABIND_PATH: '/work/project', SCHEMABIND_WORKERS: '4' })

    const code = await runCli(['node', 'schemabind', 'generate'], deps)

    expect(code).toBe(0)
    expect(deps.runGlobCodegen).toHaveBeenCalledWith(
      expect.objectContaining({ searchRoots: ['/work/project'], policy: 'merge', concurrency: 4 })
    )
    expect(deps.runCodegen).not.toHaveBeenCalled()
  })

  it('rejects --input without --output', async () => {
    const { deps, logger } = createDeps()

    const code = await runCli(['node', 'schemabind', 'generate', '--input', 'schemas'], deps)

    expect(code).toBe(1)
    expect(logger.error).toHaveBeenCalledWith('--input and --output must be given together')
    expect(deps.runCodegen).not.toHaveBeenCalled()
    expect(deps.runGlobCodegen).not.toHaveBeenCalled()
  })

  it('exits with 1 and logs the error when generation fails', async () => {
    const { deps, logger } = createDeps()
    deps.runCodegen.mockRejectedValue(new SchemaHasDefinitionsError('svc/m.json'))

    const code = await runCli(['node', 'schemabind', 'generate', '--input', 'schemas', '--output', 'gen'], deps)

    expect(code).toBe(1)
    expect(logger.error).toHaveBeenCalledWith('svc/m.json file must not have "definitions" field')
  })

  it('turns on debug output with --verbose or SCHEMABIND_DEBUG', async () => {
    const flagged = createDeps()
    await runCli(['node', 'schemabind', 'generate', '-i', 'a', '-o', 'b', '--verbose'], flagged.deps)
    expect(flagged.deps.createLogger).toHaveBeenCalledWith(true)

    const fromEnv = createDeps({ SCHEMABIND_DEBUG: '1' })
    await runCli(['node', 'schemabind', 'generate', '-i', 'a', '-o', 'b'], fromEnv.deps)
    expect(fromEnv.deps.createLogger).toHaveBeenCalledWith(true)

    const quiet = createDeps()
    await runCli(['node', 'schemabind', 'generate', '-i', 'a', '-o', 'b'], quiet.deps)
    expect(quiet.deps.createLogger).toHaveBeenCalledWith(false)
  })
})
