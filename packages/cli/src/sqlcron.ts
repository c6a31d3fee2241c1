import type { Module } from '@sqlcron/shared/modules/registry'
import { schedulerModule } from '@sqlcron/scheduler/modules/scheduler/index'
import { getCliModules, hasCliModules, registerCliModules } from './registry'
export { getCliModules, hasCliModules, registerCliModules }

let envLoaded = false

async function ensureEnvLoaded(): Promise<void> {
  if (envLoaded) return
  envLoaded = true
  const dotenv = await import('dotenv')
  dotenv.config()
}

function builtInModules(): Module[] {
  return [schedulerModule]
}

function printHelp(modules: Module[]): void {
  const pad = (s: string) => `  ${s}`
  console.log(pad('Usage: sqlcron <module> <command> [args]'))
  const lines = modules
    .filter((m) => m.cli && m.cli.length > 0)
    .flatMap((m) => (m.cli ?? []).map((c) => `• ${m.id} ${c.command}${c.description ? ` - ${c.description}` : ''}`))
  if (lines.length) {
    console.log('\n' + pad('Available:'))
    console.log(lines.map(pad).join('\n'))
  } else {
    console.log(pad('No CLI commands available'))
  }
}

/**
 * Dispatch `sqlcron <module> <command> [...args]` and return the exit code
 */
export async function run(argv: string[] = process.argv): Promise<number> {
  await ensureEnvLoaded()
  if (!hasCliModules()) {
    registerCliModules(builtInModules())
  }

  const [, , modName, cmdName, ...rest] = argv
  const all = getCliModules()

  if (!modName || modName === 'help' || modName === '--help' || modName === '-h') {
    printHelp(all)
    return 0
  }

  const mod = all.find((m) => m.id === modName)
  if (!mod) {
    console.error(`Module not found: "${modName}"`)
    return 1
  }
  if (!mod.cli || mod.cli.length === 0) {
    console.error(`Module "${modName}" has no CLI commands`)
    return 1
  }
  if (!cmdName) {
    console.log(`Commands for "${modName}": ${mod.cli.map((c) => c.command).join(', ')}`)
    return 1
  }
  const cmd = mod.cli.find((c) => c.command === cmdName)
  if (!cmd) {
    console.error(`Unknown command "${cmdName}". Available: ${mod.cli.map((c) => c.command).join(', ')}`)
    return 1
  }

  try {
    await cmd.run(rest)
    return typeof process.exitCode === 'number' ? process.exitCode : 0
  } catch (error: unknown) {
    console.error(`Failed: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}
