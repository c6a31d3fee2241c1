import type { Module } from '@sqlcron/shared/modules/registry'

let cliModules: Module[] = []

export function registerCliModules(modules: Module[]): void {
  cliModules = modules
}

export function getCliModules(): Module[] {
  return cliModules
}

export function hasCliModules(): boolean {
  return cliModules.length > 0
}
