export type ModuleCli = {
  command: string
  description?: string
  usage?: string
  run: (argv: string[]) => Promise<void> | void
}

export type ModuleInfo = {
  name?: string
  description?: string
  version?: string
}

export type Module = {
  id: string
  info?: ModuleInfo
  cli?: ModuleCli[]
}
