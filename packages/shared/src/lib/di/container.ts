import { createContainer, InjectionMode, type AwilixContainer } from 'awilix'

export type AppContainer<Cradle extends object = Record<string, unknown>> = AwilixContainer<Cradle>

/**
 * Create the application container. Modules add their services through
 * their own `register(container, ...)` function.
 */
export function createAppContainer<Cradle extends object>(): AppContainer<Cradle> {
  return createContainer<Cradle>({
    injectionMode: InjectionMode.PROXY,
  })
}
