import { asValue, createContainer, InjectionMode, type AwilixContainer } from 'awilix'
import { getOrm, resolveOrmDriverKind, type OrmDriverKind, type SqlOrm } from '../db/mikro'

export type AppContainer = AwilixContainer
export type DiRegistrar = (container: AppContainer) => void
export type ContainerBootstrap = (container: AppContainer) => Promise<void> | void

declare global {
  // eslint-disable-next-line no-var
  var __tesseraContainer: Promise<AppContainer> | undefined
}

const diRegistrars: DiRegistrar[] = []
const bootstraps: ContainerBootstrap[] = []

export function registerDiRegistrars(registrars: DiRegistrar[]): void {
  for (const registrar of registrars) {
    if (!diRegistrars.includes(registrar)) diRegistrars.push(registrar)
  }
}

export function registerContainerBootstrap(bootstrap: ContainerBootstrap): void {
  if (!bootstraps.includes(bootstrap)) bootstraps.push(bootstrap)
}

/**
 * Creates a root container around an initialized ORM: the ORM and its root
 * entity manager are registered as values, then every module registrar runs,
 * then every bootstrap hook.
 */
export async function buildAppContainer(orm: SqlOrm, databaseKind: OrmDriverKind): Promise<AppContainer> {
  const container = createContainer({ injectionMode: InjectionMode.PROXY })
  container.register({
    orm: asValue(orm),
    em: asValue(orm.em),
    databaseKind: asValue(databaseKind),
  })
  for (const registrar of diRegistrars) {
    registrar(container)
  }
  for (const bootstrap of bootstraps) {
    await bootstrap(container)
  }
  return container
}

export async function getAppContainer(): Promise<AppContainer> {
  if (!globalThis.__tesseraContainer) {
    globalThis.__tesseraContainer = (async () => {
      const orm = await getOrm()
      return buildAppContainer(orm, resolveOrmDriverKind(process.env.DATABASE_URL ?? ''))
    })()
    globalThis.__tesseraContainer.catch(() => {
      globalThis.__tesseraContainer = undefined
    })
  }
  return globalThis.__tesseraContainer
}

/** Request scope with its own forked entity manager; singletons stay shared. */
export async function createRequestContainer(): Promise<AppContainer> {
  const root = await getAppContainer()
  const scope = root.createScope()
  const orm = root.resolve<SqlOrm>('orm')
  scope.register({
    em: asValue(orm.em.fork({ clear: true })),
  })
  return scope
}

export async function disposeAppContainer(): Promise<void> {
  const pending = globalThis.__tesseraContainer
  globalThis.__tesseraContainer = undefined
  if (pending) {
    const container = await pending
    await container.dispose()
  }
}
