import type { IConfigStore } from "../ports/store"
import { AlreadyInitializedError, HandleNotInstalledError } from "./errors"

/**
 * Holder for the store of a run, owned by the embedding program.
 *
 * The library creates no shared instance; a program that wants "import and
 * use anywhere" access exports one handle from its own module.
 *
 * @example
 * ```typescript
 * // app/config.ts
 * export const config = new ConfigHandle()
 *
 * // main.ts
 * config.install(mergeConfig(new ConfigStore(), { sources: [program] }))
 *
 * // anywhere else
 * const batchSize = config.store.setIfAbsent("batch_size", 32)
 * ```
 */
export class ConfigHandle {
  private installed: IConfigStore | undefined

  get isInstalled(): boolean {
    return this.installed !== undefined
  }

  get store(): IConfigStore {
    if (!this.installed) throw new HandleNotInstalledError()

    return this.installed
  }

  install(store: IConfigStore): IConfigStore {
    if (this.installed) {
      throw new AlreadyInitializedError("Config handle", this.installed.keys())
    }
    this.installed = store

    return store
  }
}
