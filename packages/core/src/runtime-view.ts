import * as path from 'node:path'

import { createLogger, type Logger } from '@scoreboard-hub/config'
import { atomicWriteFile, type ConfigDocument } from '@scoreboard-hub/config-store'
import type { PluginCatalog, PluginLayout } from '@scoreboard-hub/plugin-registry'

export interface RuntimePluginEntry {
  name: string
  version: string
  /** Version directory relative to the scoreboard root. */
  path: string
  entry: string
}

export interface RuntimeViewOptions {
  root: string
  configFile: string
  pluginsFile: string
  layout: PluginLayout
  logger?: Logger
}

/**
 * Renders the files the scoreboard reads. The hub's canonical document stays
 * in `.hub/`; the scoreboard only ever sees what was last published here.
 */
export class RuntimeViewPublisher {
  private readonly root: string
  private readonly configFile: string
  private readonly pluginsFile: string
  private readonly layout: PluginLayout
  private readonly logger: Logger

  constructor(options: RuntimeViewOptions) {
    this.root = options.root
    this.configFile = options.configFile
    this.pluginsFile = options.pluginsFile
    this.layout = options.layout
    this.logger = options.logger ?? createLogger('RuntimeView')
  }

  render(document: ConfigDocument, catalog: PluginCatalog): { config: string; plugins: string } {
    const plugins: RuntimePluginEntry[] = catalog.enabledManifests().map((manifest) => ({
      name: manifest.id,
      version: manifest.version,
      path: path
        .relative(this.root, this.layout.versionDir(manifest.id, manifest.version))
        .split(path.sep)
        .join('/'),
      entry: manifest.entry,
    }))
    return {
      config: `${JSON.stringify(document.values, null, 2)}\n`,
      plugins: `${JSON.stringify({ plugins }, null, 2)}\n`,
    }
  }

  async publish(document: ConfigDocument, catalog: PluginCatalog): Promise<void> {
    const rendered = this.render(document, catalog)
    await atomicWriteFile(this.configFile, rendered.config)
    await atomicWriteFile(this.pluginsFile, rendered.plugins)
    this.logger.debug(`Published runtime view of revision ${document.revision}`)
  }
}
