import type { ConfigSection, ConfigValue } from '@scoreboard-hub/config-store'
import type { PluginPackage } from '@scoreboard-hub/plugin-registry'

export type Mutation =
  | {
      kind: 'set-config'
      /** Dotted keys to the values they should hold. */
      values: Record<string, ConfigValue>
      unset?: string[]
    }
  | { kind: 'replace-config'; values: ConfigSection }
  | { kind: 'enable-plugin'; id: string }
  | { kind: 'disable-plugin'; id: string }
  | { kind: 'install-plugin'; package: PluginPackage }
  | { kind: 'upgrade-plugin'; package: PluginPackage }
  | { kind: 'uninstall-plugin'; id: string; keepConfig?: boolean }

export type MutationKind = Mutation['kind']

export function describeMutation(mutation: Mutation): string {
  switch (mutation.kind) {
    case 'set-config': {
      const keys = [...Object.keys(mutation.values), ...(mutation.unset ?? [])]
      return `set-config ${keys.join(', ')}`
    }
    case 'replace-config':
      return 'replace-config'
    case 'enable-plugin':
    case 'disable-plugin':
    case 'uninstall-plugin':
      return `${mutation.kind} ${mutation.id}`
    case 'install-plugin':
    case 'upgrade-plugin':
      return `${mutation.kind} ${mutation.package.manifest.id}@${mutation.package.manifest.version}`
  }
}
