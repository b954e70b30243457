import { isCompatibleVersion, type PluginDependency, type PluginManifest } from './manifest.js'
import type { PlanError, RegistryResult } from './types.js'

export interface PlannerNode {
  /** Null when the plugin's manifest is unavailable. */
  manifest: PluginManifest | null
  enabled: boolean
  problem: string | null
}

export interface DependencyGraph {
  node(id: string): PlannerNode | undefined
  ids(): string[]
}

export interface EnablePlan {
  id: string
  /** Every plugin the target needs, dependencies before dependents, ending with the target. */
  order: string[]
  /** The subset of `order` not enabled yet. */
  toEnable: string[]
}

export interface DisablePlan {
  id: string
  alreadyDisabled: boolean
}

type Frame = { id: string; dependencies: PluginDependency[]; next: number }

/**
 * Resolves what must be enabled for `id`, dependencies first. Iterative
 * depth-first search with white/grey/black marking; the first back edge is
 * reported as the chain from the repeated plugin back to itself.
 */
export function planEnable(graph: DependencyGraph, id: string): RegistryResult<EnablePlan, PlanError> {
  const root = graph.node(id)
  if (!root) return { success: false, error: { code: 'NotFound', id } }
  if (!root.manifest) {
    return {
      success: false,
      error: { code: 'PluginUnavailable', id, reason: root.problem ?? 'manifest unavailable' },
    }
  }

  const marks = new Map<string, 'grey' | 'black'>()
  const chain: string[] = [id]
  const order: string[] = []
  const stack: Frame[] = [{ id, dependencies: root.manifest.dependencies, next: 0 }]
  marks.set(id, 'grey')

  while (stack.length > 0) {
    const frame = stack[stack.length - 1]
    if (!frame) break

    const dependency = frame.dependencies[frame.next]
    if (!dependency) {
      stack.pop()
      chain.pop()
      marks.set(frame.id, 'black')
      order.push(frame.id)
      continue
    }
    frame.next += 1

    const target = graph.node(dependency.id)
    if (!target) {
      return {
        success: false,
        error: { code: 'MissingDependency', id: dependency.id, requiredBy: frame.id },
      }
    }
    if (!target.manifest) {
      return {
        success: false,
        error: {
          code: 'PluginUnavailable',
          id: dependency.id,
          reason: target.problem ?? 'manifest unavailable',
        },
      }
    }
    if (!isCompatibleVersion(target.manifest.version, dependency.minVersion)) {
      return {
        success: false,
        error: {
          code: 'VersionMismatch',
          id: dependency.id,
          required: dependency.minVersion,
          found: target.manifest.version,
          requiredBy: frame.id,
        },
      }
    }

    const mark = marks.get(dependency.id)
    if (mark === 'grey') {
      const start = chain.indexOf(dependency.id)
      return {
        success: false,
        error: { code: 'CyclicDependency', chain: [...chain.slice(start), dependency.id] },
      }
    }
    if (mark === 'black') continue

    marks.set(dependency.id, 'grey')
    chain.push(dependency.id)
    stack.push({ id: dependency.id, dependencies: target.manifest.dependencies, next: 0 })
  }

  const toEnable = order.filter((pluginId) => !graph.node(pluginId)?.enabled)
  return { success: true, value: { id, order, toEnable } }
}

/** Enabled plugins that declare a dependency on `id`, sorted. */
export function enabledDependents(graph: DependencyGraph, id: string): string[] {
  return graph
    .ids()
    .filter((other) => {
      const node = graph.node(other)
      if (!node?.enabled || !node.manifest) return false
      return node.manifest.dependencies.some((dependency) => dependency.id === id)
    })
    .sort()
}

export function planDisable(graph: DependencyGraph, id: string): RegistryResult<DisablePlan, PlanError> {
  const node = graph.node(id)
  if (!node) return { success: false, error: { code: 'NotFound', id } }
  const dependents = enabledDependents(graph, id)
  if (node.enabled && dependents.length > 0) {
    return { success: false, error: { code: 'HasEnabledDependents', dependents } }
  }
  return { success: true, value: { id, alreadyDisabled: !node.enabled } }
}
