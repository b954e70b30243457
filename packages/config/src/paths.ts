import { existsSync, mkdirSync, readFileSync } from 'node:fs'
import path from 'node:path'

export type HubPaths = {
  /** The scoreboard installation directory. */
  root: string
  hubDir: string
  statePath: string
  stagingDir: string
  backupsDir: string
  lockFile: string
  journalFile: string
  envFile: string
  pluginsDir: string
  runtimeConfigDir: string
  runtimeConfigFile: string
  runtimePluginsFile: string
  catalogIndexFile: string
  versionFile: string
}

export function resolveHubPaths(scoreboardDir: string): HubPaths {
  const root = path.resolve(scoreboardDir)
  const hubDir = path.join(root, '.hub')
  return {
    root,
    hubDir,
    statePath: path.join(hubDir, 'state.json'),
    stagingDir: path.join(hubDir, 'staging'),
    backupsDir: path.join(hubDir, 'backups'),
    lockFile: path.join(hubDir, 'hub.lock'),
    journalFile: path.join(hubDir, 'pending-transaction.json'),
    envFile: path.join(hubDir, 'hub.env'),
    pluginsDir: path.join(root, 'plugins'),
    runtimeConfigDir: path.join(root, 'config'),
    runtimeConfigFile: path.join(root, 'config', 'config.json'),
    runtimePluginsFile: path.join(root, 'plugins.json'),
    catalogIndexFile: path.join(root, 'plugins_index.json'),
    versionFile: path.join(root, 'VERSION'),
  }
}

export function ensureHubDirs(paths: HubPaths): void {
  const dirs = [
    paths.hubDir,
    paths.stagingDir,
    paths.backupsDir,
    paths.pluginsDir,
    paths.runtimeConfigDir,
  ]
  for (const dir of dirs) {
    mkdirSync(dir, { recursive: true })
  }
}

export function readScoreboardVersion(paths: HubPaths): string {
  if (!existsSync(paths.versionFile)) return 'Unknown'
  const version = readFileSync(paths.versionFile, 'utf8').trim()
  if (!version) return 'Unknown'
  return /^v/i.test(version) ? version : `V${version}`
}
