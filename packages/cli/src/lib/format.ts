import { configValueSchema, type ConfigValue } from '@scoreboard-hub/config-store'
import {
  formatChangeError,
  type ChangeOutcome,
  type HubStatus,
  type ProcessActionOutcome,
  type RecoveryReport,
} from '@scoreboard-hub/core'
import type { BoardInfo, PluginListing } from '@scoreboard-hub/plugin-registry'
import type { ProcessInfo } from '@scoreboard-hub/process-control'

export const EXIT_ROLLED_BACK = 1
export const EXIT_UNRECOVERABLE = 2
export const EXIT_BUSY = 3

/** `key=value`, the value read as JSON when it parses and as a string otherwise. */
export function parseAssignment(text: string): [string, ConfigValue] {
  const idx = text.indexOf('=')
  const key = idx > 0 ? text.slice(0, idx).trim() : ''
  if (!key) {
    throw new Error(`Expected key=value, got "${text}"`)
  }
  return [key, parseValue(text.slice(idx + 1))]
}

export function parseValue(raw: string): ConfigValue {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return raw
  }
  const value = configValueSchema.safeParse(parsed)
  return value.success ? value.data : raw
}

export function exitCodeFor(outcome: ChangeOutcome): number {
  switch (outcome.status) {
    case 'committed':
      return 0
    case 'rejected':
      return EXIT_BUSY
    case 'rolled-back':
      return outcome.error.code === 'Unrecoverable' ? EXIT_UNRECOVERABLE : EXIT_ROLLED_BACK
  }
}

export function describeOutcome(outcome: ChangeOutcome): string {
  switch (outcome.status) {
    case 'committed':
      return outcome.changed
        ? `Committed revision ${outcome.revision} (transaction ${outcome.transactionId})`
        : `No change; configuration stays at revision ${outcome.revision}`
    case 'rolled-back':
    case 'rejected':
      return formatChangeError(outcome.error)
  }
}

export function describeProcessAction(outcome: ProcessActionOutcome): string {
  switch (outcome.status) {
    case 'done':
      return `${outcome.action === 'start' ? 'Started' : 'Stopped'} ${outcome.processName}; it is ${outcome.processStatus}`
    case 'failed':
      return `Could not ${outcome.action} ${outcome.processName}: ${outcome.message}`
    case 'rejected':
      return formatChangeError(outcome.error)
  }
}

export function renderProcess(info: ProcessInfo): string {
  return info.description
    ? `${info.name} ${info.stateName} (${info.description})`
    : `${info.name} ${info.stateName}`
}

export function renderStatus(status: HubStatus): string[] {
  const pending = status.pendingTransaction
  return [
    `scoreboard: ${status.scoreboardVersion}`,
    `process: ${status.processName} (${status.processStatus})`,
    `revision: ${status.revision ?? '-'}`,
    `store: ${status.storeProblem ?? 'ok'}`,
    `pending transaction: ${
      pending ? `${pending.transactionId} (${pending.mutation})` : status.journalProblem ?? '-'
    }`,
    `lock: ${
      status.lockHolder
        ? `transaction ${status.lockHolder.transactionId}, pid ${status.lockHolder.pid}`
        : 'free'
    }`,
  ]
}

export function renderListing(listing: PluginListing): string {
  const version = listing.installedVersion ?? listing.indexedVersion ?? '-'
  const update =
    listing.installedVersion &&
    listing.indexedVersion &&
    listing.indexedVersion !== listing.installedVersion
      ? ` (index has ${listing.indexedVersion})`
      : ''
  const problem = listing.problem ? `: ${listing.problem}` : ''
  return `${listing.id} ${version} ${listing.status}${update}${problem}`
}

export function renderBoard(board: BoardInfo): string {
  return `${board.name} "${board.label}" (${board.source})`
}

export function renderRecovery(report: RecoveryReport): string[] {
  switch (report.status) {
    case 'clean':
      return [
        report.removedStagedFiles.length > 0
          ? `No interrupted transaction; removed ${report.removedStagedFiles.length} stale staged file(s)`
          : 'No interrupted transaction',
      ]
    case 'busy':
      return [`Transaction ${report.transactionId ?? '(unknown)'} is still running`]
    case 'recovered': {
      const lines = [
        `Recovered transaction ${report.transactionId ?? '(unknown)'}`,
        `removed staged files: ${report.removedStagedFiles.length}`,
        `removed plugin directories: ${report.removedPluginDirs.length}`,
      ]
      const restart = report.restart
      if (restart && !restart.success) {
        lines.push(`restart failed (${restart.error.code}): ${restart.error.message}`)
      } else {
        lines.push('restart: ok')
      }
      return lines
    }
  }
}
