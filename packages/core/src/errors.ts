import type { FieldError } from '@scoreboard-hub/config-store'
import type { RegistryError } from '@scoreboard-hub/plugin-registry'
import type { RestartErrorCode } from '@scoreboard-hub/process-control'

/** The failure whose rollback could not be completed. */
export type UnrecoverableTrigger =
  | 'StagingFailed'
  | 'Cancelled'
  | 'RestartFailed'
  | 'HealthCheckFailed'
  | 'CommitFailed'

export type ChangeError =
  | Exclude<RegistryError, { code: 'MissingDependency' }>
  | { code: 'ValidationError'; field: string; reason: string; issues: FieldError[] }
  | { code: 'Cancelled' }
  | { code: 'StoreUnavailable'; message: string }
  | { code: 'StagingFailed'; message: string }
  | { code: 'RestartFailed'; cause: RestartErrorCode; message: string; rollbackRestarted: boolean }
  | {
      code: 'HealthCheckFailed'
      attempts: number
      rollbackRestarted: boolean
      lastError: string | null
    }
  | { code: 'CommitFailed'; message: string; rollbackRestarted: boolean }
  | { code: 'Unrecoverable'; trigger: UnrecoverableTrigger; message: string }
  | { code: 'TransactionBusy'; holder: string | null }

export type ChangeErrorCode = ChangeError['code']

/** One line describing `error` for an operator. */
export function formatChangeError(error: ChangeError): string {
  switch (error.code) {
    case 'BadManifest':
      return `Invalid plugin package: ${error.issues.join('; ')}`
    case 'DuplicateId':
      return `Plugin ${error.id} is already installed. Use \`plugins upgrade\` to replace it.`
    case 'FileCollision':
      return error.owner
        ? `Plugin files would overwrite ${error.path}, owned by ${error.owner}`
        : `Plugin files would overwrite ${error.path}, which no installed plugin owns. Remove it and retry.`
    case 'KeyCollision':
      return `${error.key} is already provided by ${error.owner}`
    case 'NotFound':
      return `Plugin ${error.id} is not installed`
    case 'DependencyUnresolved':
      return `${error.requiredBy} requires ${error.id}, which is not installed or not enabled`
    case 'CyclicDependency':
      return `Dependency cycle: ${error.chain.join(' -> ')}`
    case 'VersionMismatch':
      return `${error.requiredBy} requires ${error.id} ${error.required} (same major), found ${error.found}`
    case 'HasDependents':
    case 'HasEnabledDependents':
      return `Enabled plugins depend on it: ${error.dependents.join(', ')}. Disable them first.`
    case 'PluginUnavailable':
      return `Plugin ${error.id} is unavailable: ${error.reason}`
    case 'ValidationError': {
      const issues = error.issues.map((issue) => `${issue.field}: ${issue.reason}`)
      return `Invalid configuration: ${issues.join('; ')}`
    }
    case 'Cancelled':
      return 'Change cancelled before the scoreboard was restarted'
    case 'StoreUnavailable':
    case 'StagingFailed':
      return error.message
    case 'RestartFailed':
      return error.rollbackRestarted
        ? `Restart failed (${error.cause}): ${error.message}; rolled back and restarted on the previous configuration`
        : `Restart failed (${error.cause}): ${error.message}. The previous configuration is still in place.`
    case 'HealthCheckFailed': {
      const last = error.lastError ? ` (last: ${error.lastError})` : ''
      return `Scoreboard did not become healthy after ${error.attempts} check(s)${last}; rolled back${error.rollbackRestarted ? ' and restarted' : ''}`
    }
    case 'CommitFailed':
      return `Commit failed: ${error.message}; rolled back${error.rollbackRestarted ? ' and restarted' : ''}`
    case 'Unrecoverable':
      return `${error.message}. Operator action required: check the scoreboard process, then run \`scoreboard-hub recover\`.`
    case 'TransactionBusy':
      return `Another change is in progress${error.holder ? ` (${error.holder})` : ''}. Retry when it has finished.`
  }
}
