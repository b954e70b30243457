export type ProcessStatus = 'running' | 'stopped' | 'unknown'

/** Supervisor process states, as numbered by `supervisor.getProcessInfo`. */
export const ProcessState = {
  STOPPED: 0,
  STARTING: 10,
  RUNNING: 20,
  BACKOFF: 30,
  STOPPING: 40,
  EXITED: 100,
  FATAL: 200,
  UNKNOWN: 1000,
} as const

export interface ProcessInfo {
  name: string
  group: string
  state: number
  stateName: string
  pid: number
  /** Epoch seconds of the last start; 0 when never started. */
  startedAt: number
  stoppedAt: number
  exitStatus: number
  description: string
}

export type RestartErrorCode = 'Timeout' | 'SupervisorUnreachable' | 'Fault'

export interface RestartError {
  code: RestartErrorCode
  message: string
}

export type RestartResult =
  | { success: true; info: ProcessInfo }
  | { success: false; error: RestartError }

export interface ProcessController {
  status(name: string): Promise<ProcessStatus>
  describe(name: string): Promise<ProcessInfo>
  /**
   * Resolves once the process has left and re-entered RUNNING as a new
   * incarnation, or with an error when that did not happen within `timeoutMs`.
   */
  restart(name: string, timeoutMs: number): Promise<RestartResult>
  start(name: string): Promise<void>
  stop(name: string): Promise<void>
  listProcesses(): Promise<ProcessInfo[]>
  /** The last `bytes` of the process's stderr log. */
  tailStderr(name: string, bytes: number): Promise<string>
}

export function toProcessStatus(state: number): ProcessStatus {
  switch (state) {
    case ProcessState.RUNNING:
      return 'running'
    case ProcessState.STOPPED:
    case ProcessState.EXITED:
    case ProcessState.FATAL:
      return 'stopped'
    default:
      return 'unknown'
  }
}
