/** Fault codes supervisord answers with. */
export const SupervisorFault = {
  BAD_NAME: 10,
  ABNORMAL_TERMINATION: 40,
  SPAWN_ERROR: 50,
  ALREADY_STARTED: 60,
  NOT_RUNNING: 70,
} as const

export class SupervisorFaultError extends Error {
  readonly faultCode: number
  readonly faultString: string

  constructor(faultCode: number, faultString: string) {
    super(`Supervisor fault ${faultCode}: ${faultString}`)
    this.name = 'SupervisorFaultError'
    this.faultCode = faultCode
    this.faultString = faultString
  }
}

export class SupervisorUnreachableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SupervisorUnreachableError'
  }
}

export function isFault(err: unknown, faultCode: number): boolean {
  return err instanceof SupervisorFaultError && err.faultCode === faultCode
}
