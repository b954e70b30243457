import xmlrpc from 'xmlrpc'
import { z } from 'zod'

import { SupervisorFaultError, SupervisorUnreachableError } from './errors.js'

export type XmlRpcParam = string | number | boolean

/** One XML-RPC round trip. Tests replace it with an in-process fake. */
export interface XmlRpcTransport {
  call(method: string, params: XmlRpcParam[]): Promise<unknown>
}

export interface XmlRpcTransportOptions {
  host: string
  port: number
  username: string | null
  password: string | null
}

const faultShape = z.object({ faultCode: z.number(), faultString: z.string() })

function toSupervisorError(err: unknown, endpoint: string): Error {
  const fault = faultShape.safeParse(err)
  if (fault.success) return new SupervisorFaultError(fault.data.faultCode, fault.data.faultString)
  const detail = err instanceof Error ? err.message : String(err)
  return new SupervisorUnreachableError(
    `Supervisor at ${endpoint} did not answer: ${detail}. Check SUPERVISOR_URL and SUPERVISOR_PORT.`,
    { cause: err }
  )
}

export function createXmlRpcTransport(options: XmlRpcTransportOptions): XmlRpcTransport {
  const client = xmlrpc.createClient({
    host: options.host,
    port: options.port,
    path: '/RPC2',
    ...(options.username !== null
      ? { basic_auth: { user: options.username, pass: options.password ?? '' } }
      : {}),
  })
  const endpoint = `http://${options.host}:${options.port}/RPC2`

  return {
    call(method, params) {
      return new Promise((resolve, reject) => {
        client.methodCall(method, params, (error: unknown, value: unknown) => {
          if (error) {
            reject(toSupervisorError(error, endpoint))
            return
          }
          resolve(value)
        })
      })
    },
  }
}
