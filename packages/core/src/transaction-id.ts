import { v7 as uuidv7 } from 'uuid'

/**
 * UUIDv7 from uuid's own clock and counter, so ids issued by one hub process
 * increase strictly, including within the same millisecond.
 */
export function newTransactionId(): string {
  return uuidv7()
}
