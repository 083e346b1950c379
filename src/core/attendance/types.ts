import type { MessageDeliveryError } from '../errors.js'

export interface CheckInRequest {
  name: string
  /** ISO-8601; when absent the current time is used. Offset-less values are local to the configured zone. */
  when?: string
}

export type CheckInOutcome =
  | { status: 'duplicate'; name: string; date: string }
  | { status: 'ok'; name: string; date: string; late: boolean; localTime: string; message: string }
  | { status: 'notify_failed'; name: string; date: string; late: boolean; error: MessageDeliveryError }

export type CheckInStatus = CheckInOutcome['status']
