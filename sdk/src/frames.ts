import type WebSocket from 'ws'
import { ProtocolError } from './errors'

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue }

/** Text payload of an inbound ws frame. */
export function frameText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

export function encodeJson(message: unknown): string {
  const text = JSON.stringify(message)
  // JSON.stringify yields undefined for undefined, functions and symbols
  if (text === undefined) throw new TypeError('Message is not JSON-serialisable')
  return text
}

export function decodeJson(frame: string): JsonValue {
  try {
    return JSON.parse(frame)
  } catch (err) {
    throw new ProtocolError(`Frame is not valid JSON: ${frame.slice(0, 80)}`, { cause: err, frame })
  }
}
