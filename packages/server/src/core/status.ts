import statusCodes from './status-codes.json'

const STATUS_TEXT: Readonly<Record<string, string>> = statusCodes

export function reasonPhrase(status: number): string {
  return STATUS_TEXT[String(status)] ?? 'Unknown'
}

export function isValidStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 599
}

/**
 * 1xx, 204 and 304 responses never carry a body or Content-Length
 */
export function isBodylessStatus(status: number): boolean {
  return status < 200 || status === 204 || status === 304
}
