import { InvalidParameterError } from './errors'

const INTEGER_PATTERN = /^[+-]?\d+$/

/**
 * 解析输入框中的整数；非整数返回 null
 */
export function parseIntegerField(raw: number | string): number | null {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? raw : null
  }
  const text = raw.trim()
  if (!INTEGER_PATTERN.test(text)) return null
  const value = Number(text)
  return Number.isSafeInteger(value) ? value : null
}

export function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0
}

/**
 * 校验正整数，不合法时抛出 InvalidParameterError
 */
export function assertPositiveInteger(field: string, value: number): void {
  if (!isPositiveInteger(value)) {
    throw new InvalidParameterError(field, `${field} 必须是正整数（当前：${value}）`)
  }
}
