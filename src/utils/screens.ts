import type { GlobalParameters, ScreenConfig, ScreenUpdate } from '@/types'
import { DEFAULT_RATIO, SCREEN_COLORS } from '@/constants/defaults'
import { recomputeResolutions } from '@/composables/useLayout'
import { computeResolutionFor } from './resolution'
import { InvalidParameterError } from './errors'
import { assertPositiveInteger } from './math'

/**
 * 新建屏幕：默认 16:9，位于 (0, 0)
 */
export function createScreen(nextId: number, params: GlobalParameters): ScreenConfig {
  const base = { ...DEFAULT_RATIO, x: 0, y: 0 }
  return { id: nextId, ...base, ...computeResolutionFor(base, params) }
}

/**
 * 应用一次编辑并重新计算分辨率。校验失败时抛错，原对象不变。
 */
export function applyScreenUpdate(
  screen: ScreenConfig,
  update: ScreenUpdate,
  params: GlobalParameters
): ScreenConfig {
  const next = { ...screen, ...update }
  assertPositiveInteger('ratioW', next.ratioW)
  assertPositiveInteger('ratioH', next.ratioH)
  if (!Number.isSafeInteger(next.x)) {
    throw new InvalidParameterError('x', `x 必须是整数（当前：${next.x}）`)
  }
  if (!Number.isSafeInteger(next.y)) {
    throw new InvalidParameterError('y', `y 必须是整数（当前：${next.y}）`)
  }
  return { ...next, ...computeResolutionFor(next, params) }
}

/**
 * 删除指定下标的屏幕，后续屏幕 id 前移保持从 0 连续，并整体重算分辨率
 */
export function removeScreenAt(
  screens: readonly ScreenConfig[],
  index: number,
  params: GlobalParameters
): ScreenConfig[] {
  if (!Number.isInteger(index) || index < 0 || index >= screens.length) {
    throw new InvalidParameterError('id', `屏幕不存在：${index}`)
  }
  const remaining = screens
    .filter((_, i) => i !== index)
    .map((s, i) => ({ ...s, id: i }))
  return recomputeResolutions(remaining, params)
}

/**
 * 屏幕颜色由 id 推导，不随对象保存
 */
export function screenColor(id: number): string {
  return SCREEN_COLORS[id % SCREEN_COLORS.length]
}
