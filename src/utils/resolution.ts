import type { GlobalParameters, Resolution } from '@/types'
import { SCALE_PERCENT_MAX, SCALE_PERCENT_MIN } from '@/constants/defaults'
import { InvalidParameterError } from './errors'
import { assertPositiveInteger } from './math'

/**
 * 缩放百分比 → 倍率
 * 0% = ×0.5，50% = ×1.0，100% = ×2.0，两段分别线性
 */
export function computeScaleFactor(scalePercent: number): number {
  assertScalePercent(scalePercent)
  if (scalePercent <= 50) {
    return 0.5 + scalePercent / 100
  }
  return 1 + (scalePercent - 50) / 50
}

export function assertScalePercent(scalePercent: number): void {
  if (
    !Number.isInteger(scalePercent) ||
    scalePercent < SCALE_PERCENT_MIN ||
    scalePercent > SCALE_PERCENT_MAX
  ) {
    throw new InvalidParameterError(
      'scalePercent',
      `缩放必须是 ${SCALE_PERCENT_MIN}–${SCALE_PERCENT_MAX} 之间的整数（当前：${scalePercent}）`
    )
  }
}

export function assertGlobalParameters(params: GlobalParameters): void {
  assertPositiveInteger('referenceWidth', params.referenceWidth)
  assertPositiveInteger('referenceHeight', params.referenceHeight)
  assertScalePercent(params.scalePercent)
}

/**
 * 根据参考分辨率、缩放和屏幕比例计算输出分辨率。
 * - 参考分辨率取长边，乘以缩放倍率
 * - 横屏/方屏由宽决定，竖屏由高决定，另一边按比例取整
 */
export function computeResolution(
  ratioW: number,
  ratioH: number,
  referenceWidth: number,
  referenceHeight: number,
  scalePercent: number
): Resolution {
  assertPositiveInteger('ratioW', ratioW)
  assertPositiveInteger('ratioH', ratioH)
  assertPositiveInteger('referenceWidth', referenceWidth)
  assertPositiveInteger('referenceHeight', referenceHeight)

  const scaleFactor = computeScaleFactor(scalePercent)
  const scaledMaxSide = Math.max(referenceWidth, referenceHeight) * scaleFactor

  if (ratioW >= ratioH) {
    const width = Math.max(1, Math.round(scaledMaxSide))
    const height = Math.max(1, Math.round((width * ratioH) / ratioW))
    return { width, height }
  }

  const height = Math.max(1, Math.round(scaledMaxSide))
  const width = Math.max(1, Math.round((height * ratioW) / ratioH))
  return { width, height }
}

export function computeResolutionFor(
  ratio: { ratioW: number; ratioH: number },
  params: GlobalParameters
): Resolution {
  return computeResolution(
    ratio.ratioW,
    ratio.ratioH,
    params.referenceWidth,
    params.referenceHeight,
    params.scalePercent
  )
}
