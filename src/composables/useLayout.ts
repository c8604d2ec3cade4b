import type { GlobalParameters, ScreenConfig } from '@/types'
import { isDebugEnabled } from '@/constants/defaults'
import { assertGlobalParameters, computeResolutionFor } from '@/utils/resolution'

/**
 * 按当前全局参数重新计算所有屏幕的分辨率。
 * 返回新数组，不修改入参；任一参数不合法时整体抛错，不做部分更新。
 */
export function recomputeResolutions(
  screens: readonly ScreenConfig[],
  params: GlobalParameters
): ScreenConfig[] {
  assertGlobalParameters(params)

  if (isDebugEnabled()) {
    console.debug(
      `[Layout] recompute ${screens.length} screen(s) with ref=${params.referenceWidth}x${params.referenceHeight}, scale=${params.scalePercent}%`
    )
  }

  // 先全部算完再组装结果，保证失败时不会留下半成品
  const resolutions = screens.map(s => computeResolutionFor(s, params))
  return screens.map((s, i) => ({ ...s, ...resolutions[i] }))
}
