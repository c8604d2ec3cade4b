import type { ScreenConfig } from '@/types'

export function formatRatio(screen: Pick<ScreenConfig, 'ratioW' | 'ratioH'>): string {
  return `${screen.ratioW}:${screen.ratioH}`
}

export function formatScreenTitle(screen: Pick<ScreenConfig, 'id'>): string {
  return `屏幕 ${screen.id + 1}`
}

/**
 * 配置面板标题栏："16:9 • 2560x1440"
 */
export function formatScreenSummary(screen: ScreenConfig): string {
  return `${formatRatio(screen)} • ${screen.width}x${screen.height}`
}

/**
 * 预览框左上角的四行标注
 */
export function buildScreenLabel(screen: ScreenConfig): string {
  return [
    formatScreenTitle(screen),
    formatRatio(screen),
    `${screen.width}x${screen.height}`,
    `(${screen.x}, ${screen.y})`,
  ].join('\n')
}

/**
 * 缩放滑块旁的说明："50% (×1.00)"
 */
export function formatScaleInfo(scalePercent: number, scaleFactor: number): string {
  return `${scalePercent}% (×${scaleFactor.toFixed(2)})`
}
