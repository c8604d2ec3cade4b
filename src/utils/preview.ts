import type { PreviewRect, PreviewTransform, ScreenConfig, Size, ViewportRect } from '@/types'
import { PREVIEW_MARGIN } from '@/constants/defaults'
import { screenColor } from './screens'
import { buildScreenLabel } from './screenLabel'

/**
 * 计算原图在预览视口中的缩放与居中偏移。
 * 视口尚未布局（边长 <= 1）或图片尺寸无效时返回 null，由调用方稍后重试。
 */
export function computePreviewTransform(viewport: Size, image: Size): PreviewTransform | null {
  if (viewport.width <= 1 || viewport.height <= 1) return null
  if (image.width <= 0 || image.height <= 0) return null

  const scale = Math.min(viewport.width / image.width, viewport.height / image.height) * PREVIEW_MARGIN
  const scaledWidth = Math.floor(image.width * scale)
  const scaledHeight = Math.floor(image.height * scale)

  return {
    scale,
    scaledWidth,
    scaledHeight,
    xOffset: Math.floor((viewport.width - scaledWidth) / 2),
    yOffset: Math.floor((viewport.height - scaledHeight) / 2),
  }
}

/**
 * 原图坐标 → 视口坐标
 */
export function projectScreen(
  screen: Pick<ScreenConfig, 'x' | 'y' | 'width' | 'height'>,
  scaleFactor: number,
  xOffset: number,
  yOffset: number
): ViewportRect {
  return {
    x1: Math.floor(screen.x * scaleFactor) + xOffset,
    y1: Math.floor(screen.y * scaleFactor) + yOffset,
    x2: Math.floor((screen.x + screen.width) * scaleFactor) + xOffset,
    y2: Math.floor((screen.y + screen.height) * scaleFactor) + yOffset,
  }
}

export function buildPreviewRects(
  screens: readonly ScreenConfig[],
  transform: PreviewTransform
): PreviewRect[] {
  return screens.map(screen => ({
    ...projectScreen(screen, transform.scale, transform.xOffset, transform.yOffset),
    screenId: screen.id,
    color: screenColor(screen.id),
    label: buildScreenLabel(screen),
  }))
}
