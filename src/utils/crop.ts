import type { CropRect, ScreenConfig, Size } from '@/types'

/**
 * 屏幕在原图中的裁剪区域 (x, y, x + width, y + height)
 */
export function screenCropRect(screen: Pick<ScreenConfig, 'x' | 'y' | 'width' | 'height'>): CropRect {
  return { x: screen.x, y: screen.y, width: screen.width, height: screen.height }
}

export function isWithinBounds(rect: CropRect, image: Size): boolean {
  return (
    rect.x >= 0 &&
    rect.y >= 0 &&
    rect.x + rect.width <= image.width &&
    rect.y + rect.height <= image.height
  )
}
