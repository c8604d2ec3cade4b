import type { ExportFormat, GlobalParameters } from '@/types'

export const DEFAULT_GLOBAL_PARAMETERS: Readonly<GlobalParameters> = {
  referenceWidth: 2560,
  referenceHeight: 1440,
  scalePercent: 50,
}

export const DEFAULT_RATIO = { ratioW: 16, ratioH: 9 } as const

export const SCALE_PERCENT_MIN = 0
export const SCALE_PERCENT_MAX = 100

// 预览时在视口内留出 10% 边距
export const PREVIEW_MARGIN = 0.9

export const DEFAULT_FILENAME_STEM = 'wallpaper'

// 结果摘要中最多展示的错误条数
export const MAX_FAILURE_DETAILS = 3

// 按 id 循环取色
export const SCREEN_COLORS = ['#CC9709', '#C74405', '#CC0058', '#692ECC', '#2F6ECC', '#080E24'] as const

export const EXTENSION_FORMATS: Partial<Record<string, ExportFormat>> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.webp': 'webp',
  '.gif': 'gif',
  '.tif': 'tiff',
  '.tiff': 'tiff',
  '.avif': 'avif',
}

export function isDebugEnabled(): boolean {
  return process.env.WALLPAPER_SPLIT_DEBUG === '1'
}
