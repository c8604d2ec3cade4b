import { rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ExportFailure, ExportReport, ExportedFile, ScreenConfig, SourceImage } from '@/types'
import { MAX_FAILURE_DETAILS } from '@/constants/defaults'
import { isWithinBounds, screenCropRect } from '@/utils/crop'
import { InvalidParameterError, describeError } from '@/utils/errors'
import { buildScreenFilename, isErrnoError, resolveUniquePath } from '@/utils/fileNames'
import { cropImage, formatForExtension, normalizeExtension } from '@/utils/image'
import { formatScreenTitle } from '@/utils/screenLabel'

export interface ExportProgress {
  done: number
  total: number
  label?: string
}

export interface ExportOptions {
  onProgress?: (p: ExportProgress) => void
}

/**
 * 以独占方式写入，目标在检查后被占用（EEXIST）时换下一个序号。
 * 其他写入失败会删除可能残留的半成品文件。
 */
async function writeUniqueFile(basePath: string, bytes: Uint8Array): Promise<string> {
  for (;;) {
    const target = await resolveUniquePath(basePath)
    try {
      await writeFile(target, bytes, { flag: 'wx' })
      return target
    } catch (e) {
      if (isErrnoError(e, 'EEXIST')) continue
      await rm(target, { force: true })
      throw e
    }
  }
}

/**
 * 按列表顺序逐个导出屏幕裁剪。
 * 单个屏幕失败只记录到 failures，不中断整批；不修改原图与屏幕列表。
 */
export async function exportScreens(
  image: SourceImage,
  screens: readonly ScreenConfig[],
  outputDir: string,
  stem: string,
  extension: string,
  opts: ExportOptions = {}
): Promise<ExportReport> {
  if (stem.trim().length === 0) {
    throw new InvalidParameterError('stem', '文件名前缀不能为空')
  }
  // 前缀只能是文件名，不能指向输出目录之外
  if (/[\\/]/.test(stem)) {
    throw new InvalidParameterError('stem', `文件名前缀不能包含路径分隔符：${stem}`)
  }
  const ext = normalizeExtension(extension)
  const format = formatForExtension(ext)

  const outputs: ExportedFile[] = []
  const failures: ExportFailure[] = []
  const total = screens.length
  opts.onProgress?.({ done: 0, total, label: '准备导出...' })

  for (let i = 0; i < screens.length; i++) {
    const screen = screens[i]
    const title = formatScreenTitle(screen)
    opts.onProgress?.({ done: i, total, label: title })

    const rect = screenCropRect(screen)
    if (!isWithinBounds(rect, image)) {
      const message = `${title} 超出图片边界`
      failures.push({ screenId: screen.id, kind: 'OutOfBounds', message })
      console.error(`[Export] ${message}`)
      continue
    }

    try {
      const bytes = await cropImage(image, rect, format)
      const basePath = join(outputDir, buildScreenFilename(stem, screen, ext))
      const path = await writeUniqueFile(basePath, bytes)
      outputs.push({ screenId: screen.id, path })
      console.info(`[Export] ${title} extracted: ${path}`)
    } catch (e) {
      const message = `${title} 导出失败：${describeError(e)}`
      failures.push({ screenId: screen.id, kind: 'IOFailure', message })
      console.error(`[Export] ${message}`, e)
    }
  }

  opts.onProgress?.({ done: total, total, label: '导出完成' })
  return { succeededCount: outputs.length, outputs, failures }
}

/**
 * 结果提示文本：成功数量 + 输出目录 + 最多 maxDetails 条错误明细
 */
export function summarizeExportReport(
  report: ExportReport,
  outputDir: string,
  maxDetails: number = MAX_FAILURE_DETAILS
): string {
  const lines: string[] = []
  if (report.succeededCount > 0) {
    lines.push(`已导出 ${report.succeededCount} 个屏幕`, '', `保存位置：${outputDir}`)
    if (report.failures.length > 0) {
      lines.push('', `${report.failures.length} 个错误`)
    }
  } else {
    lines.push('没有成功导出的屏幕')
  }

  const details = report.failures.slice(0, Math.max(0, maxDetails)).map(f => f.message)
  if (details.length > 0) {
    lines.push('', ...details)
  }
  return lines.join('\n')
}
