import { readFile } from 'node:fs/promises'
import { basename, extname } from 'node:path'
import sharp from 'sharp'
import type { CropRect, ExportFormat, SourceImage } from '@/types'
import { EXTENSION_FORMATS } from '@/constants/defaults'
import { ImageLoadError, InvalidParameterError } from './errors'
import { isWithinBounds } from './crop'

/**
 * 读取图片并解析尺寸、通道与位深。任何读取或解码错误都包装为 ImageLoadError。
 */
export async function loadImage(path: string): Promise<SourceImage> {
  try {
    const input = await readFile(path)
    const meta = await sharp(input).metadata()
    if (!meta.width || !meta.height) {
      throw new Error('无法识别图片尺寸')
    }
    return {
      path,
      name: basename(path),
      format: meta.format ?? 'unknown',
      width: meta.width,
      height: meta.height,
      channels: meta.channels ?? 0,
      depth: meta.depth ?? 'uchar',
      bytes: new Uint8Array(input.buffer, input.byteOffset, input.byteLength),
    }
  } catch (e) {
    throw new ImageLoadError(path, e)
  }
}

/**
 * 规范化扩展名：补全前导点，保留原大小写
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim()
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`
}

/**
 * 扩展名 → 输出格式；不支持的扩展名抛出 InvalidParameterError
 */
export function formatForExtension(extension: string): ExportFormat {
  const ext = normalizeExtension(extension).toLowerCase()
  const format = EXTENSION_FORMATS[ext]
  if (!format) {
    throw new InvalidParameterError(
      'extension',
      `不支持的导出格式：${extension}（支持 ${Object.keys(EXTENSION_FORMATS).join(' ')}）`
    )
  }
  return format
}

/**
 * 源图的扩展名，作为默认导出扩展名
 */
export function sourceExtension(image: Pick<SourceImage, 'path' | 'format'>): string {
  const ext = extname(image.path)
  if (ext) return ext
  return image.format === 'jpeg' ? '.jpg' : `.${image.format}`
}

/**
 * 从原始文件字节中截取区域并编码，不做重采样，保留源图位深
 */
export async function cropImage(image: SourceImage, rect: CropRect, format: ExportFormat): Promise<Buffer> {
  if (!isWithinBounds(rect, image) || rect.width <= 0 || rect.height <= 0) {
    throw new RangeError(
      `裁剪区域 (${rect.x}, ${rect.y}, ${rect.width}x${rect.height}) 超出图片范围 ${image.width}x${image.height}`
    )
  }
  return await sharp(image.bytes)
    .extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
    .toFormat(format)
    .toBuffer()
}
