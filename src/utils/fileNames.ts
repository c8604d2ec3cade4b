import { lstat } from 'node:fs/promises'
import { extname } from 'node:path'
import type { ScreenConfig } from '@/types'
import { formatRatio } from './screenLabel'

/**
 * "{stem}_screen_{ratioW}-{ratioH}{extension}"
 */
export function buildScreenFilename(
  stem: string,
  screen: Pick<ScreenConfig, 'ratioW' | 'ratioH'>,
  extension: string
): string {
  return `${stem}_screen_${formatRatio(screen).replace(':', '-')}${extension}`
}

/**
 * 在扩展名前插入序号：a/b.png + 2 → a/b_2.png
 */
export function withCounterSuffix(path: string, counter: number): string {
  const ext = extname(path)
  const name = ext ? path.slice(0, -ext.length) : path
  return `${name}_${counter}${ext}`
}

export function isErrnoError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

/**
 * 悬空的符号链接也视为已存在
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch (e) {
    if (isErrnoError(e, 'ENOENT')) return false
    throw e
  }
}

/**
 * 目标路径已存在时依次尝试 _2、_3 …，返回第一个空闲路径
 */
export async function resolveUniquePath(basePath: string): Promise<string> {
  if (!(await pathExists(basePath))) return basePath

  let counter = 2
  while (await pathExists(withCounterSuffix(basePath, counter))) {
    counter++
  }
  return withCounterSuffix(basePath, counter)
}
