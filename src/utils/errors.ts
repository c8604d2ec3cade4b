/**
 * 参数不合法（非正比例、非正参考分辨率、非整数输入等）。
 * 在编辑边界抛出，调用方保留原有状态。
 */
export class InvalidParameterError extends Error {
  readonly field: string

  constructor(field: string, message: string) {
    super(message)
    this.name = 'InvalidParameterError'
    this.field = field
  }
}

/**
 * 图片读取 / 解码失败
 */
export class ImageLoadError extends Error {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`无法读取图片：${path}（${describeError(cause)}）`, { cause })
    this.name = 'ImageLoadError'
    this.path = path
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
