import { mkdir } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { createPinia } from 'pinia'
import type { Pinia } from 'pinia'
import type { Resolution } from '@/types'
import { summarizeExportReport } from '@/composables/useExport'
import { useWallpaperStore } from '@/stores/wallpaper'
import { describeError } from '@/utils/errors'

export const USAGE = `Usage: wallpaper-split <image> --out <dir> [options]

Options:
  -o, --out <dir>        输出目录（不存在时自动创建）
  -s, --screen <W:H@X,Y> 屏幕比例与位置，可重复；缺省为一个 16:9 @ 0,0
      --ref <WxH>        参考分辨率，默认 2560x1440
      --scale <0-100>    缩放（0 = ×0.5，50 = ×1.0，100 = ×2.0），默认 50
      --stem <name>      输出文件名前缀，默认 wallpaper
      --ext <.png>       输出扩展名，默认与源图相同
  -h, --help             显示帮助`

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export interface ScreenArg {
  ratioW: number
  ratioH: number
  x: number
  y: number
}

export interface CliArgs {
  help: boolean
  imagePath: string
  outputDir: string
  screens: ScreenArg[]
  reference?: Resolution
  scalePercent?: string
  stem?: string
  extension?: string
}

const SCREEN_PATTERN = /^(\d+):(\d+)(?:@(-?\d+),(-?\d+))?$/
const REFERENCE_PATTERN = /^(\d+)[x×](\d+)$/i

export function parseScreenArg(value: string): ScreenArg {
  const m = SCREEN_PATTERN.exec(value.trim())
  if (!m) throw new CliUsageError(`无法解析屏幕参数：${value}（格式 W:H@X,Y）`)
  return {
    ratioW: Number(m[1]),
    ratioH: Number(m[2]),
    x: m[3] === undefined ? 0 : Number(m[3]),
    y: m[4] === undefined ? 0 : Number(m[4]),
  }
}

export function parseReferenceArg(value: string): Resolution {
  const m = REFERENCE_PATTERN.exec(value.trim())
  if (!m) throw new CliUsageError(`无法解析参考分辨率：${value}（格式 WxH）`)
  return { width: Number(m[1]), height: Number(m[2]) }
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        out: { type: 'string', short: 'o' },
        screen: { type: 'string', short: 's', multiple: true },
        ref: { type: 'string' },
        scale: { type: 'string' },
        stem: { type: 'string' },
        ext: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    })
  } catch (e) {
    throw new CliUsageError(describeError(e))
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseRawArgs(argv)
  if (values.help) {
    return { help: true, imagePath: '', outputDir: '', screens: [] }
  }
  if (positionals.length !== 1) {
    throw new CliUsageError('需要且只能指定一个源图片路径')
  }
  if (!values.out) {
    throw new CliUsageError('缺少 --out 输出目录')
  }

  return {
    help: false,
    imagePath: positionals[0],
    outputDir: values.out,
    screens: (values.screen ?? []).map(parseScreenArg),
    reference: values.ref === undefined ? undefined : parseReferenceArg(values.ref),
    scalePercent: values.scale,
    stem: values.stem,
    extension: values.ext,
  }
}

/**
 * 无界面运行一次完整流程：设置参数 → 加载图片 → 添加屏幕 → 导出。
 * 返回进程退出码：0 全部成功，1 有失败，2 参数错误。
 */
export async function runCli(argv: string[], pinia: Pinia = createPinia()): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (e) {
    if (!(e instanceof CliUsageError)) throw e
    console.error(e.message)
    console.error(USAGE)
    return 2
  }
  if (args.help) {
    console.log(USAGE)
    return 0
  }

  const store = useWallpaperStore(pinia)

  if (args.reference) {
    const result = store.setReferenceResolution(args.reference.width, args.reference.height)
    if (!result.ok) return 2
  }
  if (args.scalePercent !== undefined) {
    const result = store.setScalePercent(args.scalePercent)
    if (!result.ok) return 2
  }

  const screenArgs = args.screens.length > 0 ? args.screens : [{ ratioW: 16, ratioH: 9, x: 0, y: 0 }]
  for (const screenArg of screenArgs) {
    const screen = store.addScreen()
    const result = store.updateScreen(screen.id, screenArg)
    if (!result.ok) return 2
  }

  const loaded = await store.openImage(args.imagePath)
  if (!loaded.ok) return 1

  try {
    await mkdir(args.outputDir, { recursive: true })
  } catch (e) {
    console.error(`无法创建输出目录：${args.outputDir}（${describeError(e)}）`)
    return 1
  }
  const report = await store.exportAll(args.outputDir, { stem: args.stem, extension: args.extension })
  if (!report) return 2

  console.log(summarizeExportReport(report, args.outputDir))
  return report.succeededCount > 0 && report.failures.length === 0 ? 0 : 1
}
