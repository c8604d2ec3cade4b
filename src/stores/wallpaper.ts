import { defineStore } from 'pinia'
import { computed, ref, shallowRef } from 'vue'
import type {
  EditResult,
  ExportReport,
  GlobalParameters,
  ScreenConfig,
  ScreenUpdate,
  ScreenUpdateInput,
  Size,
  SourceImage,
} from '@/types'
import { DEFAULT_FILENAME_STEM, DEFAULT_GLOBAL_PARAMETERS } from '@/constants/defaults'
import { recomputeResolutions } from '@/composables/useLayout'
import { exportScreens, summarizeExportReport } from '@/composables/useExport'
import { ImageLoadError, InvalidParameterError } from '@/utils/errors'
import { loadImage, sourceExtension } from '@/utils/image'
import { parseIntegerField } from '@/utils/math'
import { buildPreviewRects, computePreviewTransform } from '@/utils/preview'
import { computeScaleFactor } from '@/utils/resolution'
import { formatScaleInfo, formatScreenSummary, formatScreenTitle } from '@/utils/screenLabel'
import { applyScreenUpdate, createScreen, removeScreenAt, screenColor } from '@/utils/screens'
import { useToastStore } from './toast'

export interface ExportAllOptions {
  stem?: string
  extension?: string
}

const SCREEN_FIELDS = ['ratioW', 'ratioH', 'x', 'y'] as const

export const useWallpaperStore = defineStore('wallpaper', () => {
  const toast = useToastStore()

  // State
  const params = ref<GlobalParameters>({ ...DEFAULT_GLOBAL_PARAMETERS })
  const screens = ref<ScreenConfig[]>([])
  const image = shallowRef<SourceImage | null>(null)
  const viewport = ref<Size>({ width: 0, height: 0 })
  const isExporting = ref<boolean>(false)
  const lastReport = shallowRef<ExportReport | null>(null)

  // Getters
  const scaleFactor = computed(() => computeScaleFactor(params.value.scalePercent))
  const scaleInfo = computed(() => formatScaleInfo(params.value.scalePercent, scaleFactor.value))

  // 视口尺寸或图片变化时才需要重算；屏幕变化只影响 previewRects
  const previewTransform = computed(() =>
    image.value ? computePreviewTransform(viewport.value, image.value) : null
  )

  const previewRects = computed(() => {
    const transform = previewTransform.value
    return transform ? buildPreviewRects(screens.value, transform) : []
  })

  const screenSummaries = computed(() =>
    screens.value.map(s => ({
      id: s.id,
      title: formatScreenTitle(s),
      summary: formatScreenSummary(s),
      color: screenColor(s.id),
    }))
  )

  const imageInfo = computed(() =>
    image.value ? `${image.value.name}\n${image.value.width} × ${image.value.height} pixels` : '未加载图片'
  )

  /**
   * 编辑被拒绝：提示用户，模型保持不变
   */
  function reject(message: string): EditResult {
    console.error(`[Edit] ${message}`)
    toast.error(message)
    return { ok: false, error: message }
  }

  function rejectInvalid(e: unknown): EditResult {
    if (e instanceof InvalidParameterError) return reject(e.message)
    throw e
  }

  function findIndex(id: number): number {
    return screens.value.findIndex(s => s.id === id)
  }

  // Actions
  function addScreen(): ScreenConfig {
    const screen = createScreen(screens.value.length, params.value)
    screens.value.push(screen)
    console.info(`[Screen] ${formatScreenTitle(screen)} added`)
    return screen
  }

  /**
   * 应用一次已确认的编辑并重新计算分辨率。任一字段不合法则整体拒绝。
   */
  function updateScreen(id: number, input: ScreenUpdateInput): EditResult {
    const index = findIndex(id)
    const current = screens.value[index]
    if (!current) return reject(`屏幕不存在：${id}`)

    const update: ScreenUpdate = {}
    for (const field of SCREEN_FIELDS) {
      const raw = input[field]
      if (raw === undefined) continue
      const value = parseIntegerField(raw)
      if (value === null) return reject(`${field} 必须是整数（当前：${String(raw)}）`)
      update[field] = value
    }

    try {
      const next = applyScreenUpdate(current, update, params.value)
      screens.value.splice(index, 1, next)
      console.info(`[Screen] ${formatScreenTitle(next)} updated: ${formatScreenSummary(next)}`)
      return { ok: true }
    } catch (e) {
      return rejectInvalid(e)
    }
  }

  function deleteScreen(id: number): EditResult {
    const index = findIndex(id)
    if (index === -1) return reject(`屏幕不存在：${id}`)
    try {
      screens.value = removeScreenAt(screens.value, index, params.value)
      console.info(`[Screen] ${formatScreenTitle({ id })} deleted`)
      return { ok: true }
    } catch (e) {
      return rejectInvalid(e)
    }
  }

  /**
   * 全局参数变更：先对所有屏幕完成重算，再一次性提交
   */
  function applyParams(next: GlobalParameters): EditResult {
    try {
      const recomputed = recomputeResolutions(screens.value, next)
      params.value = next
      screens.value = recomputed
      return { ok: true }
    } catch (e) {
      return rejectInvalid(e)
    }
  }

  function setReferenceResolution(width: number | string, height: number | string): EditResult {
    const w = parseIntegerField(width)
    const h = parseIntegerField(height)
    if (w === null || h === null) return reject('参考分辨率必须是整数')
    const result = applyParams({ ...params.value, referenceWidth: w, referenceHeight: h })
    if (result.ok) console.info(`[Layout] New reference resolution: ${w}x${h}`)
    return result
  }

  function setScalePercent(value: number | string): EditResult {
    const s = parseIntegerField(value)
    if (s === null) return reject(`缩放必须是整数（当前：${String(value)}）`)
    return applyParams({ ...params.value, scalePercent: s })
  }

  function setViewportSize(width: number, height: number) {
    viewport.value = { width, height }
  }

  /**
   * 加载新图片；失败时保留之前的图片与会话状态
   */
  async function openImage(path: string): Promise<EditResult> {
    try {
      const loaded = await loadImage(path)
      image.value = loaded
      console.info(`[Image] Image loaded: ${loaded.name} (${loaded.width}x${loaded.height})`)
      return { ok: true }
    } catch (e) {
      if (e instanceof ImageLoadError) return reject(e.message)
      throw e
    }
  }

  async function exportAll(outputDir: string, opts: ExportAllOptions = {}): Promise<ExportReport | null> {
    const source = image.value
    if (!source) {
      console.warn('[Export] No image loaded')
      toast.warning('请先加载图片')
      return null
    }
    if (screens.value.length === 0) {
      console.warn('[Export] No screens configured')
      toast.warning('请先添加屏幕')
      return null
    }

    isExporting.value = true
    try {
      const report = await exportScreens(
        source,
        screens.value,
        outputDir,
        opts.stem ?? DEFAULT_FILENAME_STEM,
        opts.extension ?? sourceExtension(source)
      )
      lastReport.value = report

      const summary = summarizeExportReport(report, outputDir)
      if (report.succeededCount === 0) toast.error(summary, 0)
      else if (report.failures.length > 0) toast.warning(summary, 0)
      else toast.success(summary)
      return report
    } catch (e) {
      rejectInvalid(e)
      return null
    } finally {
      isExporting.value = false
    }
  }

  return {
    params,
    screens,
    image,
    viewport,
    isExporting,
    lastReport,
    scaleFactor,
    scaleInfo,
    previewTransform,
    previewRects,
    screenSummaries,
    imageInfo,
    addScreen,
    updateScreen,
    deleteScreen,
    setReferenceResolution,
    setScalePercent,
    setViewportSize,
    openImage,
    exportAll,
  }
})
