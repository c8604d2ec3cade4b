// 类型定义

export type ExportFormat = "png" | "jpeg" | "webp" | "gif" | "tiff" | "avif";

export interface GlobalParameters {
  /** 参考分辨率宽度（px，正整数） */
  referenceWidth: number;
  /** 参考分辨率高度（px，正整数） */
  referenceHeight: number;
  /**
   * 缩放滑块：0–100
   * 0% = ×0.5，50% = ×1.0，100% = ×2.0
   */
  scalePercent: number;
}

export interface ScreenConfig {
  /** 列表下标，删除后重新编号 */
  id: number;
  ratioW: number;
  ratioH: number;
  /** 原图坐标系中的左上角 */
  x: number;
  y: number;
  /** 由参考分辨率 + 缩放 + 比例推导，不可直接编辑 */
  width: number;
  height: number;
}

export type ScreenUpdate = Partial<Pick<ScreenConfig, "ratioW" | "ratioH" | "x" | "y">>;

/**
 * 来自输入框的原始值（字符串或数字），在写入模型前统一校验为整数
 */
export type ScreenUpdateInput = {
  [K in keyof ScreenUpdate]?: number | string;
};

export interface Resolution {
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * 已加载的源图；保留原始文件字节，裁剪时直接从中截取
 */
export interface SourceImage {
  readonly path: string;
  readonly name: string;
  /** 解码器识别出的格式，如 png / jpeg */
  readonly format: string;
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  /** 像素位深，如 uchar（8 位）/ ushort（16 位） */
  readonly depth: string;
  readonly bytes: Uint8Array;
}

export interface PreviewTransform {
  scale: number;
  xOffset: number;
  yOffset: number;
  /** 缩放后的背景图尺寸 */
  scaledWidth: number;
  scaledHeight: number;
}

export interface ViewportRect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface PreviewRect extends ViewportRect {
  screenId: number;
  color: string;
  label: string;
}

export type ExportFailureKind = "OutOfBounds" | "IOFailure";

export interface ExportFailure {
  screenId: number;
  kind: ExportFailureKind;
  message: string;
}

export interface ExportedFile {
  screenId: number;
  path: string;
}

export interface ExportReport {
  succeededCount: number;
  outputs: ExportedFile[];
  failures: ExportFailure[];
}

export type EditResult = { ok: true } | { ok: false; error: string };

// Toast 类型
export type ToastType = "success" | "error" | "info" | "warning";

export interface Toast {
  id: string;
  message: string;
  type: ToastType;
  duration: number;
}
