import sharp from "sharp";

/**
 * 生成 R = x、G = y、B = 0 的 PNG，便于校验裁剪位置（宽高需 <= 256）
 */
export async function writeGradientPng(path: string, width: number, height: number): Promise<void> {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3;
      data[i] = x;
      data[i + 1] = y;
    }
  }
  await sharp(data, { raw: { width, height, channels: 3 } }).png().toFile(path);
}

/**
 * 生成 16 位灰度 PNG：先写 8 位灰度，再转换为 grey16
 */
export async function writeGrey16Png(path: string, width: number, height: number): Promise<void> {
  const data = Buffer.alloc(width * height);
  for (let i = 0; i < data.length; i++) {
    data[i] = 20 + i * 25;
  }
  await sharp(data, { raw: { width, height, channels: 1 } }).toColourspace("grey16").png().toFile(path);
}
