import sharp from "sharp";
import type { CoverImageGenerator } from "./remote";

const IMAGE_SIZE = 640;
const WAVE_COUNT = 7;
const JPEG_QUALITY = 90;
const BACKGROUND = "#1a1a26";

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

export type Rgb = [number, number, number];

export function fnv1a64(value: string): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(value, "utf8")) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }

  return hash;
}

// mulberry32
export function createRandom(seed: bigint): () => number {
  let state = Number((seed ^ (seed >> 32n)) & 0xffffffffn);

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function hsvToRgb(h: number, s: number, v: number): Rgb {
  if (s === 0) {
    return [v, v, v];
  }

  const sector = h / 60;
  const i = Math.floor(sector);
  const f = sector - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));

  switch (((i % 6) + 6) % 6) {
    case 0:
      return [v, t, p];
    case 1:
      return [q, v, p];
    case 2:
      return [p, v, t];
    case 3:
      return [p, q, v];
    case 4:
      return [t, p, v];
    default:
      return [v, p, q];
  }
}

export function analogousPalette(random: () => number): Rgb[] {
  const baseHue = random() * 360;
  const saturation = 0.6;
  const value = 0.9;

  return [
    hsvToRgb(baseHue, saturation, value),
    hsvToRgb((baseHue + 25) % 360, saturation, value),
    hsvToRgb((baseHue + 335) % 360, saturation, value)
  ];
}

function toCssColor([r, g, b]: Rgb): string {
  const channel = (c: number): number => Math.round(c * 255);
  return `rgb(${channel(r)},${channel(g)},${channel(b)})`;
}

export function buildCoverSvg(seedName: string): string {
  const random = createRandom(fnv1a64(seedName));
  const palette = analogousPalette(random);
  const paths: string[] = [];

  for (let wave = 0; wave < WAVE_COUNT; wave += 1) {
    const color = palette[Math.floor(random() * palette.length)];
    const lineWidth = 2 + random() * 15;
    const amplitude = 50 + random() * 100;
    const frequency = 0.5 + random() * 2;
    const yOffset = IMAGE_SIZE / 2 + (random() - 0.5) * 300;

    const points: string[] = [];
    for (let x = 0; x < IMAGE_SIZE; x += 1) {
      const y = yOffset + Math.sin((x / IMAGE_SIZE) * Math.PI * 2 * frequency) * amplitude;
      points.push(`${x === 0 ? "M" : "L"}${x} ${y.toFixed(2)}`);
    }

    paths.push(
      `<path d="${points.join(" ")}" fill="none" stroke="${toCssColor(color)}" stroke-width="${lineWidth.toFixed(2)}"/>`
    );
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${IMAGE_SIZE}" height="${IMAGE_SIZE}" viewBox="0 0 ${IMAGE_SIZE} ${IMAGE_SIZE}">`,
    `<rect width="${IMAGE_SIZE}" height="${IMAGE_SIZE}" fill="${BACKGROUND}"/>`,
    ...paths,
    "</svg>"
  ].join("");
}

export class WaveCoverGenerator implements CoverImageGenerator {
  async generate(seedName: string): Promise<Buffer> {
    return sharp(Buffer.from(buildCoverSvg(seedName))).jpeg({ quality: JPEG_QUALITY }).toBuffer();
  }
}
