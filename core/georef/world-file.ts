import { extname } from 'node:path';
import { WorldFileError } from '@/types/errors';
import type { AffineTransform } from '@/types/georef';

const WORLD_FILE_EXTENSIONS: Record<string, string> = {
  '.jpg': '.jgw',
  '.jpeg': '.jgw',
  '.png': '.pgw',
  '.tif': '.tfw',
  '.tiff': '.tfw'
};

function formatNumber(value: number): string {
  return String(Number(value.toFixed(10)));
}

/**
 * Serialise a transform as a world file (A, D, B, E, C, F).
 * World files reference the centre of the upper-left pixel, so C and F
 * are shifted by half a pixel from the transform's corner origin.
 */
export function toWorldFile(transform: AffineTransform): string {
  const { a, b, c, d, e, f } = transform;
  const centreX = a * 0.5 + b * 0.5 + c;
  const centreY = d * 0.5 + e * 0.5 + f;
  return [a, d, b, e, centreX, centreY].map(formatNumber).join('\n') + '\n';
}

/**
 * Parse world file text back into a pixel-corner transform
 */
export function parseWorldFile(text: string): AffineTransform {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  if (lines.length < 6) {
    throw new WorldFileError(`World file must have 6 lines, got ${lines.length}`, { lineCount: lines.length });
  }

  const values = lines.slice(0, 6).map((line, index) => {
    const value = Number(line);
    if (!Number.isFinite(value)) {
      throw new WorldFileError(`World file line ${index + 1} is not a number: "${line}"`, { line: index + 1 });
    }
    return value;
  });

  const [a, d, b, e, centreX, centreY] = values;
  return {
    a,
    b,
    c: centreX - a * 0.5 - b * 0.5,
    d,
    e,
    f: centreY - d * 0.5 - e * 0.5
  };
}

/**
 * World file extension matching an image: .jpg → .jgw, .png → .pgw, .tif → .tfw, else .wld
 */
export function worldFileExtension(imagePath: string): string {
  return WORLD_FILE_EXTENSIONS[extname(imagePath).toLowerCase()] ?? '.wld';
}
