import { z } from 'zod';
import { CaveRecordError } from '@/types/errors';
import type { GeoCoordinate } from '@/types/georef';
import { worldFileExtension } from '@/core/georef/world-file';

/** Graphics types that show a plan view */
export const PLAN_GRAPHICS_TYPES: readonly string[] = ['plan', 'plan i przekrój'];

const imageSchema = z.object({
  image_path: z.string(),
  metadata: z
    .object({
      graphics_type_name: z.string().nullish()
    })
    .passthrough()
    .default({})
}).passthrough();

const caveRecordSchema = z.object({
  cave_id: z.string().min(1),
  name: z.string(),
  inventory_number: z.string().nullish().transform(value => value ?? ''),
  latitude: z.number().nullish().transform(value => value ?? 0),
  longitude: z.number().nullish().transform(value => value ?? 0),
  images: z.array(imageSchema).nullish().transform(value => value ?? [])
});

export type CaveImage = z.infer<typeof imageSchema>;

export interface CaveRecord {
  caveId: string;
  name: string;
  inventoryNumber: string;
  latitude: number;
  longitude: number;
  /** Images whose graphics type is a plan */
  planImages: CaveImage[];
}

export function isPlanImage(image: CaveImage): boolean {
  const type = image.metadata.graphics_type_name;
  return typeof type === 'string' && PLAN_GRAPHICS_TYPES.includes(type);
}

/**
 * Validate one cave record as produced by the ETL pipeline
 */
export function parseCaveRecord(json: unknown): CaveRecord {
  const parsed = caveRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CaveRecordError(`Invalid cave record: ${issues.join('; ')}`, { issues });
  }

  const record = parsed.data;
  return {
    caveId: record.cave_id,
    name: record.name,
    inventoryNumber: record.inventory_number,
    latitude: record.latitude,
    longitude: record.longitude,
    planImages: record.images.filter(isPlanImage)
  };
}

/**
 * Find a cave by ID in JSONL text. Lines that are not JSON, or not an
 * object with a matching cave_id, are skipped.
 */
export function findCaveRecord(jsonl: string, caveId: string): CaveRecord | null {
  for (const line of jsonl.split(/\r?\n/)) {
    if (!line.trim()) continue;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      continue;
    }
    if (typeof data === 'object' && data !== null && 'cave_id' in data && data.cave_id === caveId) {
      return parseCaveRecord(data);
    }
  }
  return null;
}

/**
 * Base file name for outputs, e.g. "001495_T.I-01.23"
 */
export function outputBaseName(record: CaveRecord): string {
  return `${record.caveId}_${record.inventoryNumber.replace(/ /g, '_')}`;
}

/**
 * Plan image to georeference, or null when the cave has no plan at that index
 */
export function selectPlanImage(record: CaveRecord, planIndex = 0): CaveImage | null {
  return record.planImages[planIndex] ?? null;
}

export interface OutputFileNames {
  /** World file named to sit beside the plan image, e.g. "001495_T.I-01.23.jgw" */
  worldFile: string;
  summary: string;
  footprint: string;
}

export function outputFileNames(record: CaveRecord, image: CaveImage): OutputFileNames {
  const base = outputBaseName(record);
  return {
    worldFile: `${base}${worldFileExtension(image.image_path)}`,
    summary: `${base}.json`,
    footprint: `${base}.geojson`
  };
}

export function referenceCoordinate(record: CaveRecord): GeoCoordinate {
  return { latitude: record.latitude, longitude: record.longitude };
}
