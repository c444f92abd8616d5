import fs from 'fs-extra';
import path from 'path';
import { loadConfig } from '@/core/config';
import { findCaveRecord, outputFileNames, referenceCoordinate, selectPlanImage } from '@/core/cave/cave-record';
import { Proj4Projector } from '@/core/coordinates/projector';
import { footprintFeature, groundOverlayBox } from '@/core/georef/ground-overlay';
import { GeoreferencingOrchestrator } from '@/core/georef/orchestrator';
import { createRunContext } from '@/core/georef/run-context';
import { ReadlineSurface } from '@/core/georef/surfaces/readline-surface';
import { toWorldFile } from '@/core/georef/world-file';
import { errorMessage } from '@/types/errors';
import type { LatLonBox } from '@/types/georef';

const SOURCE = 'GeoreferenceCave';

interface CliOptions {
  caveId: string;
  cavesFile: string;
  outputDir: string;
  planIndex: number;
  imageWidth?: number;
  imageHeight?: number;
}

function usage(): string {
  return [
    'Usage: georeference-cave --cave-id <id> [--caves-file caves_transformed.jsonl]',
    '                         [--output-dir georeferenced_output] [--plan-index 0]',
    '                         [--image-width <px> --image-height <px>]'
  ].join('\n');
}

function parseArgs(argv: string[]): CliOptions {
  const values = new Map<string, string>();
  for (let i = 0; i < argv.length; i += 2) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (!flag.startsWith('--') || value === undefined) {
      throw new Error(`Unexpected argument "${flag}"\n${usage()}`);
    }
    values.set(flag.slice(2), value);
  }

  const caveId = values.get('cave-id');
  if (!caveId) {
    throw new Error(`Missing --cave-id\n${usage()}`);
  }

  const toInteger = (name: string, min: number): number | undefined => {
    const raw = values.get(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      throw new Error(`--${name} must be an integer >= ${min}`);
    }
    return value;
  };

  return {
    caveId,
    cavesFile: values.get('caves-file') ?? 'caves_transformed.jsonl',
    outputDir: values.get('output-dir') ?? 'georeferenced_output',
    planIndex: toInteger('plan-index', 0) ?? 0,
    imageWidth: toInteger('image-width', 1),
    imageHeight: toInteger('image-height', 1)
  };
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  const context = createRunContext(loadConfig());
  const { logger } = context;

  await logger.info(SOURCE, 'Searching for cave', { caveId: options.caveId, cavesFile: options.cavesFile });
  const cave = findCaveRecord(await fs.readFile(options.cavesFile, 'utf-8'), options.caveId);
  if (!cave) {
    await logger.error(SOURCE, `Cave ${options.caveId} not found`);
    return 1;
  }
  await logger.info(SOURCE, 'Found cave', { name: cave.name, latitude: cave.latitude, longitude: cave.longitude });

  const image = selectPlanImage(cave, options.planIndex);
  if (!image) {
    await logger.error(SOURCE, 'No plan images found for this cave', {
      planImages: cave.planImages.length,
      planIndex: options.planIndex
    });
    return 1;
  }
  await logger.info(SOURCE, 'Using plan image', { imagePath: image.image_path });

  const projector = new Proj4Projector();
  const orchestrator = new GeoreferencingOrchestrator({
    surface: new ReadlineSurface(process.stdin, process.stdout),
    projector,
    context
  });

  const outcome = await orchestrator.run(referenceCoordinate(cave));
  if (outcome.status === 'cancelled') {
    await logger.info(SOURCE, 'Cancelled, no output written', { state: outcome.state });
    return 2;
  }
  if (outcome.status === 'failure') {
    await logger.error(SOURCE, 'An error occurred', { code: outcome.code, reason: outcome.reason });
    return 1;
  }

  const { result, warnings } = outcome;
  const { imageWidth, imageHeight } = options;
  const names = outputFileNames(cave, image);
  await fs.ensureDir(options.outputDir);

  const worldFilePath = path.join(options.outputDir, names.worldFile);
  await fs.writeFile(worldFilePath, toWorldFile(result.transform));

  let overlay: LatLonBox | null = null;
  let footprintPath: string | null = null;
  if (imageWidth !== undefined && imageHeight !== undefined) {
    overlay = groundOverlayBox(result, imageWidth, imageHeight, projector);
    footprintPath = path.join(options.outputDir, names.footprint);
    await fs.writeJson(footprintPath, footprintFeature(result, imageWidth, imageHeight, projector, {
      caveId: cave.caveId,
      name: cave.name
    }), { spaces: 2 });
  }

  const summaryPath = path.join(options.outputDir, names.summary);
  await fs.writeJson(summaryPath, {
    caveId: cave.caveId,
    name: cave.name,
    imagePath: image.image_path,
    crs: result.crs,
    transform: result.transform,
    overlay,
    warnings
  }, { spaces: 2 });

  await logger.info(SOURCE, 'Output files generated', { worldFilePath, summaryPath, footprintPath });
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
