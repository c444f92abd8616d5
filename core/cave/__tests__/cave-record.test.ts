import {
  findCaveRecord,
  isPlanImage,
  outputBaseName,
  outputFileNames,
  parseCaveRecord,
  referenceCoordinate,
  selectPlanImage
} from '../cave-record';
import { CaveRecordError } from '@/types/errors';

const RECORD = {
  cave_id: '000123',
  name: 'Test Cave',
  inventory_number: 'T.I 01 23',
  latitude: 49.25,
  longitude: 19.9,
  images: [
    { image_path: 'plans/000123_plan.jpg', metadata: { graphics_type_name: 'plan' } },
    { image_path: 'plans/000123_section.jpg', metadata: { graphics_type_name: 'przekrój' } },
    { image_path: 'plans/000123_both.jpg', metadata: { graphics_type_name: 'plan i przekrój' } },
    { image_path: 'plans/000123_unknown.jpg' }
  ]
};

describe('CaveRecord', () => {
  describe('parseCaveRecord', () => {
    it('should keep only plan images', () => {
      const record = parseCaveRecord(RECORD);

      expect(record.caveId).toBe('000123');
      expect(record.inventoryNumber).toBe('T.I 01 23');
      expect(record.planImages.map(image => image.image_path)).toEqual([
        'plans/000123_plan.jpg',
        'plans/000123_both.jpg'
      ]);
    });

    it('should default missing optional fields', () => {
      const record = parseCaveRecord({ cave_id: '7', name: 'Bare', latitude: null });

      expect(record).toEqual({
        caveId: '7',
        name: 'Bare',
        inventoryNumber: '',
        latitude: 0,
        longitude: 0,
        planImages: []
      });
    });

    it('should reject a record without an id', () => {
      expect(() => parseCaveRecord({ name: 'Nameless' })).toThrow(CaveRecordError);
      expect(() => parseCaveRecord('not a record')).toThrow(CaveRecordError);
    });
  });

  describe('findCaveRecord', () => {
    const jsonl = [
      '{"cave_id": "000001", "name": "First"}',
      'not json at all',
      '',
      JSON.stringify(RECORD),
      '{"cave_id": "000123", "name": "Duplicate"}'
    ].join('\n');

    it('should return the first matching line', () => {
      expect(findCaveRecord(jsonl, '000123')?.name).toBe('Test Cave');
    });

    it('should return null when no line matches', () => {
      expect(findCaveRecord(jsonl, '999999')).toBeNull();
    });
  });

  describe('selectPlanImage', () => {
    it('should return null for a cave with only section drawings', () => {
      const record = parseCaveRecord({
        cave_id: '1',
        name: 'Sections only',
        images: [{ image_path: 'a.jpg', metadata: { graphics_type_name: 'przekrój' } }]
      });

      expect(record.planImages).toEqual([]);
      expect(selectPlanImage(record)).toBeNull();
    });

    it('should pick the first plan image by default', () => {
      expect(selectPlanImage(parseCaveRecord(RECORD))?.image_path).toBe('plans/000123_plan.jpg');
    });

    it('should pick a plan image by index', () => {
      const record = parseCaveRecord(RECORD);

      expect(selectPlanImage(record, 1)?.image_path).toBe('plans/000123_both.jpg');
      expect(selectPlanImage(record, 2)).toBeNull();
    });
  });

  describe('outputFileNames', () => {
    it('should name the world file after the plan image format', () => {
      const record = parseCaveRecord(RECORD);

      expect(outputFileNames(record, { image_path: 'plans/000123_plan.jpg', metadata: {} })).toEqual({
        worldFile: '000123_T.I_01_23.jgw',
        summary: '000123_T.I_01_23.json',
        footprint: '000123_T.I_01_23.geojson'
      });
      expect(outputFileNames(record, { image_path: 'plans/000123_plan.TIF', metadata: {} }).worldFile)
        .toBe('000123_T.I_01_23.tfw');
    });
  });

  it('should build an output name from id and inventory number', () => {
    expect(outputBaseName(parseCaveRecord(RECORD))).toBe('000123_T.I_01_23');
  });

  it('should expose the reference coordinate', () => {
    expect(referenceCoordinate(parseCaveRecord(RECORD))).toEqual({ latitude: 49.25, longitude: 19.9 });
  });

  it('should recognise plan graphics types', () => {
    expect(isPlanImage({ image_path: 'a.jpg', metadata: { graphics_type_name: 'plan' } })).toBe(true);
    expect(isPlanImage({ image_path: 'a.jpg', metadata: { graphics_type_name: null } })).toBe(false);
  });
});
