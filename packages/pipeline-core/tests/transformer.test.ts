import { describe, expect, it } from 'vitest';
import { Transformer } from '../src/transform/transformer.js';
import { pointsDataset } from '../src/datasets/points.js';
import { roadsDataset } from '../src/datasets/roads.js';
import { DATASET_NAMES, getDataset } from '../src/datasets/index.js';

describe('Transformer with the points dataset', () => {
  const transformer = new Transformer(pointsDataset);

  it('coerces numeric strings and builds the point geometry', () => {
    const report = transformer.transform([{ id: '1', lat: '10.5', lon: '20.1' }]);

    expect(report.rejected).toEqual([]);
    expect(report.records).toEqual([
      { id: '1', name: null, lat: 10.5, lon: 20.1, geom: 'POINT(20.1 10.5)' },
    ]);
  });

  it('turns numeric ids and names into text', () => {
    const report = transformer.transform([{ id: 7, name: 42, lat: 0, lon: -1.25 }]);

    expect(report.records).toEqual([
      { id: '7', name: '42', lat: 0, lon: -1.25, geom: 'POINT(-1.25 0)' },
    ]);
  });

  it('drops source fields that have no column', () => {
    const report = transformer.transform([{ id: 'a', lat: 1, lon: 2, extra: true }]);

    expect(Object.keys(report.records[0] ?? {})).toEqual(['id', 'name', 'lat', 'lon', 'geom']);
  });

  it('rejects a record whose present value fails coercion', () => {
    const report = transformer.transform([{ id: '1', lat: 'abc', lon: '20' }]);

    expect(report.records).toEqual([]);
    expect(report.rejected).toHaveLength(1);
    expect(report.rejected[0]?.index).toBe(0);
    expect(report.rejected[0]?.error).toMatchObject({
      code: 'COERCION_FAILED',
      field: 'lat',
      recordIndex: 0,
      message: 'lat: expected a number, got "abc"',
    });
  });

  it('rejects a record missing a required column', () => {
    const report = transformer.transform([{ id: '1', lon: 20 }]);

    expect(report.rejected[0]?.error).toMatchObject({
      code: 'MISSING_FIELD',
      field: 'lat',
      message: 'lat: required value is missing',
    });
  });

  it('rejects coordinates outside the WGS 84 range', () => {
    const report = transformer.transform([{ id: '1', lat: 95, lon: 20 }]);

    expect(report.rejected[0]?.error).toMatchObject({
      code: 'COERCION_FAILED',
      field: 'geom',
      message: 'geom: latitude 95 is outside [-90, 90]',
    });
  });

  it('rejects a name that is not text', () => {
    const report = transformer.transform([{ id: '1', name: { en: 'x' }, lat: 1, lon: 1 }]);

    expect(report.rejected[0]?.error.message).toBe('name: expected text, got an object');
  });

  it('keeps input order and reports rejected indexes', () => {
    const report = transformer.transform([
      { id: 'a', lat: 1, lon: 1 },
      { id: 'b', lat: 'x', lon: 1 },
      { id: 'c', lat: 3, lon: 3 },
      { lat: 4, lon: 4 },
    ]);

    expect(report.inputCount).toBe(4);
    expect(report.records.map((r) => r.id)).toEqual(['a', 'c']);
    expect(report.rejected.map((r) => r.index)).toEqual([1, 3]);
  });

  it('is deterministic', () => {
    const input = [{ id: '1', lat: '1', lon: '2' }, { id: '2', lat: 'bad', lon: '2' }];
    expect(transformer.transform(input)).toEqual(transformer.transform(input));
  });
});

describe('Transformer with the roads dataset', () => {
  const transformer = new Transformer(roadsDataset);

  it('maps an Overpass way with geometry', () => {
    const report = transformer.transform([
      {
        type: 'way',
        id: 123,
        tags: { highway: 'residential', name: 'Mannerheimintie' },
        geometry: [
          { lat: 60.1, lon: 24.9 },
          { lat: 60.2, lon: 25.0 },
        ],
      },
    ]);

    expect(report.records).toEqual([
      {
        road_id: '123',
        road_name: 'Mannerheimintie',
        road_type: 'residential',
        geom: 'LINESTRING(24.9 60.1, 25 60.2)',
      },
    ]);
  });

  it('falls back for missing tags and geometry', () => {
    const report = transformer.transform([{ id: 5 }, { id: 6, tags: { name: ' ' }, geometry: [] }]);

    expect(report.records).toEqual([
      { road_id: '5', road_name: 'road_5', road_type: 'unknown', geom: null },
      { road_id: '6', road_name: 'road_6', road_type: 'unknown', geom: null },
    ]);
  });

  it('rejects a line with a single vertex', () => {
    const report = transformer.transform([{ id: 1, geometry: [{ lat: 1, lon: 1 }] }]);

    expect(report.rejected[0]?.error).toMatchObject({
      code: 'COERCION_FAILED',
      field: 'geom',
      message: 'geom: a line needs at least 2 points, got 1',
    });
  });

  it('rejects a vertex without coordinates', () => {
    const report = transformer.transform([{ id: 1, geometry: [{ lat: 1, lon: 1 }, { lat: 2 }] }]);

    expect(report.rejected[0]?.error.message).toBe('geom: point 1 is not a {lat, lon} object');
  });

  it('rejects an element without an id', () => {
    const report = transformer.transform([{ tags: { highway: 'primary' } }]);

    expect(report.rejected[0]?.error).toMatchObject({ code: 'MISSING_FIELD', field: 'road_id' });
  });
});

describe('datasets', () => {
  it('looks up built-in datasets by name', () => {
    expect(getDataset('points')).toBe(pointsDataset);
    expect(getDataset('roads').table.name).toBe('roads');
  });

  it('lists the built-in dataset names', () => {
    expect(DATASET_NAMES).toEqual(['points', 'roads']);
  });

  it('maps every column of each table', () => {
    for (const dataset of [pointsDataset, roadsDataset]) {
      const targets = dataset.fields.map((f) => f.target).sort();
      const columns = dataset.table.columns.map((c) => c.name).sort();
      expect(targets).toEqual(columns);
    }
  });
});
