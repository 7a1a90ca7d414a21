import { isAbsent, readPath, type RawRecord } from '@geosync/core';
import type { Dataset } from '../types/index.js';

function roadNameFallback(record: RawRecord): string | undefined {
  const id = readPath(record, 'id');
  if (typeof id === 'string' || typeof id === 'number') {
    return isAbsent(id) ? undefined : `road_${id}`;
  }
  return undefined;
}

/**
 * Highway ways from an Overpass `out geom;` response. Each element
 * carries `id`, `tags` and a `geometry` array of `{lat, lon}` vertices.
 */
export const roadsDataset: Dataset = {
  name: 'roads',
  table: {
    name: 'roads',
    columns: [
      { name: 'road_id', type: 'text', required: true, primaryKey: true },
      { name: 'road_name', type: 'text', required: true },
      { name: 'road_type', type: 'text', required: true },
      { name: 'geom', type: 'geometry', geometry: 'LineString', srid: 4326, required: false },
    ],
  },
  fields: [
    { target: 'road_id', source: 'id', coerce: 'text' },
    { target: 'road_name', source: 'tags.name', coerce: 'text', fallback: roadNameFallback },
    { target: 'road_type', source: 'tags.highway', coerce: 'text', fallback: () => 'unknown' },
    { target: 'geom', source: 'geometry', coerce: 'lineStringWkt' },
  ],
};
