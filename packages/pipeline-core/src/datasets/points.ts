import type { Dataset } from '../types/index.js';

/**
 * Point features from a JSON array: `{ id, name?, lat, lon }`.
 * Coordinates may arrive as numbers or numeric strings.
 */
export const pointsDataset: Dataset = {
  name: 'points',
  table: {
    name: 'points',
    columns: [
      { name: 'id', type: 'text', required: true, primaryKey: true },
      { name: 'name', type: 'text', required: false },
      { name: 'lat', type: 'double', required: true },
      { name: 'lon', type: 'double', required: true },
      { name: 'geom', type: 'geometry', geometry: 'Point', srid: 4326, required: false },
    ],
  },
  fields: [
    { target: 'id', source: 'id', coerce: 'text' },
    { target: 'name', source: 'name', coerce: 'text' },
    { target: 'lat', source: 'lat', coerce: 'number' },
    { target: 'lon', source: 'lon', coerce: 'number' },
    { target: 'geom', source: ['lon', 'lat'], coerce: 'pointWkt' },
  ],
};
