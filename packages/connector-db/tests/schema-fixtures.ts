import type { TableSchema } from '@geosync/core';

export const pointsSchema: TableSchema = {
  name: 'points',
  columns: [
    { name: 'id', type: 'text', required: true, primaryKey: true },
    { name: 'name', type: 'text', required: false },
    { name: 'lat', type: 'double', required: true },
    { name: 'lon', type: 'double', required: true },
    { name: 'geom', type: 'geometry', geometry: 'Point', srid: 4326, required: false },
  ],
};

export const plainSchema: TableSchema = {
  name: 'readings',
  columns: [
    { name: 'station', type: 'text', required: true, primaryKey: true },
    { name: 'value', type: 'integer', required: true },
  ],
};

export const dbConfig = {
  host: 'localhost',
  port: 5432,
  database: 'geosync',
  user: 'etl',
  password: 'test-secret',
};
