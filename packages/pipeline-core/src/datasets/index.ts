/**
 * Built-in datasets, selected by name at startup
 */

import type { Dataset } from '../types/index.js';
import { pointsDataset } from './points.js';
import { roadsDataset } from './roads.js';

export const DATASET_NAMES = ['points', 'roads'] as const;

export type DatasetName = (typeof DATASET_NAMES)[number];

const DATASETS: Record<DatasetName, Dataset> = {
  points: pointsDataset,
  roads: roadsDataset,
};

export function getDataset(name: DatasetName): Dataset {
  return DATASETS[name];
}

export { pointsDataset, roadsDataset };
