export {
  DATASET_KINDS,
  generateDataset,
  isDatasetKind,
  parseDatasetKind,
  type DatasetKind
} from './generator.js'
