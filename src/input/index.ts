export {
  type Cell,
  type Row,
  type Dataset,
  type DatasetError,
  cellSchema,
  createDataset,
  parseDataset,
  columnValues,
  toLabels,
  toNumeric,
  toComparable,
} from "./dataset.js";
