export {
  type ForecastRecord,
  type FailureRecord,
  type StoredRun,
  type ForecastStore,
  StoredRunSchema,
  CorruptRecordError,
  FileForecastStore,
  MemoryForecastStore,
} from './store.js';

export { formatMarkdown } from './markdown.js';
