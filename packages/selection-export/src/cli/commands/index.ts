export { runSearch, type SearchOptions } from './search.js';
export { runExportCsv, type ExportCsvOptions, type ExportCsvResult } from './export-csv.js';
export { runExportFeatures, type ExportFeaturesOptions, type ExportFeaturesResult } from './export-features.js';
export { runInspect, type InspectOptions, type InspectResult } from './inspect.js';
