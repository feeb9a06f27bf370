export { LocalDatasetEngine } from './local-engine.js';
export {
  LocalFeatureStore,
  describeRef,
  isRemoteWorkspace,
  isSingleFileDataset,
} from './feature-store.js';
export { runEngineOperation } from './run-operation.js';
export { areaOf, distanceBetween } from './geometry.js';
export { statisticFieldName } from './aggregate.js';
