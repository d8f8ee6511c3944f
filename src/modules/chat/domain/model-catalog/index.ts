export {
  buildDefaultModelDescriptors,
  FAST_MODEL_ID,
  HIGH_CAPABILITY_MODEL_ID,
  ModelCatalog,
  type CostClass,
  type LatencyClass,
  type ModelDescriptor,
  type ModelStatus,
  type ModelTier,
} from './model-catalog';
