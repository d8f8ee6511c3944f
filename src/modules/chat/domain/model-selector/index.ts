export {
  ModelSelector,
  validateThresholdTable,
  type ModelSelection,
  type SelectionThreshold,
} from './model-selector';
