import { InvalidOverrideError, InvalidSelectionTableError } from '../errors';
import type { ModelCatalog, ModelDescriptor } from '../model-catalog';

export interface SelectionThreshold {
  threshold: number;
  modelId: string;
}

export interface ModelSelection {
  model: ModelDescriptor;
  wasAutoSelected: boolean;
  reason: 'override' | 'threshold';
  /** The threshold entry that matched; absent for overrides. */
  threshold?: number;
}

/**
 * Sorts the table high-to-low and checks it can route every score:
 * known models, a 0 floor, and capability never rising as the threshold falls.
 */
export function validateThresholdTable(
  table: readonly SelectionThreshold[],
  catalog: ModelCatalog,
): SelectionThreshold[] {
  if (table.length === 0) {
    throw new InvalidSelectionTableError('Selection table must contain at least one entry');
  }

  const sorted = [...table].sort((left, right) => right.threshold - left.threshold);
  let previousRank = Number.POSITIVE_INFINITY;
  let previousThreshold: number | undefined;

  for (const entry of sorted) {
    const descriptor = catalog.get(entry.modelId);
    if (!descriptor) {
      throw new InvalidSelectionTableError(`Selection table references unknown model: ${entry.modelId}`);
    }

    if (entry.threshold === previousThreshold) {
      throw new InvalidSelectionTableError(`Duplicate selection threshold: ${entry.threshold}`);
    }

    if (descriptor.capabilityRank > previousRank) {
      throw new InvalidSelectionTableError(
        `Selection table is not monotonic at threshold ${entry.threshold} (${entry.modelId})`,
      );
    }

    previousRank = descriptor.capabilityRank;
    previousThreshold = entry.threshold;
  }

  const lowest = sorted[sorted.length - 1];
  if (lowest.threshold !== 0) {
    throw new InvalidSelectionTableError('Lowest selection threshold must be 0');
  }

  return sorted;
}

export class ModelSelector {
  private readonly table: SelectionThreshold[];

  constructor(
    private readonly catalog: ModelCatalog,
    table: readonly SelectionThreshold[],
  ) {
    this.table = validateThresholdTable(table, catalog);
  }

  /**
   * A non-empty override must name an available model, otherwise InvalidOverrideError.
   * Auto-selection ignores availability; the dispatcher falls back.
   */
  select(complexityScore: number, override?: string): ModelSelection {
    const requested = override?.trim() ?? '';
    if (requested.length > 0) {
      return this.selectOverride(requested);
    }

    const entry =
      this.table.find((candidate) => complexityScore >= candidate.threshold) ??
      this.table[this.table.length - 1];

    return {
      model: this.requireModel(entry.modelId),
      wasAutoSelected: true,
      reason: 'threshold',
      threshold: entry.threshold,
    };
  }

  private selectOverride(modelId: string): ModelSelection {
    const descriptor = this.catalog.get(modelId);
    if (!descriptor) {
      throw new InvalidOverrideError(modelId, 'unknown_model');
    }

    if (!this.catalog.isAvailable(modelId)) {
      throw new InvalidOverrideError(modelId, 'model_unavailable');
    }

    return { model: descriptor, wasAutoSelected: false, reason: 'override' };
  }

  private requireModel(modelId: string): ModelDescriptor {
    const descriptor = this.catalog.get(modelId);
    if (!descriptor) {
      throw new InvalidSelectionTableError(`Selection table references unknown model: ${modelId}`);
    }
    return descriptor;
  }
}
