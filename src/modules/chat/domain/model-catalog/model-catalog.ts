export type ModelTier = 'high-capability' | 'fast';
export type CostClass = 'premium' | 'economy';
export type LatencyClass = 'slow' | 'fast';

export interface ModelDescriptor {
  id: string;
  deploymentName: string;
  displayName: string;
  description: string;
  maxTokens: number;
  capabilities: readonly string[];
  tier: ModelTier;
  /** Higher means more capable. Used to keep threshold selection monotonic. */
  capabilityRank: number;
  costClass: CostClass;
  latencyClass: LatencyClass;
  costPer1kTokens: number;
}

export interface ModelStatus extends ModelDescriptor {
  available: boolean;
}

export const HIGH_CAPABILITY_MODEL_ID = 'gpt-4';
export const FAST_MODEL_ID = 'gpt-35-turbo';

export function buildDefaultModelDescriptors(input: {
  highCapabilityDeployment: string;
  fastDeployment: string;
}): ModelDescriptor[] {
  return [
    {
      id: HIGH_CAPABILITY_MODEL_ID,
      deploymentName: input.highCapabilityDeployment,
      displayName: 'GPT-4',
      description: 'Most capable model, for multi-step reasoning, analysis and code review',
      maxTokens: 8192,
      capabilities: ['complex_reasoning', 'code_generation', 'analysis', 'creative_writing'],
      tier: 'high-capability',
      capabilityRank: 2,
      costClass: 'premium',
      latencyClass: 'slow',
      costPer1kTokens: 0.03,
    },
    {
      id: FAST_MODEL_ID,
      deploymentName: input.fastDeployment,
      displayName: 'GPT-3.5 Turbo',
      description: 'Fast, inexpensive model for everyday questions',
      maxTokens: 4096,
      capabilities: ['general_chat', 'simple_code', 'summarization', 'translation'],
      tier: 'fast',
      capabilityRank: 1,
      costClass: 'economy',
      latencyClass: 'fast',
      costPer1kTokens: 0.002,
    },
  ];
}

/**
 * The enumerated set of models the orchestrator may route to.
 * Descriptors and availability are fixed at construction.
 */
export class ModelCatalog {
  private readonly descriptors = new Map<string, ModelDescriptor>();
  private readonly unavailable = new Set<string>();

  constructor(descriptors: readonly ModelDescriptor[], disabledModelIds: Iterable<string> = []) {
    for (const descriptor of descriptors) {
      if (this.descriptors.has(descriptor.id)) {
        throw new Error(`Duplicate model id in catalog: ${descriptor.id}`);
      }
      this.descriptors.set(descriptor.id, descriptor);
    }

    for (const modelId of disabledModelIds) {
      if (this.descriptors.has(modelId)) {
        this.unavailable.add(modelId);
      }
    }
  }

  get(modelId: string): ModelDescriptor | undefined {
    return this.descriptors.get(modelId);
  }

  has(modelId: string): boolean {
    return this.descriptors.has(modelId);
  }

  isAvailable(modelId: string): boolean {
    return this.descriptors.has(modelId) && !this.unavailable.has(modelId);
  }

  describe(modelId: string): ModelStatus | undefined {
    const descriptor = this.descriptors.get(modelId);
    return descriptor ? { ...descriptor, available: this.isAvailable(modelId) } : undefined;
  }

  list(): ModelStatus[] {
    return [...this.descriptors.values()].map((descriptor) => ({
      ...descriptor,
      available: this.isAvailable(descriptor.id),
    }));
  }
}
