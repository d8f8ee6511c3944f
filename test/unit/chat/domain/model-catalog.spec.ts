import {
  buildDefaultModelDescriptors,
  FAST_MODEL_ID,
  HIGH_CAPABILITY_MODEL_ID,
  ModelCatalog,
} from '@/modules/chat/domain/model-catalog';

describe('ModelCatalog', () => {
  const descriptors = buildDefaultModelDescriptors({
    highCapabilityDeployment: 'gpt4-deployment',
    fastDeployment: 'gpt35-deployment',
  });

  it('lists the default models with their availability', () => {
    const catalog = new ModelCatalog(descriptors);

    expect(catalog.list().map((model) => [model.id, model.available])).toEqual([
      [HIGH_CAPABILITY_MODEL_ID, true],
      [FAST_MODEL_ID, true],
    ]);
    expect(catalog.get(HIGH_CAPABILITY_MODEL_ID)?.deploymentName).toBe('gpt4-deployment');
    expect(catalog.get(FAST_MODEL_ID)?.maxTokens).toBe(4096);
  });

  it('starts disabled models as unavailable and ignores unknown ids', () => {
    const catalog = new ModelCatalog(descriptors, [FAST_MODEL_ID, 'gpt-5']);

    expect(catalog.isAvailable(FAST_MODEL_ID)).toBe(false);
    expect(catalog.isAvailable('gpt-5')).toBe(false);
    expect(catalog.has('gpt-5')).toBe(false);
  });

  it('describes a disabled model as unavailable', () => {
    const catalog = new ModelCatalog(descriptors, [HIGH_CAPABILITY_MODEL_ID]);

    expect(catalog.describe(HIGH_CAPABILITY_MODEL_ID)).toMatchObject({
      id: HIGH_CAPABILITY_MODEL_ID,
      available: false,
    });
    expect(catalog.describe(FAST_MODEL_ID)?.available).toBe(true);
    expect(catalog.describe('gpt-5')).toBeUndefined();
  });

  it('rejects duplicate model ids', () => {
    expect(() => new ModelCatalog([...descriptors, ...descriptors])).toThrow(
      'Duplicate model id in catalog: gpt-4',
    );
  });
});
