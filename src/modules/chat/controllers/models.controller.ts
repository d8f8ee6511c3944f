import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { ModelCatalog, type ModelStatus } from '../domain/model-catalog';

@Controller('api/models')
export class ModelsController {
  constructor(private readonly catalog: ModelCatalog) {}

  @Get()
  list(): ModelStatus[] {
    return this.catalog.list();
  }

  @Get(':modelId')
  get(@Param('modelId') modelId: string): ModelStatus {
    const model = this.catalog.describe(modelId);
    if (!model) {
      throw new NotFoundException({ message: 'Model not found', code: 'MODEL_NOT_FOUND' });
    }
    return model;
  }
}
