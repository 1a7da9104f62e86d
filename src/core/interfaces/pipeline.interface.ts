import { ServiceType } from '../domain/enums';
import { Order } from '../domain/models';
import { PipelineResult } from './common.types';

/**
 * A content-generation pipeline for one service type.
 * Pipelines own their file storage and share no mutable state.
 */
export interface Pipeline {
  readonly serviceType: ServiceType;

  run(order: Order): Promise<PipelineResult>;
}

/**
 * Exhaustive map - adding a ServiceType without a pipeline does not compile
 */
export type PipelineMap = { readonly [S in ServiceType]: Pipeline };
