import { Order, isArtifact } from '../domain/models';
import { Pipeline, PipelineResult } from '../interfaces';

function failure(error: string): PipelineResult {
  return { success: false, artifacts: [], error };
}

/**
 * Run a pipeline and normalize whatever happens into a PipelineResult.
 * Never rejects.
 */
export async function executePipeline(
  pipeline: Pipeline,
  order: Order,
): Promise<PipelineResult> {
  if (!order.pipelineInput) {
    return failure('missing pipeline input');
  }
  if (order.pipelineInput.serviceType !== order.serviceType) {
    return failure(
      `pipeline input is for ${order.pipelineInput.serviceType}, order is ${order.serviceType}`,
    );
  }
  if (pipeline.serviceType !== order.serviceType) {
    return failure(
      `pipeline ${pipeline.serviceType} cannot run a ${order.serviceType} order`,
    );
  }

  let result: unknown;
  try {
    result = await pipeline.run(order);
  } catch (error) {
    return failure(error instanceof Error ? error.message : String(error));
  }

  return normalizeResult(result);
}

function normalizeResult(result: unknown): PipelineResult {
  if (
    typeof result !== 'object' ||
    result === null ||
    !('success' in result) ||
    typeof result.success !== 'boolean'
  ) {
    return failure('malformed pipeline result');
  }

  if (!result.success) {
    const error =
      'error' in result && typeof result.error === 'string' && result.error
        ? result.error
        : 'pipeline reported failure';
    return failure(error);
  }

  if (
    !('artifacts' in result) ||
    !Array.isArray(result.artifacts) ||
    !result.artifacts.every(isArtifact)
  ) {
    return failure('malformed pipeline result');
  }
  if (result.artifacts.length === 0) {
    return failure('pipeline produced no artifacts');
  }

  return { success: true, artifacts: result.artifacts };
}
