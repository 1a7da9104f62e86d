import { ServiceType } from '../domain/enums';
import { Pipeline, PipelineMap } from '../interfaces';

/**
 * Static service type -> pipeline lookup
 */
export class PipelineRegistry {
  constructor(private readonly pipelines: PipelineMap) {
    for (const [serviceType, pipeline] of Object.entries(pipelines)) {
      if (pipeline.serviceType !== serviceType) {
        throw new Error(
          `Pipeline registered under ${serviceType} handles ${pipeline.serviceType}`,
        );
      }
    }
  }

  resolve(serviceType: ServiceType): Pipeline {
    return this.pipelines[serviceType];
  }

  serviceTypes(): ServiceType[] {
    return Object.values(ServiceType);
  }
}
