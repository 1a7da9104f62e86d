import { Logger } from '@nestjs/common';
import {
  Artifact,
  Order,
  Pipeline,
  PipelineMap,
  PipelineResult,
  ServiceType,
} from '../../../core';

const CONTENT_TYPES = {
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pdf: 'application/pdf',
} as const;

export interface StubFile {
  label: string;
  extension: keyof typeof CONTENT_TYPES;
}

export interface StubPipelineOptions {
  /**
   * Base URL artifact links are built under
   */
  artifactBaseUrl: string;
}

/**
 * Development pipeline producing deterministic artifacts without doing the work
 */
export class StubPipeline implements Pipeline {
  private readonly logger = new Logger(StubPipeline.name);

  constructor(
    readonly serviceType: ServiceType,
    private readonly files: readonly StubFile[],
    private readonly options: StubPipelineOptions,
  ) {}

  async run(order: Order): Promise<PipelineResult> {
    const base = this.options.artifactBaseUrl.replace(/\/+$/, '');
    const artifacts: Artifact[] = this.files.map(({ label, extension }) => {
      const name = `${label}-${order.id}.${extension}`;
      return {
        name,
        url: `${base}/${order.id}/${name}`,
        contentType: CONTENT_TYPES[extension],
      };
    });

    this.logger.debug(
      `Stub ${this.serviceType} pipeline produced ${artifacts.length} files for ${order.id}`,
    );
    return { success: true, artifacts };
  }
}

function both(label: string): StubFile[] {
  return [
    { label, extension: 'docx' },
    { label, extension: 'pdf' },
  ];
}

/**
 * Stub pipelines for every service type
 */
export function createStubPipelines(options: StubPipelineOptions): PipelineMap {
  return {
    [ServiceType.TRANSCRIPTION]: new StubPipeline(
      ServiceType.TRANSCRIPTION,
      [...both('Document'), ...both('Quiz')],
      options,
    ),
    [ServiceType.EXAM]: new StubPipeline(
      ServiceType.EXAM,
      [...both('Exam'), { label: 'AnswerKey', extension: 'pdf' }],
      options,
    ),
    [ServiceType.MEETING]: new StubPipeline(ServiceType.MEETING, both('Minutes'), options),
  };
}
