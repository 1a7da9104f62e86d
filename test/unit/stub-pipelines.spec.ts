import { PipelineRegistry, ServiceType, createStubPipelines } from '../../src';
import { EXAM_INPUT, buildOrder } from '../helpers/fixtures';

describe('Stub pipelines', () => {
  const registry = new PipelineRegistry(
    createStubPipelines({ artifactBaseUrl: 'https://files.example.com/' }),
  );

  it('should cover every service type', () => {
    expect(registry.serviceTypes().sort()).toEqual(
      [ServiceType.EXAM, ServiceType.MEETING, ServiceType.TRANSCRIPTION].sort(),
    );
  });

  it('should produce document and quiz files for a transcription', async () => {
    const result = await registry.resolve(ServiceType.TRANSCRIPTION).run(buildOrder());

    expect(result.success).toBe(true);
    expect(result.artifacts.map((artifact) => artifact.name)).toEqual([
      'Document-order-1.docx',
      'Document-order-1.pdf',
      'Quiz-order-1.docx',
      'Quiz-order-1.pdf',
    ]);
    expect(result.artifacts[1]).toEqual({
      name: 'Document-order-1.pdf',
      url: 'https://files.example.com/order-1/Document-order-1.pdf',
      contentType: 'application/pdf',
    });
  });

  it('should produce an exam with its answer key', async () => {
    const order = buildOrder({ id: 'exam-7', serviceType: ServiceType.EXAM, pipelineInput: EXAM_INPUT });
    const result = await registry.resolve(ServiceType.EXAM).run(order);

    expect(result.artifacts.map((artifact) => artifact.name)).toEqual([
      'Exam-exam-7.docx',
      'Exam-exam-7.pdf',
      'AnswerKey-exam-7.pdf',
    ]);
  });
});
