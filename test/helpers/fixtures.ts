import {
  Artifact,
  Money,
  Order,
  OrderProps,
  OrderStatus,
  PipelineInput,
  ServiceType,
} from '../../src';

export const TRANSCRIPTION_INPUT: PipelineInput = {
  serviceType: ServiceType.TRANSCRIPTION,
  audioUrl: 'https://files.example.com/lecture-01.mp3',
  color: 'amethyst',
  columns: 'two',
  textOnly: false,
};

export const EXAM_INPUT: PipelineInput = {
  serviceType: ServiceType.EXAM,
  topic: 'Photosynthesis',
  subject: 'Biology',
  level: 'High school',
  multipleChoiceCount: 10,
  essayCount: 2,
  difficulty: 6,
};

export function buildOrder(overrides: Partial<OrderProps> = {}): Order {
  return new Order({
    id: 'order-1',
    status: OrderStatus.PENDING,
    serviceType: ServiceType.TRANSCRIPTION,
    pipelineInput: TRANSCRIPTION_INPUT,
    customer: { name: 'Ana Rojas', email: 'ana@example.com' },
    money: new Money(3000, 'CLP'),
    gateway: 'mock',
    ...overrides,
  });
}

export function artifactsFor(orderId: string, count: number, prefix = 'File'): Artifact[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `${prefix}${index + 1}-${orderId}.pdf`,
    url: `https://files.example.com/${orderId}/${prefix}${index + 1}.pdf`,
    contentType: 'application/pdf',
  }));
}
