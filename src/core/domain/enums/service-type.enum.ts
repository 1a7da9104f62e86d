/**
 * Kind of content a customer pays for.
 * Selects the pipeline and the shape of the pipeline input.
 */
export enum ServiceType {
  /**
   * Audio transcription rewritten into a study document, plus a quiz
   */
  TRANSCRIPTION = 'transcription',

  /**
   * Exam generation with an answer key
   */
  EXAM = 'exam',

  /**
   * Meeting minutes from a recorded meeting
   */
  MEETING = 'meeting',
}

const SERVICE_TYPE_VALUES: readonly string[] = Object.values(ServiceType);

export function isServiceType(value: unknown): value is ServiceType {
  return typeof value === 'string' && SERVICE_TYPE_VALUES.includes(value);
}
