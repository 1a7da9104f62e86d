import { ServiceType } from '../enums';

export type ColumnLayout = 'one' | 'two';

export interface TranscriptionInput {
  serviceType: ServiceType.TRANSCRIPTION;
  audioUrl: string;
  color: string;
  columns: ColumnLayout;
  textOnly: boolean;
}

export interface ExamInput {
  serviceType: ServiceType.EXAM;
  topic: string;
  subject: string;
  level: string;
  multipleChoiceCount: number;
  essayCount: number;
  /**
   * 1 (easiest) to 10
   */
  difficulty: number;
}

export interface MeetingInput {
  serviceType: ServiceType.MEETING;
  audioUrl: string;
  title?: string;
  attendees?: string;
  agenda?: string;
}

/**
 * Parameters a pipeline needs, tagged by service type
 */
export type PipelineInput = TranscriptionInput | ExamInput | MeetingInput;

export type PipelineInputOf<S extends ServiceType> = Extract<
  PipelineInput,
  { serviceType: S }
>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function positiveInteger(value: unknown, min: number, max: number): number | null {
  return typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= min &&
    value <= max
    ? value
    : null;
}

/**
 * Rebuild a pipeline input from an untyped record (JSON column, request body).
 * Returns null when required parameters are missing or malformed.
 */
export function parsePipelineInput(raw: unknown): PipelineInput | null {
  if (!isRecord(raw)) {
    return null;
  }

  switch (raw.serviceType) {
    case ServiceType.TRANSCRIPTION: {
      if (!nonEmptyString(raw.audioUrl)) return null;
      const columns = raw.columns === 'two' ? 'two' : 'one';
      return {
        serviceType: ServiceType.TRANSCRIPTION,
        audioUrl: raw.audioUrl,
        color: nonEmptyString(raw.color) ? raw.color : 'amethyst',
        columns,
        textOnly: raw.textOnly === true,
      };
    }
    case ServiceType.EXAM: {
      const multipleChoiceCount = positiveInteger(raw.multipleChoiceCount, 0, 100);
      const essayCount = positiveInteger(raw.essayCount, 0, 20);
      const difficulty = positiveInteger(raw.difficulty ?? 7, 1, 10);
      if (
        !nonEmptyString(raw.topic) ||
        !nonEmptyString(raw.subject) ||
        !nonEmptyString(raw.level) ||
        multipleChoiceCount === null ||
        essayCount === null ||
        difficulty === null ||
        multipleChoiceCount + essayCount === 0
      ) {
        return null;
      }
      return {
        serviceType: ServiceType.EXAM,
        topic: raw.topic,
        subject: raw.subject,
        level: raw.level,
        multipleChoiceCount,
        essayCount,
        difficulty,
      };
    }
    case ServiceType.MEETING: {
      if (!nonEmptyString(raw.audioUrl)) return null;
      return {
        serviceType: ServiceType.MEETING,
        audioUrl: raw.audioUrl,
        title: optionalString(raw.title),
        attendees: optionalString(raw.attendees),
        agenda: optionalString(raw.agenda),
      };
    }
    default:
      return null;
  }
}
